/**
 * LLM settings for task executors
 *
 * Sampling modes keep temperature choices consistent across agents.
 */

export interface LLMConfig {
  temperature: number;
  maxTokens?: number;
}

export const LLM_CONFIG = {
  /**
   * Temperature 0: structured output, extraction, summaries of findings
   */
  deterministic: {
    temperature: 0,
    maxTokens: 2000,
  },

  /**
   * Temperature 0.3: analysis and multi-step reasoning
   */
  reasoning: {
    temperature: 0.3,
    maxTokens: 2000,
  },

  /**
   * Temperature 0.7: drafting and ideation
   */
  creative: {
    temperature: 0.7,
    maxTokens: 2000,
  },
} as const satisfies Record<string, LLMConfig>;

export type LLMMode = keyof typeof LLM_CONFIG;

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export function getLLMConfig(mode: LLMMode): LLMConfig {
  return LLM_CONFIG[mode];
}

export function isLLMMode(value: string): value is LLMMode {
  return value in LLM_CONFIG;
}

/**
 * Mode from `LLM_MODE`, falling back to reasoning
 */
export function loadLLMMode(env: Record<string, string | undefined> = process.env): LLMMode {
  const mode = env.LLM_MODE;
  return mode && isLLMMode(mode) ? mode : 'reasoning';
}
