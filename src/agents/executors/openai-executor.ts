/**
 * OpenAI Executor
 *
 * Runs a task's prompt (description plus prerequisite findings) through the
 * chat completions API and returns the answer text.
 */

import OpenAI from 'openai';
import logger from '../../utils/logger';
import type { TaskContext, TaskExecutor } from '../../types/taskTypes';
import {
  DEFAULT_OPENAI_MODEL,
  getLLMConfig,
  LLMMode,
  loadLLMMode,
} from '../../config/llmConfig';

export interface OpenAIExecutorOptions {
  apiKey?: string;
  model?: string;
  mode?: LLMMode;
  /** Role of the agent, prepended to the system prompt */
  role?: string;
  client?: OpenAI;
}

const SYSTEM_PROMPT =
  'Complete the task you are given. When findings from earlier tasks are ' +
  'listed, build on them and do not repeat them verbatim. Answer with the ' +
  'result only.';

export class OpenAIExecutor implements TaskExecutor {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly mode: LLMMode;
  private readonly role?: string;

  constructor(options: OpenAIExecutorOptions = {}) {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!options.client && !apiKey) {
      throw new Error('OPENAI_API_KEY is required for the OpenAI executor');
    }
    this.client = options.client ?? new OpenAI({ apiKey });
    this.model = options.model ?? (process.env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL);
    this.mode = options.mode ?? loadLLMMode();
    this.role = options.role;
  }

  async execute(context: TaskContext): Promise<string> {
    const config = getLLMConfig(this.mode);
    const system = this.role ? `You are ${this.role}. ${SYSTEM_PROMPT}` : SYSTEM_PROMPT;

    logger.debug('Calling OpenAI', {
      taskId: context.taskId,
      model: this.model,
      mode: this.mode,
    });

    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: config.temperature,
      max_tokens: config.maxTokens,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: context.prompt },
      ],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`Empty completion for task ${context.taskId}`);
    }
    return content.trim();
  }
}
