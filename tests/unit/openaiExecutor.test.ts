import { OpenAIExecutor } from '../../src/agents/executors/openai-executor';
import type { TaskContext } from '../../src/types/taskTypes';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
}));

const context: TaskContext = {
  taskId: 'B',
  agent: 'writer',
  description: 'Y',
  dependencyResults: { A: 'facts' },
  prompt: 'Y\n\nBased on the following findings:\n[A]: facts',
};

describe('OpenAIExecutor', () => {
  const env = process.env;

  beforeEach(() => {
    mockCreate.mockReset();
    process.env = { ...env, OPENAI_API_KEY: 'test-key' };
    delete process.env.OPENAI_MODEL;
    delete process.env.LLM_MODE;
  });

  afterAll(() => {
    process.env = env;
  });

  it('sends the task prompt and returns the trimmed answer', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '  final answer \n' } }],
    });
    const executor = new OpenAIExecutor();

    await expect(executor.execute(context)).resolves.toBe('final answer');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: 0.3,
      max_tokens: 2000,
      messages: [
        { role: 'system', content: expect.stringMatching(/^Complete the task/) },
        { role: 'user', content: context.prompt },
      ],
    });
  });

  it('takes the model from the environment and the mode from options', async () => {
    process.env.OPENAI_MODEL = 'gpt-4o';
    mockCreate.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const executor = new OpenAIExecutor({ mode: 'deterministic', role: 'a researcher' });

    await executor.execute(context);
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o',
        temperature: 0,
        messages: [
          {
            role: 'system',
            content: expect.stringMatching(/^You are a researcher\. Complete the task/),
          },
          { role: 'user', content: context.prompt },
        ],
      }),
    );
  });

  it('fails on an empty completion', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const executor = new OpenAIExecutor();
    await expect(executor.execute(context)).rejects.toThrow('Empty completion for task B');
  });

  it('surfaces API errors to the runtime', async () => {
    mockCreate.mockRejectedValue(new Error('rate limited'));
    const executor = new OpenAIExecutor();
    await expect(executor.execute(context)).rejects.toThrow('rate limited');
  });

  it('requires an API key', () => {
    delete process.env.OPENAI_API_KEY;
    expect(() => new OpenAIExecutor()).toThrow(
      'OPENAI_API_KEY is required for the OpenAI executor',
    );
  });
});
