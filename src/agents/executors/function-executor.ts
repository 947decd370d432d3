import type { TaskContext, TaskExecutor } from '../../types/taskTypes';

export type TaskHandler = (context: TaskContext) => unknown;

/**
 * Adapts a plain (sync or async) function to the executor interface
 */
export class FunctionExecutor implements TaskExecutor {
  constructor(private readonly handler: TaskHandler) {}

  async execute(context: TaskContext): Promise<unknown> {
    return this.handler(context);
  }
}
