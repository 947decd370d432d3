/**
 * Type definitions for task tracking and task graphs
 */

import { z } from 'zod';

export type TaskStatus =
  | 'pending'
  | 'waiting'
  | 'executing'
  | 'completed'
  | 'failed';

export interface TaskRecord {
  taskId: string;
  /** Assignee */
  agent: string;
  description: string;
  dependsOn: string[];
  status: TaskStatus;
  replyTo?: string;
  sender?: string;
  /** Relay deliveries still waiting for acknowledgment */
  messageIds: string[];
  createdAt: Date;
  completedAt?: Date;
  result?: unknown;
  error?: string;
}

export const TaskStepSchema = z.object({
  task_id: z.string().trim().min(1),
  agent: z.string().trim().min(1),
  description: z.string().min(1),
  depends_on: z.array(z.string().trim().min(1)).default([]),
  reply_to: z.string().trim().min(1).optional(),
});

export const TaskGraphSchema = z.object({
  steps: z.array(TaskStepSchema).min(1),
});

export type TaskStep = z.infer<typeof TaskStepSchema>;
export type TaskGraph = z.infer<typeof TaskGraphSchema>;
export type TaskGraphInput = z.input<typeof TaskGraphSchema>;

/**
 * What a task body receives
 */
export interface TaskContext {
  taskId: string;
  agent: string;
  description: string;
  dependencyResults: Record<string, unknown>;
  /** Description followed by the prerequisite results */
  prompt: string;
}

/**
 * Task body; framework adapters implement this
 */
export interface TaskExecutor {
  execute(context: TaskContext): Promise<unknown>;
}
