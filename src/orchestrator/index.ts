/**
 * Coordinator
 *
 * Agent runtime that accepts whole task graphs. Every step is sent to its
 * agent as soon as it is submitted; results flow back here, and a step is
 * forwarded again with its prerequisite results once all of them are in.
 * Parked `get_result` lookups are answered as results arrive.
 *
 * Tasks always go out with the coordinator as `reply_to`; a step-level reply
 * target receives a copy of the result once it has been recorded here.
 */

import logger from '../utils/logger';
import { sleep } from '../utils/asyncQueue';
import { AgentRuntime, AgentRuntimeOptions } from '../agents/agent-runtime';
import { DependencyTracker } from '../services/dependencyTracker';
import type {
  GetResultMessage,
  OutboundMessage,
  TaskResultMessage,
} from '../types/messageTypes';
import {
  TaskGraphInput,
  TaskGraphSchema,
  TaskRecord,
  TaskStep,
} from '../types/taskTypes';
import { getCoordinatorName } from '../config/relayConfig';
import { GraphValidationError, WaitTimeoutError } from './errors';

export { GraphValidationError, WaitTimeoutError } from './errors';

export interface CoordinatorOptions
  extends Omit<AgentRuntimeOptions, 'name' | 'coordinator'> {
  name?: string;
}

export interface WaitForCompletionOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
  /** Defaults to every task submitted so far */
  taskIds?: string[];
}

const DEFAULT_POLL_INTERVAL_MS = 100;

export class Coordinator extends AgentRuntime {
  /** Result Map: task id -> result, failures included */
  private readonly results = new Map<string, unknown>();
  private readonly records = new Map<string, TaskRecord>();
  private readonly submitted = new Set<string>();
  private readonly graph = new DependencyTracker();
  /** task id -> agents waiting on a get_result answer */
  private readonly lookups = new Map<string, Set<string>>();

  constructor(options: CoordinatorOptions) {
    super({ ...options, name: options.name ?? getCoordinatorName() });
  }

  /**
   * Validate and dispatch a task graph; returns the submitted task ids
   */
  async submitTask(input: TaskGraphInput): Promise<string[]> {
    const parsed = TaskGraphSchema.safeParse(input);
    if (!parsed.success) {
      throw new GraphValidationError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || 'graph'}: ${issue.message}`,
        ),
      );
    }
    const steps = parsed.data.steps;
    this.validateGraph(steps);

    for (const step of steps) {
      const taskId = step.task_id;
      let record = this.records.get(taskId);
      if (!record) {
        record = {
          taskId,
          agent: step.agent,
          description: step.description,
          dependsOn: step.depends_on,
          status: 'pending',
          replyTo: step.reply_to ?? this.name,
          messageIds: [],
          createdAt: new Date(),
        };
        this.records.set(taskId, record);
      } else {
        logger.info('Task already submitted, sending again', {
          agent: this.name,
          taskId,
          status: record.status,
        });
      }
      this.submitted.add(taskId);

      if (!this.results.has(taskId)) {
        this.graph.park(taskId, record.dependsOn, (id) => this.results.has(id));
      }
    }

    for (const step of steps) {
      const record = this.records.get(step.task_id);
      if (record) {
        await this.dispatchTask(record);
      }
    }

    logger.info('Task graph submitted', {
      agent: this.name,
      tasks: steps.map((step) => step.task_id),
    });
    return steps.map((step) => step.task_id);
  }

  /**
   * Poll the Result Map until every requested task has a result
   */
  async waitForCompletion(
    options: WaitForCompletionOptions = {},
  ): Promise<Record<string, unknown>> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const taskIds = options.taskIds ?? Array.from(this.submitted);
    const deadline =
      options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : null;

    for (;;) {
      const pending = taskIds.filter((id) => !this.results.has(id));
      if (pending.length === 0) {
        return Object.fromEntries(
          taskIds.map((id) => [id, this.results.get(id)]),
        );
      }

      if (deadline !== null) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new WaitTimeoutError(pending, options.timeoutMs ?? 0);
        }
        await sleep(Math.min(pollIntervalMs, remaining));
      } else {
        await sleep(pollIntervalMs);
      }
    }
  }

  getResults(): Record<string, unknown> {
    return Object.fromEntries(this.results);
  }

  override getTaskRecord(taskId: string): TaskRecord | undefined {
    return this.records.get(taskId) ?? super.getTaskRecord(taskId);
  }

  protected override async handleTaskResult(
    message: TaskResultMessage,
  ): Promise<void> {
    const taskId = message.task_id;
    const record = this.records.get(taskId);
    if (!record) {
      await super.handleTaskResult(message);
      return;
    }

    if (this.results.has(taskId)) {
      logger.debug('Duplicate result ignored', {
        agent: this.name,
        taskId,
        sender: message.sender,
      });
      return;
    }

    this.results.set(taskId, message.result);
    record.status = message.error === undefined ? 'completed' : 'failed';
    record.result = message.result;
    record.error = message.error;
    record.completedAt = new Date();
    record.sender = message.sender;
    this.storeResult(taskId, message.result);

    logger.info('Task result received', {
      agent: this.name,
      taskId,
      status: record.status,
      sender: message.sender,
    });

    for (const readyId of this.graph.resolve(taskId)) {
      const dependent = this.records.get(readyId);
      if (dependent && !this.results.has(readyId)) {
        await this.dispatchTask(dependent);
      }
    }
    await this.answerLookups(record);

    const observer = record.replyTo;
    if (observer && observer !== this.name && observer !== message.sender) {
      await this.sendWithRetry(observer, this.resultMessage(record));
    }
  }

  protected override async handleGetResult(
    message: GetResultMessage,
  ): Promise<void> {
    const taskId = message.task_id;
    const record = this.records.get(taskId);
    if (!record) {
      // Never submitted here, so nothing would ever answer a parked lookup
      logger.warn('Result lookup for unknown task', {
        agent: this.name,
        taskId,
        requester: message.reply_to,
      });
      await super.handleGetResult(message);
      return;
    }
    if (this.results.has(taskId)) {
      await this.transport.send(message.reply_to, this.resultMessage(record));
      return;
    }

    let requesters = this.lookups.get(taskId);
    if (!requesters) {
      requesters = new Set();
      this.lookups.set(taskId, requesters);
    }
    requesters.add(message.reply_to);
    logger.debug('Result lookup parked', {
      agent: this.name,
      taskId,
      requester: message.reply_to,
    });
  }

  private async dispatchTask(record: TaskRecord): Promise<void> {
    const dependencyResults: Record<string, unknown> = {};
    for (const id of record.dependsOn) {
      if (this.results.has(id)) {
        dependencyResults[id] = this.results.get(id);
      }
    }

    const message: OutboundMessage = {
      type: 'task',
      task_id: record.taskId,
      description: record.description,
      depends_on: record.dependsOn,
      reply_to: this.name,
      ...(Object.keys(dependencyResults).length > 0 && {
        dependency_results: dependencyResults,
      }),
    };

    const sent = await this.sendWithRetry(record.agent, message);
    if (!sent) {
      logger.error('Task could not be dispatched', {
        agent: this.name,
        taskId: record.taskId,
        target: record.agent,
      });
      return;
    }
    logger.debug('Task dispatched', {
      agent: this.name,
      taskId: record.taskId,
      target: record.agent,
      withResults: Object.keys(dependencyResults),
    });
  }

  private async answerLookups(record: TaskRecord): Promise<void> {
    const requesters = this.lookups.get(record.taskId);
    if (!requesters) {
      return;
    }
    this.lookups.delete(record.taskId);
    for (const requester of requesters) {
      await this.sendWithRetry(requester, this.resultMessage(record));
    }
  }

  private resultMessage(record: TaskRecord): OutboundMessage {
    return {
      type: 'task_result',
      task_id: record.taskId,
      result: this.results.get(record.taskId),
      ...(record.error !== undefined && { error: record.error }),
    };
  }

  /**
   * Reject duplicate ids, redefined tasks, unknown prerequisites and cycles
   */
  private validateGraph(steps: TaskStep[]): void {
    const issues: string[] = [];
    const byId = new Map<string, TaskStep>();

    for (const step of steps) {
      if (byId.has(step.task_id)) {
        issues.push(`Duplicate task id ${step.task_id}`);
        continue;
      }
      byId.set(step.task_id, step);

      const existing = this.records.get(step.task_id);
      if (existing && !sameDefinition(existing, step)) {
        issues.push(
          `Task ${step.task_id} was already submitted with a different definition`,
        );
      }
    }

    for (const step of steps) {
      for (const dependencyId of step.depends_on) {
        if (!byId.has(dependencyId) && !this.records.has(dependencyId)) {
          issues.push(
            `Task ${step.task_id} depends on unknown task ${dependencyId}`,
          );
        }
      }
    }

    const cycle = findCycle(byId);
    if (cycle) {
      issues.push(`Dependency cycle: ${cycle.join(' -> ')}`);
    }

    if (issues.length > 0) {
      throw new GraphValidationError(issues);
    }
  }
}

function sameDefinition(record: TaskRecord, step: TaskStep): boolean {
  const before = [...record.dependsOn].sort();
  const after = [...step.depends_on].sort();
  return (
    record.agent === step.agent &&
    record.description === step.description &&
    before.length === after.length &&
    before.every((id, index) => id === after[index])
  );
}

/**
 * First cycle found among the graph's own steps, as a closed path
 */
function findCycle(steps: Map<string, TaskStep>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (taskId: string): string[] | null => {
    const seen = state.get(taskId);
    if (seen === 'done') return null;
    if (seen === 'visiting') {
      return [...path.slice(path.indexOf(taskId)), taskId];
    }

    state.set(taskId, 'visiting');
    path.push(taskId);
    for (const dependencyId of steps.get(taskId)?.depends_on ?? []) {
      if (!steps.has(dependencyId)) continue;
      const cycle = visit(dependencyId);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(taskId, 'done');
    return null;
  };

  for (const taskId of steps.keys()) {
    const cycle = visit(taskId);
    if (cycle) return cycle;
  }
  return null;
}
