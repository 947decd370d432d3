/**
 * Agent Runtime
 *
 * Hosts one named agent on a transport. Two cooperative loops share the
 * runtime's state: the message loop receives and classifies deliveries, the
 * task loop runs queued tasks once their prerequisites are available.
 *
 * Deliveries of a task are acknowledged only after its result has been
 * recorded and sent, so a crash before that point leads to redelivery.
 */

import logger from '../utils/logger';
import { AsyncQueue, sleep } from '../utils/asyncQueue';
import { ExpiringMap } from '../utils/expiringMap';
import { DependencyTracker } from '../services/dependencyTracker';
import { describeError } from '../transport/errors';
import type { Transport } from '../transport/transport';
import {
  Delivery,
  GetResultMessage,
  OutboundMessage,
  parseMessage,
  RegistrationMessage,
  TaskMessage,
  TaskResultMessage,
} from '../types/messageTypes';
import type {
  TaskContext,
  TaskExecutor,
  TaskRecord,
} from '../types/taskTypes';
import {
  loadRuntimeSettings,
  RuntimeSettings,
} from '../config/relayConfig';

export interface AgentRuntimeOptions {
  name: string;
  transport: Transport;
  executor?: TaskExecutor;
  /** Where prerequisite lookups and the registration announcement go */
  coordinator?: string;
  capabilities?: string[];
  settings?: Partial<RuntimeSettings>;
}

export interface ConnectedAgent {
  agentId: string;
  name?: string;
  capabilities: string[];
  registeredAt: Date;
}

interface InFlightTask {
  record: TaskRecord;
  dependencyResults: Map<string, unknown>;
  /** Prerequisites already looked up with get_result */
  requested: Set<string>;
  timer: NodeJS.Timeout | null;
  timedOut: boolean;
}

/**
 * Text handed to the task body: the description, followed by one line per
 * prerequisite result in declaration order
 */
export function buildExecutionPrompt(
  description: string,
  dependsOn: string[],
  results: ReadonlyMap<string, unknown>,
): string {
  if (dependsOn.length === 0) {
    return description;
  }
  const findings = dependsOn.map((id) => {
    const value = results.get(id);
    return `[${id}]: ${typeof value === 'string' ? value : JSON.stringify(value)}`;
  });
  return `${description}\n\nBased on the following findings:\n${findings.join('\n')}`;
}

export class AgentRuntime {
  readonly name: string;
  protected readonly transport: Transport;
  protected readonly executor?: TaskExecutor;
  protected readonly coordinator?: string;
  protected readonly capabilities: string[];
  protected readonly settings: RuntimeSettings;

  private readonly inFlight = new Map<string, InFlightTask>();
  private readonly completed: ExpiringMap<string, true>;
  private readonly finished: ExpiringMap<string, TaskRecord>;
  private readonly localResults: ExpiringMap<string, unknown>;
  private readonly tracker = new DependencyTracker();
  private readonly connectedAgents = new Map<string, ConnectedAgent>();

  private queue = new AsyncQueue<string>();
  private abortController = new AbortController();
  private loops: Promise<void> | null = null;
  private running = false;

  constructor(options: AgentRuntimeOptions) {
    this.name = options.name;
    this.transport = options.transport;
    this.executor = options.executor;
    this.coordinator = options.coordinator;
    this.capabilities = options.capabilities ?? [];
    this.settings = { ...loadRuntimeSettings(), ...options.settings };

    const retention = {
      ttlMs: this.settings.completedTaskTtlMs,
      maxEntries: this.settings.completedTaskMax,
    };
    this.completed = new ExpiringMap(retention);
    this.finished = new ExpiringMap(retention);
    this.localResults = new ExpiringMap(retention);
  }

  /**
   * Register with the transport, announce to the coordinator and start both
   * loops. Rejects when registration fails.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    await this.transport.register(this.name, {
      name: this.name,
      capabilities: this.capabilities,
    });

    this.running = true;
    this.abortController = new AbortController();
    this.queue = new AsyncQueue<string>();

    if (this.coordinator && this.coordinator !== this.name) {
      try {
        await this.transport.send(this.coordinator, {
          type: 'registration',
          agent_id: this.name,
          name: this.name,
          capabilities: this.capabilities,
        });
      } catch (error) {
        logger.warn('Could not announce agent to coordinator', {
          agent: this.name,
          coordinator: this.coordinator,
          error: describeError(error),
        });
      }
    }

    this.loops = Promise.all([this.messageLoop(), this.taskLoop()]).then(
      () => undefined,
    );
    logger.info('Agent runtime started', { agent: this.name });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.abortController.abort();
    this.queue.close();
    for (const entry of this.inFlight.values()) {
      this.clearTimer(entry);
    }

    await this.loops;
    this.loops = null;
    await this.transport.close();
    logger.info('Agent runtime stopped', { agent: this.name });
  }

  get isRunning(): boolean {
    return this.running;
  }

  getTaskRecord(taskId: string): TaskRecord | undefined {
    return this.inFlight.get(taskId)?.record ?? this.finished.get(taskId);
  }

  isCompleted(taskId: string): boolean {
    return this.completed.has(taskId);
  }

  getConnectedAgents(): ConnectedAgent[] {
    return Array.from(this.connectedAgents.values());
  }

  get queueSize(): number {
    return this.queue.size;
  }

  get waitingCount(): number {
    return this.tracker.size;
  }

  protected get signal(): AbortSignal {
    return this.abortController.signal;
  }

  // ---------------------------------------------------------------------------
  // Message loop
  // ---------------------------------------------------------------------------

  private async messageLoop(): Promise<void> {
    while (!this.signal.aborted) {
      let delivery: Delivery | null;
      try {
        delivery = await this.transport.receive(
          this.settings.receiveTimeoutMs,
          this.signal,
        );
      } catch (error) {
        if (this.signal.aborted) break;
        logger.warn('Receive failed, backing off', {
          agent: this.name,
          error: describeError(error),
        });
        await sleep(this.settings.retryBackoffMs, this.signal);
        continue;
      }

      if (!delivery) continue;

      try {
        await this.dispatch(delivery);
      } catch (error) {
        // Left unacknowledged; the relay redelivers it
        logger.error('Failed to process message', {
          agent: this.name,
          messageId: delivery.messageId,
          error: describeError(error),
        });
      }
    }
  }

  private async dispatch(delivery: Delivery): Promise<void> {
    const parsed = parseMessage(delivery.body);

    if (parsed.kind === 'malformed') {
      logger.warn('Dropping malformed message', {
        agent: this.name,
        messageId: delivery.messageId,
        reason: parsed.reason,
      });
      await this.acknowledge(delivery.messageId);
      return;
    }
    if (parsed.kind === 'unknown_type') {
      logger.warn('Ignoring message of unknown type', {
        agent: this.name,
        messageId: delivery.messageId,
        type: parsed.type,
      });
      await this.acknowledge(delivery.messageId);
      return;
    }

    const message = parsed.message;
    switch (message.type) {
      case 'task':
        await this.acceptTask(message, delivery.messageId);
        return;
      case 'task_result':
        await this.handleTaskResult(message);
        break;
      case 'registration':
        await this.handleRegistration(message);
        break;
      case 'get_result':
        await this.handleGetResult(message);
        break;
    }
    await this.acknowledge(delivery.messageId);
  }

  private async acceptTask(message: TaskMessage, messageId: string): Promise<void> {
    const taskId = message.task_id;

    if (this.completed.has(taskId)) {
      logger.debug('Skipping already completed task', {
        agent: this.name,
        taskId,
        messageId,
      });
      await this.acknowledge(messageId);
      return;
    }

    const existing = this.inFlight.get(taskId);
    if (existing) {
      logger.debug('Duplicate delivery of in-flight task', {
        agent: this.name,
        taskId,
        messageId,
        status: existing.record.status,
      });
      this.mergeDependencyResults(existing, message.dependency_results);
      // A redelivery of the original message is acknowledged on completion
      if (!existing.record.messageIds.includes(messageId)) {
        await this.acknowledge(messageId);
      }
      return;
    }

    const entry: InFlightTask = {
      record: {
        taskId,
        agent: this.name,
        description: message.description,
        dependsOn: message.depends_on,
        status: 'pending',
        replyTo: message.reply_to,
        sender: message.sender,
        messageIds: [messageId],
        createdAt: new Date(),
      },
      dependencyResults: new Map(),
      requested: new Set(),
      timer: null,
      timedOut: false,
    };
    this.inFlight.set(taskId, entry);
    this.mergeDependencyResults(entry, message.dependency_results);
    this.queue.push(taskId);

    logger.info('Task queued', {
      agent: this.name,
      taskId,
      dependsOn: message.depends_on,
    });
  }

  /**
   * Record a prerequisite result that arrived on the wire. Only results an
   * in-flight task depends on are kept; anything else is dropped.
   */
  protected async handleTaskResult(message: TaskResultMessage): Promise<void> {
    if (!this.isAwaited(message.task_id)) {
      logger.warn('Ignoring result no task is waiting on', {
        agent: this.name,
        taskId: message.task_id,
        sender: message.sender,
      });
      return;
    }
    logger.debug('Received task result', {
      agent: this.name,
      taskId: message.task_id,
      sender: message.sender,
    });
    this.storeResult(message.task_id, message.result);
  }

  protected async handleRegistration(message: RegistrationMessage): Promise<void> {
    this.connectedAgents.set(message.agent_id, {
      agentId: message.agent_id,
      name: message.name,
      capabilities: message.capabilities,
      registeredAt: new Date(),
    });
    logger.info('Agent connected', {
      agent: this.name,
      peer: message.agent_id,
      capabilities: message.capabilities,
    });
  }

  /**
   * Answer from local results; unknown ids are left to the coordinator
   */
  protected async handleGetResult(message: GetResultMessage): Promise<void> {
    if (!this.localResults.has(message.task_id)) {
      logger.debug('No local result for lookup', {
        agent: this.name,
        taskId: message.task_id,
        requester: message.reply_to,
      });
      return;
    }
    await this.transport.send(message.reply_to, {
      type: 'task_result',
      task_id: message.task_id,
      result: this.localResults.get(message.task_id),
    });
  }

  // ---------------------------------------------------------------------------
  // Task loop
  // ---------------------------------------------------------------------------

  private async taskLoop(): Promise<void> {
    for (;;) {
      const taskId = await this.queue.take();
      if (taskId === undefined || this.signal.aborted) break;

      const entry = this.inFlight.get(taskId);
      if (!entry || entry.record.status === 'waiting') continue;

      try {
        await this.processTask(entry);
      } catch (error) {
        logger.error('Task processing failed', {
          agent: this.name,
          taskId,
          error: describeError(error),
        });
      }
    }
  }

  private async processTask(entry: InFlightTask): Promise<void> {
    const { record } = entry;

    if (entry.timedOut) {
      const missing = record.dependsOn.filter(
        (id) => !this.hasDependency(entry, id),
      );
      const reason = `Dependency timeout: waiting for ${missing.join(', ')}`;
      logger.warn('Task timed out waiting for dependencies', {
        agent: this.name,
        taskId: record.taskId,
        missing,
      });
      await this.finish(entry, `Error: ${reason}`, reason);
      return;
    }

    const missing = this.tracker.park(record.taskId, record.dependsOn, (id) =>
      this.hasDependency(entry, id),
    );
    if (missing.length > 0) {
      await this.deferTask(entry, missing);
      return;
    }

    await this.execute(entry);
  }

  private async deferTask(entry: InFlightTask, missing: string[]): Promise<void> {
    const { record } = entry;
    record.status = 'waiting';
    logger.info('Task waiting for dependencies', {
      agent: this.name,
      taskId: record.taskId,
      missing,
    });

    if (this.settings.dependencyTimeoutMs > 0 && !entry.timer) {
      entry.timer = setTimeout(() => {
        entry.timer = null;
        if (record.status !== 'waiting') return;
        this.tracker.remove(record.taskId);
        entry.timedOut = true;
        record.status = 'pending';
        this.queue.push(record.taskId);
      }, this.settings.dependencyTimeoutMs);
    }

    const target = this.coordinator ?? record.replyTo;
    if (!target || target === this.name) {
      return;
    }
    for (const dependencyId of missing) {
      if (entry.requested.has(dependencyId)) continue;
      entry.requested.add(dependencyId);
      try {
        await this.transport.send(target, {
          type: 'get_result',
          task_id: dependencyId,
          reply_to: this.name,
        });
      } catch (error) {
        // The coordinator still forwards the task once the result lands
        entry.requested.delete(dependencyId);
        logger.warn('Dependency lookup failed', {
          agent: this.name,
          taskId: record.taskId,
          dependencyId,
          error: describeError(error),
        });
      }
    }
  }

  private async execute(entry: InFlightTask): Promise<void> {
    const { record } = entry;
    record.status = 'executing';
    const context = this.buildTaskContext(entry);

    logger.info('Executing task', { agent: this.name, taskId: record.taskId });

    let result: unknown;
    let error: string | undefined;
    if (!this.executor) {
      error = `No executor configured for agent ${this.name}`;
    } else {
      try {
        result = await this.executor.execute(context);
      } catch (failure) {
        error = describeError(failure);
      }
    }

    if (error !== undefined) {
      logger.error('Task failed', {
        agent: this.name,
        taskId: record.taskId,
        error,
      });
      await this.finish(entry, `Error: ${error}`, error);
      return;
    }
    await this.finish(entry, result ?? null);
  }

  private buildTaskContext(entry: InFlightTask): TaskContext {
    const { record } = entry;
    const dependencyResults: Record<string, unknown> = {};
    for (const id of record.dependsOn) {
      dependencyResults[id] = entry.dependencyResults.get(id);
    }
    return {
      taskId: record.taskId,
      agent: this.name,
      description: record.description,
      dependencyResults,
      prompt: buildExecutionPrompt(
        record.description,
        record.dependsOn,
        entry.dependencyResults,
      ),
    };
  }

  /**
   * Mark completed, publish the result, then acknowledge every delivery
   */
  private async finish(
    entry: InFlightTask,
    result: unknown,
    error?: string,
  ): Promise<void> {
    const { record } = entry;
    this.clearTimer(entry);
    this.tracker.remove(record.taskId);

    record.status = error === undefined ? 'completed' : 'failed';
    record.result = result;
    record.error = error;
    record.completedAt = new Date();

    this.completed.set(record.taskId, true);
    this.inFlight.delete(record.taskId);
    this.finished.set(record.taskId, record);
    this.storeResult(record.taskId, result);

    const target = record.replyTo ?? record.sender ?? this.coordinator;
    if (target) {
      const message: OutboundMessage = {
        type: 'task_result',
        task_id: record.taskId,
        result,
        ...(error !== undefined && { error }),
      };
      const sent = await this.sendWithRetry(target, message);
      if (!sent) {
        logger.warn('Result not sent, leaving task deliveries unacknowledged', {
          agent: this.name,
          taskId: record.taskId,
          target,
        });
        return;
      }
    } else {
      logger.warn('Task has no reply target, result kept locally', {
        agent: this.name,
        taskId: record.taskId,
      });
    }

    for (const messageId of record.messageIds) {
      try {
        await this.acknowledge(messageId);
      } catch (ackError) {
        // A redelivery is skipped as already completed
        logger.warn('Acknowledge failed', {
          agent: this.name,
          taskId: record.taskId,
          messageId,
          error: describeError(ackError),
        });
      }
    }
    logger.info('Task finished', {
      agent: this.name,
      taskId: record.taskId,
      status: record.status,
    });
  }

  // ---------------------------------------------------------------------------
  // Shared helpers
  // ---------------------------------------------------------------------------

  /**
   * Send until delivered, the runtime stops, or the attempt limit is hit
   */
  protected async sendWithRetry(
    target: string,
    message: OutboundMessage,
  ): Promise<boolean> {
    const maxAttempts = this.settings.sendMaxAttempts;
    let attempt = 0;

    while (!this.signal.aborted) {
      attempt++;
      try {
        await this.transport.send(target, message);
        return true;
      } catch (error) {
        if (maxAttempts > 0 && attempt >= maxAttempts) {
          logger.error('Giving up on send', {
            agent: this.name,
            target,
            type: message.type,
            attempts: attempt,
            error: describeError(error),
          });
          return false;
        }
        logger.warn('Send failed, retrying', {
          agent: this.name,
          target,
          type: message.type,
          attempt,
          error: describeError(error),
        });
        await sleep(this.settings.retryBackoffMs, this.signal);
      }
    }
    return false;
  }

  protected async acknowledge(messageId: string): Promise<void> {
    await this.transport.acknowledge(this.name, messageId);
  }

  /**
   * Keep a result locally and wake the tasks waiting on it
   */
  protected storeResult(taskId: string, result: unknown): void {
    this.localResults.set(taskId, result);
    for (const entry of this.inFlight.values()) {
      if (entry.record.dependsOn.includes(taskId)) {
        entry.dependencyResults.set(taskId, result);
      }
    }
    for (const readyId of this.tracker.resolve(taskId)) {
      this.wake(readyId);
    }
  }

  private mergeDependencyResults(
    entry: InFlightTask,
    results: Record<string, unknown> | undefined,
  ): void {
    if (!results) {
      return;
    }
    for (const [dependencyId, value] of Object.entries(results)) {
      if (!entry.record.dependsOn.includes(dependencyId)) continue;
      entry.dependencyResults.set(dependencyId, value);
      this.storeResult(dependencyId, value);
    }
  }

  private isAwaited(taskId: string): boolean {
    for (const entry of this.inFlight.values()) {
      if (entry.record.dependsOn.includes(taskId)) {
        return true;
      }
    }
    return false;
  }

  private hasDependency(entry: InFlightTask, dependencyId: string): boolean {
    if (entry.dependencyResults.has(dependencyId)) {
      return true;
    }
    if (this.localResults.has(dependencyId)) {
      entry.dependencyResults.set(dependencyId, this.localResults.get(dependencyId));
      return true;
    }
    return false;
  }

  private wake(taskId: string): void {
    const entry = this.inFlight.get(taskId);
    if (!entry || entry.record.status !== 'waiting') {
      return;
    }
    this.clearTimer(entry);
    entry.record.status = 'pending';
    this.queue.push(taskId);
    logger.debug('Task dependencies satisfied', { agent: this.name, taskId });
  }

  private clearTimer(entry: InFlightTask): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }
}
