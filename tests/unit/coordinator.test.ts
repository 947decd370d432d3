import {
  Coordinator,
  GraphValidationError,
  WaitTimeoutError,
} from '../../src/orchestrator';
import { RelayHub } from '../../src/relay/relayHub';
import { InMemoryTransport } from '../../src/transport/inMemoryTransport';
import { nextMessage, waitFor } from '../helpers/async';

const settings = {
  receiveTimeoutMs: 20,
  retryBackoffMs: 10,
  sendMaxAttempts: 0,
};

describe('Coordinator', () => {
  let hub: RelayHub;
  let coordinator: Coordinator;
  let researcher: InMemoryTransport;
  let writer: InMemoryTransport;

  beforeEach(async () => {
    hub = new RelayHub({ redeliveryTimeoutMs: 60_000, maxHeldPerAgent: 100 });
    researcher = new InMemoryTransport(hub);
    writer = new InMemoryTransport(hub);
    await researcher.register('researcher');
    await writer.register('writer');
    coordinator = new Coordinator({
      name: 'coordinator',
      transport: new InMemoryTransport(hub),
      settings,
    });
    await coordinator.start();
  });

  afterEach(async () => {
    await coordinator.stop();
    await researcher.close();
    await writer.close();
  });

  describe('submitTask validation', () => {
    it('rejects duplicate task ids', async () => {
      await expect(
        coordinator.submitTask({
          steps: [
            { task_id: 'A', agent: 'researcher', description: 'X' },
            { task_id: 'A', agent: 'writer', description: 'Y' },
          ],
        }),
      ).rejects.toMatchObject({ issues: ['Duplicate task id A'] });
    });

    it('rejects prerequisites that are not part of any graph', async () => {
      await expect(
        coordinator.submitTask({
          steps: [
            { task_id: 'B', agent: 'writer', description: 'Y', depends_on: ['missing'] },
          ],
        }),
      ).rejects.toMatchObject({
        issues: ['Task B depends on unknown task missing'],
      });
    });

    it('rejects cycles', async () => {
      const submission = coordinator.submitTask({
        steps: [
          { task_id: 'A', agent: 'researcher', description: 'X', depends_on: ['B'] },
          { task_id: 'B', agent: 'writer', description: 'Y', depends_on: ['A'] },
        ],
      });
      await expect(submission).rejects.toBeInstanceOf(GraphValidationError);
      await expect(submission).rejects.toMatchObject({
        issues: ['Dependency cycle: A -> B -> A'],
      });
    });

    it('rejects an empty graph', async () => {
      await expect(coordinator.submitTask({ steps: [] })).rejects.toThrow(
        GraphValidationError,
      );
    });

    it('rejects a task id submitted again with a different definition', async () => {
      await coordinator.submitTask({
        steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
      });
      await expect(
        coordinator.submitTask({
          steps: [{ task_id: 'A', agent: 'writer', description: 'X' }],
        }),
      ).rejects.toMatchObject({
        issues: ['Task A was already submitted with a different definition'],
      });
      expect(coordinator.getTaskRecord('A')?.agent).toBe('researcher');
    });

    it('sends nothing when the graph is invalid', async () => {
      await expect(
        coordinator.submitTask({
          steps: [
            { task_id: 'A', agent: 'researcher', description: 'X', depends_on: ['A'] },
          ],
        }),
      ).rejects.toThrow('Dependency cycle: A -> A');
      expect(hub.stats().heldMessages).toBe(0);
    });
  });

  it('sends every step immediately with the coordinator as reply target', async () => {
    const ids = await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X' },
        { task_id: 'B', agent: 'writer', description: 'Y', depends_on: ['A'] },
      ],
    });

    expect(ids).toEqual(['A', 'B']);
    await expect(nextMessage(researcher, 'researcher')).resolves.toEqual({
      type: 'task',
      task_id: 'A',
      description: 'X',
      depends_on: [],
      reply_to: 'coordinator',
      sender: 'coordinator',
    });
    await expect(nextMessage(writer, 'writer')).resolves.toEqual({
      type: 'task',
      task_id: 'B',
      description: 'Y',
      depends_on: ['A'],
      reply_to: 'coordinator',
      sender: 'coordinator',
    });
    expect(coordinator.getTaskRecord('B')).toMatchObject({
      agent: 'writer',
      status: 'pending',
      replyTo: 'coordinator',
    });
  });

  it('collects a result for a step-level reply target and passes a copy on', async () => {
    await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X', reply_to: 'writer' },
      ],
    });
    await expect(nextMessage(researcher, 'researcher')).resolves.toMatchObject({
      task_id: 'A',
      reply_to: 'coordinator',
    });
    expect(coordinator.getTaskRecord('A')?.replyTo).toBe('writer');

    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });

    await expect(nextMessage(writer, 'writer')).resolves.toEqual({
      type: 'task_result',
      task_id: 'A',
      result: 'resA',
      sender: 'coordinator',
    });
    await expect(
      coordinator.waitForCompletion({ pollIntervalMs: 5, timeoutMs: 500 }),
    ).resolves.toEqual({ A: 'resA' });
  });

  it('forwards a dependent with results once its prerequisites are in', async () => {
    await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X' },
        { task_id: 'B', agent: 'writer', description: 'Y', depends_on: ['A'] },
      ],
    });
    await nextMessage(researcher, 'researcher');
    await nextMessage(writer, 'writer');

    await researcher.send('coordinator', {
      type: 'task_result',
      task_id: 'A',
      result: 'resA',
    });

    await expect(nextMessage(writer, 'writer')).resolves.toEqual({
      type: 'task',
      task_id: 'B',
      description: 'Y',
      depends_on: ['A'],
      reply_to: 'coordinator',
      dependency_results: { A: 'resA' },
      sender: 'coordinator',
    });
    expect(coordinator.getTaskRecord('A')).toMatchObject({
      status: 'completed',
      result: 'resA',
      sender: 'researcher',
    });
  });

  it('parks a lookup for an unknown result and answers it on arrival', async () => {
    await coordinator.submitTask({
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    });
    await nextMessage(researcher, 'researcher');

    await writer.send('coordinator', {
      type: 'get_result',
      task_id: 'A',
      reply_to: 'writer',
    });
    await expect(writer.receive(50)).resolves.toBeNull();

    await researcher.send('coordinator', {
      type: 'task_result',
      task_id: 'A',
      result: { score: 3 },
    });
    await expect(nextMessage(writer, 'writer')).resolves.toEqual({
      type: 'task_result',
      task_id: 'A',
      result: { score: 3 },
      sender: 'coordinator',
    });
  });

  it('does not park a lookup for a task it never submitted', async () => {
    await writer.send('coordinator', {
      type: 'get_result',
      task_id: 'A',
      reply_to: 'writer',
    });
    await waitFor(() => hub.store.heldCount('coordinator') === 0);

    await coordinator.submitTask({
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });
    await waitFor(() => coordinator.getResults().A === 'resA');

    await expect(writer.receive(50)).resolves.toBeNull();
  });

  it('answers a lookup for a known result straight away', async () => {
    await coordinator.submitTask({
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    });
    await researcher.send('coordinator', {
      type: 'task_result',
      task_id: 'A',
      result: 'Error: boom',
      error: 'boom',
    });
    await waitFor(() => coordinator.getTaskRecord('A')?.status === 'failed');

    await writer.send('coordinator', {
      type: 'get_result',
      task_id: 'A',
      reply_to: 'writer',
    });
    await expect(nextMessage(writer, 'writer')).resolves.toEqual({
      type: 'task_result',
      task_id: 'A',
      result: 'Error: boom',
      error: 'boom',
      sender: 'coordinator',
    });
  });

  it('keeps the first result when a task reports twice', async () => {
    await coordinator.submitTask({
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'first' });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'second' });

    await waitFor(() => hub.store.heldCount('coordinator') === 0);
    expect(coordinator.getResults()).toEqual({ A: 'first' });
  });

  it('aggregates results of every submitted task', async () => {
    await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X' },
        { task_id: 'B', agent: 'writer', description: 'Y', depends_on: ['A'] },
      ],
    });
    const done = coordinator.waitForCompletion({ pollIntervalMs: 5 });

    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });
    await writer.send('coordinator', { type: 'task_result', task_id: 'B', result: 'resB' });

    await expect(done).resolves.toEqual({ A: 'resA', B: 'resB' });
  });

  it('rejects with the pending ids when the wait times out', async () => {
    await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X' },
        { task_id: 'B', agent: 'writer', description: 'Y' },
      ],
    });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });
    await waitFor(() => coordinator.getResults().A === 'resA');

    const wait = coordinator.waitForCompletion({ pollIntervalMs: 5, timeoutMs: 40 });
    await expect(wait).rejects.toBeInstanceOf(WaitTimeoutError);
    await expect(wait).rejects.toMatchObject({ pending: ['B'], timeoutMs: 40 });
  });

  it('waits only for the requested task ids', async () => {
    await coordinator.submitTask({
      steps: [
        { task_id: 'A', agent: 'researcher', description: 'X' },
        { task_id: 'B', agent: 'writer', description: 'Y' },
      ],
    });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });

    await expect(
      coordinator.waitForCompletion({ pollIntervalMs: 5, taskIds: ['A'] }),
    ).resolves.toEqual({ A: 'resA' });
  });

  it('sends a task again when the same graph is submitted twice', async () => {
    const graph = {
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    };
    await coordinator.submitTask(graph);
    await coordinator.submitTask(graph);

    await expect(nextMessage(researcher, 'researcher')).resolves.toMatchObject({ task_id: 'A' });
    await expect(nextMessage(researcher, 'researcher')).resolves.toMatchObject({ task_id: 'A' });
    expect(coordinator.getTaskRecord('A')?.status).toBe('pending');
  });

  it('accepts prerequisites from an earlier submission', async () => {
    await coordinator.submitTask({
      steps: [{ task_id: 'A', agent: 'researcher', description: 'X' }],
    });
    await researcher.send('coordinator', { type: 'task_result', task_id: 'A', result: 'resA' });
    await waitFor(() => coordinator.getResults().A === 'resA');
    await nextMessage(researcher, 'researcher');

    await coordinator.submitTask({
      steps: [{ task_id: 'C', agent: 'writer', description: 'Z', depends_on: ['A'] }],
    });
    await expect(nextMessage(writer, 'writer')).resolves.toMatchObject({
      task_id: 'C',
      dependency_results: { A: 'resA' },
    });
  });

  it('tracks agents that announce themselves', async () => {
    await writer.send('coordinator', {
      type: 'registration',
      agent_id: 'writer',
      capabilities: ['drafting'],
    });
    await waitFor(() => coordinator.getConnectedAgents().length === 1);
    expect(coordinator.getConnectedAgents()[0]).toMatchObject({
      agentId: 'writer',
      capabilities: ['drafting'],
    });
  });
});
