import { RelayHub, UnknownAgentError } from '../../src/relay/relayHub';

describe('RelayHub', () => {
  let hub: RelayHub;

  beforeEach(() => {
    hub = new RelayHub({ redeliveryTimeoutMs: 50, maxHeldPerAgent: 10 });
  });

  it('issues a fresh token on every registration', () => {
    const first = hub.register('worker');
    const second = hub.register('worker');

    expect(first.agent_id).toBe('worker');
    expect(first.token).not.toBe(second.token);
    expect(hub.authenticate(first.token)).toBe('worker');
    expect(hub.authenticate(second.token)).toBe('worker');
    expect(hub.authenticate('test-token')).toBeUndefined();
  });

  it('refuses messages for unregistered agents', () => {
    hub.register('sender');
    expect(() => hub.deliver('sender', 'ghost', { type: 'task' })).toThrow(
      UnknownAgentError,
    );
  });

  it('stamps the authenticated sender onto the message', () => {
    hub.register('worker');
    hub.deliver('coordinator', 'worker', { type: 'task', sender: 'spoofed' });

    const [delivery] = hub.claim('worker');
    expect(delivery.message).toEqual({ type: 'task', sender: 'coordinator' });
  });

  it('wakes a waiting receiver when a message arrives', async () => {
    hub.register('worker');
    const pending = hub.waitForMessages('worker', { timeoutMs: 1_000 });
    hub.deliver('coordinator', 'worker', { type: 'task', task_id: 'T1' });

    const deliveries = await pending;
    expect(deliveries).toHaveLength(1);
    expect(deliveries[0].message.task_id).toBe('T1');
  });

  it('returns an empty batch when the wait times out', async () => {
    hub.register('worker');
    await expect(hub.waitForMessages('worker', { timeoutMs: 10 })).resolves.toEqual([]);
  });

  it('redelivers an unacknowledged message to a waiting receiver', async () => {
    hub.register('worker');
    hub.deliver('coordinator', 'worker', { type: 'task' });
    const [first] = await hub.waitForMessages('worker', { timeoutMs: 10 });

    const [again] = await hub.waitForMessages('worker', { timeoutMs: 1_000 });
    expect(again.message_id).toBe(first.message_id);
  });

  it('holds nothing after acknowledgment', async () => {
    hub.register('worker');
    hub.deliver('coordinator', 'worker', { type: 'task' });
    const [delivery] = hub.claim('worker');

    expect(hub.acknowledge('worker', delivery.message_id)).toBe(true);
    expect(hub.acknowledge('worker', delivery.message_id)).toBe(false);
    expect(hub.stats()).toEqual({ agents: 1, heldMessages: 0 });
    await expect(hub.waitForMessages('worker', { timeoutMs: 80 })).resolves.toEqual([]);
  });
});
