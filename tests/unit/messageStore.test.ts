import { InboxFullError, MessageStore } from '../../src/relay/messageStore';

describe('MessageStore', () => {
  let clock: number;
  let store: MessageStore;

  beforeEach(() => {
    clock = 0;
    store = new MessageStore({
      redeliveryTimeoutMs: 1_000,
      maxHeldPerAgent: 3,
      now: () => clock,
    });
  });

  it('claims held messages in arrival order', () => {
    const first = store.push('worker', { type: 'task', n: 1 });
    const second = store.push('worker', { type: 'task', n: 2 });

    const claimed = store.claim('worker');
    expect(claimed.map((message) => message.id)).toEqual([first.id, second.id]);
    expect(claimed[0].deliveryCount).toBe(1);
  });

  it('respects the claim limit', () => {
    store.push('worker', { n: 1 });
    store.push('worker', { n: 2 });
    expect(store.claim('worker', 1)).toHaveLength(1);
    expect(store.claim('worker', 1)).toHaveLength(1);
    expect(store.claim('worker', 1)).toHaveLength(0);
  });

  it('redelivers an unacknowledged message after the timeout', () => {
    const held = store.push('worker', { n: 1 });
    store.claim('worker');

    clock = 999;
    expect(store.claim('worker')).toEqual([]);
    expect(store.nextRedeliveryIn('worker')).toBe(1);

    clock = 1_000;
    const again = store.claim('worker');
    expect(again.map((message) => message.id)).toEqual([held.id]);
    expect(again[0].deliveryCount).toBe(2);
  });

  it('stops delivering once acknowledged', () => {
    const held = store.push('worker', { n: 1 });
    store.claim('worker');

    expect(store.acknowledge('worker', held.id)).toBe(true);
    expect(store.acknowledge('worker', held.id)).toBe(false);

    clock = 5_000;
    expect(store.claim('worker')).toEqual([]);
    expect(store.heldCount('worker')).toBe(0);
  });

  it('does not let one agent acknowledge another agent\'s message', () => {
    const held = store.push('worker', { n: 1 });
    expect(store.acknowledge('other', held.id)).toBe(false);
    expect(store.heldCount('worker')).toBe(1);
  });

  it('rejects new messages once the inbox is full', () => {
    store.push('worker', { n: 1 });
    store.push('worker', { n: 2 });
    store.push('worker', { n: 3 });
    expect(() => store.push('worker', { n: 4 })).toThrow(InboxFullError);
    expect(store.totalHeld).toBe(3);
  });

  it('reports no pending redelivery when nothing is in flight', () => {
    expect(store.nextRedeliveryIn('worker')).toBeNull();
    store.push('worker', { n: 1 });
    expect(store.nextRedeliveryIn('worker')).toBeNull();
  });
});
