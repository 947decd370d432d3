import { parseMessage } from '../../src/types/messageTypes';

describe('parseMessage', () => {
  it('parses a task and fills in defaults', () => {
    const parsed = parseMessage({ type: 'task', task_id: 'T1', description: 'X' });
    expect(parsed).toEqual({
      kind: 'message',
      message: { type: 'task', task_id: 'T1', description: 'X', depends_on: [] },
    });
  });

  it('drops repeated prerequisites while keeping their order', () => {
    const parsed = parseMessage({
      type: 'task',
      task_id: 'T2',
      description: 'Y',
      depends_on: ['B', 'A', 'B'],
    });
    expect(parsed.kind).toBe('message');
    if (parsed.kind === 'message' && parsed.message.type === 'task') {
      expect(parsed.message.depends_on).toEqual(['B', 'A']);
    }
  });

  it('normalizes a missing result to null', () => {
    const parsed = parseMessage({ type: 'task_result', task_id: 'T1' });
    expect(parsed).toEqual({
      kind: 'message',
      message: { type: 'task_result', task_id: 'T1', result: null },
    });
  });

  it('keeps structured results as they are', () => {
    const parsed = parseMessage({
      type: 'task_result',
      task_id: 'T1',
      result: { items: [1, 2] },
      sender: 'worker',
    });
    expect(parsed).toEqual({
      kind: 'message',
      message: {
        type: 'task_result',
        task_id: 'T1',
        result: { items: [1, 2] },
        sender: 'worker',
      },
    });
  });

  it('parses registration and get_result messages', () => {
    expect(parseMessage({ type: 'registration', agent_id: 'writer' })).toEqual({
      kind: 'message',
      message: { type: 'registration', agent_id: 'writer', capabilities: [] },
    });
    expect(
      parseMessage({ type: 'get_result', task_id: 'A', reply_to: 'writer' }),
    ).toEqual({
      kind: 'message',
      message: { type: 'get_result', task_id: 'A', reply_to: 'writer' },
    });
  });

  it('reports unknown message types separately', () => {
    expect(parseMessage({ type: 'ping' })).toEqual({
      kind: 'unknown_type',
      type: 'ping',
    });
  });

  it.each([['a string'], [42], [null], [['task']]])(
    'rejects %p as not a JSON object',
    (raw) => {
      expect(parseMessage(raw)).toEqual({
        kind: 'malformed',
        reason: 'Message is not a JSON object',
      });
    },
  );

  it('rejects a payload without a type', () => {
    expect(parseMessage({ task_id: 'T1' })).toEqual({
      kind: 'malformed',
      reason: 'Message has no type',
    });
  });

  it('names the missing field of a known type', () => {
    expect(parseMessage({ type: 'task', description: 'X' })).toEqual({
      kind: 'malformed',
      reason: 'task_id: Required',
    });
  });

  it('rejects a blank task id', () => {
    const parsed = parseMessage({ type: 'task', task_id: '  ', description: 'X' });
    expect(parsed.kind).toBe('malformed');
  });
});
