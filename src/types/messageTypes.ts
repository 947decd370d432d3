/**
 * Wire messages exchanged between agents through the relay
 *
 * Keys are snake_case on the wire. Every inbound payload goes through
 * `parseMessage` before a runtime looks at it.
 */

import { z } from 'zod';

const taskIdSchema = z.string().trim().min(1);
const agentNameSchema = z.string().trim().min(1);

export const TaskMessageSchema = z.object({
  type: z.literal('task'),
  task_id: taskIdSchema,
  description: z.string().min(1),
  depends_on: z
    .array(taskIdSchema)
    .default([])
    .transform((ids) => Array.from(new Set(ids))),
  reply_to: agentNameSchema.optional(),
  sender: z.string().optional(),
  dependency_results: z.record(z.unknown()).optional(),
});

export const TaskResultMessageSchema = z.object({
  type: z.literal('task_result'),
  task_id: taskIdSchema,
  result: z.unknown().transform((value) => (value === undefined ? null : value)),
  error: z.string().optional(),
  sender: z.string().optional(),
});

export const RegistrationMessageSchema = z.object({
  type: z.literal('registration'),
  agent_id: agentNameSchema,
  name: z.string().optional(),
  capabilities: z.array(z.string()).default([]),
  sender: z.string().optional(),
});

export const GetResultMessageSchema = z.object({
  type: z.literal('get_result'),
  task_id: taskIdSchema,
  reply_to: agentNameSchema,
  sender: z.string().optional(),
});

export const McpMessageSchema = z.discriminatedUnion('type', [
  TaskMessageSchema,
  TaskResultMessageSchema,
  RegistrationMessageSchema,
  GetResultMessageSchema,
]);

export type TaskMessage = z.infer<typeof TaskMessageSchema>;
export type TaskResultMessage = z.infer<typeof TaskResultMessageSchema>;
export type RegistrationMessage = z.infer<typeof RegistrationMessageSchema>;
export type GetResultMessage = z.infer<typeof GetResultMessageSchema>;
export type McpMessage = z.infer<typeof McpMessageSchema>;

/** Shape a sender builds; defaults are filled in on parse */
export type OutboundMessage = z.input<typeof McpMessageSchema>;

export type McpMessageType = McpMessage['type'];

export const MESSAGE_TYPES: readonly McpMessageType[] = [
  'task',
  'task_result',
  'registration',
  'get_result',
];

export type ParsedMessage =
  | { kind: 'message'; message: McpMessage }
  | { kind: 'unknown_type'; type: string }
  | { kind: 'malformed'; reason: string };

function isMessageType(value: string): value is McpMessageType {
  return (MESSAGE_TYPES as readonly string[]).includes(value);
}

/**
 * Classify a raw payload as a known message, an unknown message type, or
 * malformed input
 */
export function parseMessage(raw: unknown): ParsedMessage {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { kind: 'malformed', reason: 'Message is not a JSON object' };
  }

  const type: unknown = Reflect.get(raw, 'type');
  if (typeof type !== 'string' || type.length === 0) {
    return { kind: 'malformed', reason: 'Message has no type' };
  }
  if (!isMessageType(type)) {
    return { kind: 'unknown_type', type };
  }

  const parsed = McpMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`)
      .join('; ');
    return { kind: 'malformed', reason };
  }
  return { kind: 'message', message: parsed.data };
}

/** Delivery envelope as the relay hands it to a consumer */
export interface Delivery {
  messageId: string;
  body: unknown;
}
