export type TransportErrorCode =
  | 'ConnectionFailed'
  | 'Unreachable'
  | 'Timeout'
  | 'NotRegistered';

export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: TransportErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Relay cannot be reached: connection refused, timeout, malformed response
 */
export class TransportUnavailableError extends TransportError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    code: 'ConnectionFailed' | 'Timeout' = 'ConnectionFailed',
  ) {
    super(code, message, details);
    this.name = 'TransportUnavailableError';
  }
}

/**
 * Target agent is not registered or its inbox is full
 */
export class AgentUnreachableError extends TransportError {
  readonly target: string;

  constructor(target: string, message: string) {
    super('Unreachable', message, { target });
    this.name = 'AgentUnreachableError';
    this.target = target;
  }
}

export class NotRegisteredError extends TransportError {
  constructor(operation: string) {
    super('NotRegistered', `Transport must be registered before ${operation}`);
    this.name = 'NotRegisteredError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
