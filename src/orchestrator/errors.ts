/**
 * Task graph rejected before anything was sent
 */
export class GraphValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid task graph: ${issues.join('; ')}`);
    this.name = 'GraphValidationError';
    this.issues = issues;
  }
}

export class WaitTimeoutError extends Error {
  readonly pending: string[];
  readonly timeoutMs: number;

  constructor(pending: string[], timeoutMs: number) {
    super(
      `Timed out after ${timeoutMs}ms waiting for tasks: ${pending.join(', ')}`,
    );
    this.name = 'WaitTimeoutError';
    this.pending = pending;
    this.timeoutMs = timeoutMs;
  }
}
