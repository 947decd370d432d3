/**
 * Centralized relay, transport and runtime configuration
 *
 * Every setting has a default so agents and the relay start with an empty
 * environment. Entry points load `.env` through dotenv before reading these.
 */

export type TransportMode = 'sse' | 'poll';

export interface RelaySettings {
  port: number;
  redeliveryTimeoutMs: number;
  maxHeldPerAgent: number;
  keepAliveMs: number;
  maxPollWaitMs: number;
}

export interface TransportSettings {
  relayUrl: string;
  mode: TransportMode;
  requestTimeoutMs: number;
}

export interface RuntimeSettings {
  receiveTimeoutMs: number;
  retryBackoffMs: number;
  /** 0 retries a send until the runtime stops */
  sendMaxAttempts: number;
  /** 0 lets a task wait for its prerequisites indefinitely */
  dependencyTimeoutMs: number;
  completedTaskTtlMs: number;
  completedTaskMax: number;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_RELAY_SETTINGS: RelaySettings = {
  port: 8000,
  redeliveryTimeoutMs: 30_000,
  maxHeldPerAgent: 1000,
  keepAliveMs: 15_000,
  maxPollWaitMs: 30_000,
};

export const DEFAULT_TRANSPORT_SETTINGS: TransportSettings = {
  relayUrl: 'http://localhost:8000',
  mode: 'sse',
  requestTimeoutMs: 10_000,
};

export const DEFAULT_RUNTIME_SETTINGS: RuntimeSettings = {
  receiveTimeoutMs: 5000,
  retryBackoffMs: 1000,
  sendMaxAttempts: 0,
  dependencyTimeoutMs: 0,
  completedTaskTtlMs: 60 * 60 * 1000,
  completedTaskMax: 10_000,
};

export const DEFAULT_COORDINATOR_NAME = 'coordinator';

/**
 * Read a non-negative integer, falling back when unset or invalid
 */
export function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
}

export function loadRelaySettings(env: Env = process.env): RelaySettings {
  return {
    port: readNumber(env, 'PORT', DEFAULT_RELAY_SETTINGS.port),
    redeliveryTimeoutMs: readNumber(
      env,
      'RELAY_REDELIVERY_TIMEOUT_MS',
      DEFAULT_RELAY_SETTINGS.redeliveryTimeoutMs,
    ),
    maxHeldPerAgent: readNumber(
      env,
      'RELAY_MAX_HELD_PER_AGENT',
      DEFAULT_RELAY_SETTINGS.maxHeldPerAgent,
    ),
    keepAliveMs: readNumber(
      env,
      'RELAY_KEEPALIVE_MS',
      DEFAULT_RELAY_SETTINGS.keepAliveMs,
    ),
    maxPollWaitMs: DEFAULT_RELAY_SETTINGS.maxPollWaitMs,
  };
}

export function loadTransportSettings(
  env: Env = process.env,
): TransportSettings {
  return {
    relayUrl: env.RELAY_URL || DEFAULT_TRANSPORT_SETTINGS.relayUrl,
    mode: env.TRANSPORT_MODE === 'poll' ? 'poll' : 'sse',
    requestTimeoutMs: readNumber(
      env,
      'TRANSPORT_REQUEST_TIMEOUT_MS',
      DEFAULT_TRANSPORT_SETTINGS.requestTimeoutMs,
    ),
  };
}

export function loadRuntimeSettings(env: Env = process.env): RuntimeSettings {
  const d = DEFAULT_RUNTIME_SETTINGS;
  return {
    receiveTimeoutMs: readNumber(env, 'RECEIVE_TIMEOUT_MS', d.receiveTimeoutMs),
    retryBackoffMs: readNumber(env, 'RETRY_BACKOFF_MS', d.retryBackoffMs),
    sendMaxAttempts: readNumber(env, 'SEND_MAX_ATTEMPTS', d.sendMaxAttempts),
    dependencyTimeoutMs: readNumber(
      env,
      'DEPENDENCY_TIMEOUT_MS',
      d.dependencyTimeoutMs,
    ),
    completedTaskTtlMs: readNumber(
      env,
      'COMPLETED_TASK_TTL_MS',
      d.completedTaskTtlMs,
    ),
    completedTaskMax: readNumber(env, 'COMPLETED_TASK_MAX', d.completedTaskMax),
  };
}

export function getCoordinatorName(env: Env = process.env): string {
  return env.COORDINATOR_NAME || DEFAULT_COORDINATOR_NAME;
}
