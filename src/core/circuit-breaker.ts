import type { Logger } from '../types/logger.js';
import { TimeoutError } from './errors.js';

/**
 * Circuit breaker states.
 */
export enum CircuitState {
  /** Calls pass through */
  CLOSED = 'CLOSED',
  /** Calls are rejected without reaching the remote side */
  OPEN = 'OPEN',
  /** One probe call is allowed to test recovery */
  HALF_OPEN = 'HALF_OPEN',
}

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /** Consecutive failures before the circuit opens */
  maxFailures: number;
  /** Time in ms the circuit stays open before a probe */
  resetTimeout: number;
  /** Per-call timeout in ms */
  timeout: number;
  /** Name used in logs and errors */
  name?: string;
  logger?: Logger;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  maxFailures: 3,
  resetTimeout: 30_000,
  timeout: 10_000,
};

/**
 * Snapshot of breaker health.
 */
export interface CircuitStats {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
}

/**
 * Thrown when a call is attempted while the circuit is open.
 */
export class CircuitOpenError extends Error {
  readonly circuit: string;

  constructor(name: string) {
    super(`Circuit breaker "${name}" is open`);
    this.name = 'CircuitOpenError';
    this.circuit = name;
  }
}

/**
 * Reject `promise` with TimeoutError if it does not settle within `ms`.
 * The timer is cleared either way so it never holds the process open.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, operation?: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(ms, operation));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Circuit breaker for outbound calls (news providers, Telegram API).
 *
 * CLOSED -> OPEN after maxFailures consecutive failures.
 * OPEN -> HALF_OPEN once resetTimeout has elapsed.
 * HALF_OPEN -> CLOSED on a successful probe, back to OPEN on a failed one.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;
  private readonly name: string;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.name = this.config.name ?? 'unnamed';
  }

  getState(): CircuitState {
    if (this.state === CircuitState.OPEN && this.resetDue()) {
      this.state = CircuitState.HALF_OPEN;
      this.log('info', 'Circuit half-open, allowing probe');
    }
    return this.state;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.getState() === CircuitState.OPEN) {
      this.log('warn', 'Call rejected, circuit is open');
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await withTimeout(operation(), this.config.timeout, this.name);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.lastFailureTime = null;
  }

  getStats(): CircuitStats {
    return {
      state: this.getState(),
      failures: this.failures,
      lastFailureTime: this.lastFailureTime,
    };
  }

  private resetDue(): boolean {
    if (this.lastFailureTime === null) {
      return false;
    }
    return Date.now() - this.lastFailureTime >= this.config.resetTimeout;
  }

  private onSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.log('info', 'Probe succeeded, closing circuit');
    }
    this.state = CircuitState.CLOSED;
    this.failures = 0;
    this.lastFailureTime = null;
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.OPEN;
      this.log('warn', 'Probe failed, reopening circuit');
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.config.maxFailures) {
      this.state = CircuitState.OPEN;
      this.log('warn', `Opening circuit after ${String(this.failures)} failures`);
    }
  }

  private log(level: 'info' | 'warn', message: string): void {
    this.config.logger?.[level]({ circuit: this.name, state: this.state }, message);
  }
}

export function createCircuitBreaker(config: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
  return new CircuitBreaker(config);
}
