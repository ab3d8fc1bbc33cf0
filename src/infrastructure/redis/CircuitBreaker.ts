/**
 * Circuit breaker guarding calls to the distributed cache.
 *
 * CLOSED counts failures inside a sliding monitoring window and opens at
 * the threshold. OPEN rejects every call with CircuitOpenError until the
 * recovery timeout has elapsed, then lets trial calls through as
 * HALF_OPEN. In HALF_OPEN one failure reopens the circuit and
 * `successThreshold` consecutive successes close it.
 */

export enum CircuitState {
  CLOSED = "CLOSED",
  OPEN = "OPEN",
  HALF_OPEN = "HALF_OPEN",
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  /** Milliseconds spent OPEN before a trial call is allowed */
  recoveryTimeout: number;
  successThreshold: number;
  /** Milliseconds a failure counts towards the threshold */
  monitoringWindow: number;
  name?: string;
  /** Millisecond time source, Date.now by default */
  now?: () => number;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  nextAttemptTime: number | null;
}

export class CircuitOpenError extends Error {
  constructor(
    message: string,
    public readonly metrics: CircuitBreakerMetrics,
  ) {
    super(message);
    this.name = "CircuitOpenError";
  }
}

export function createDefaultConfig(): CircuitBreakerConfig {
  return {
    failureThreshold: 5,
    recoveryTimeout: 30_000,
    successThreshold: 2,
    monitoringWindow: 60_000,
  };
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures: number[] = [];
  private trialSuccesses = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private openedAt: number | null = null;
  private readonly now: () => number;
  private readonly name: string;

  constructor(private readonly config: CircuitBreakerConfig) {
    if (config.failureThreshold < 1) {
      throw new Error("Failure threshold must be at least 1");
    }
    if (config.recoveryTimeout < 1000) {
      throw new Error("Recovery timeout must be at least 1000ms");
    }
    if (config.successThreshold < 1) {
      throw new Error("Success threshold must be at least 1");
    }
    this.now = config.now ?? Date.now;
    this.name = config.name ?? "cache";
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      state: this.state,
      failureCount: this.recentFailures(),
      successCount: this.trialSuccesses,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      nextAttemptTime: this.nextAttemptTime(),
    };
  }

  reset(): void {
    this.transition(CircuitState.CLOSED);
    this.lastFailureTime = null;
    this.lastSuccessTime = null;
  }

  private admit(): void {
    if (this.state !== CircuitState.OPEN) {
      return;
    }
    const nextAttempt = this.nextAttemptTime();
    if (nextAttempt !== null && this.now() < nextAttempt) {
      throw new CircuitOpenError(
        `Circuit breaker "${this.name}" is OPEN`,
        this.getMetrics(),
      );
    }
    this.transition(CircuitState.HALF_OPEN);
  }

  private recordSuccess(): void {
    this.lastSuccessTime = this.now();
    if (this.state !== CircuitState.HALF_OPEN) {
      return;
    }
    this.trialSuccesses++;
    if (this.trialSuccesses >= this.config.successThreshold) {
      this.transition(CircuitState.CLOSED);
    }
  }

  private recordFailure(): void {
    const at = this.now();
    this.lastFailureTime = at;
    if (this.state === CircuitState.HALF_OPEN) {
      this.transition(CircuitState.OPEN);
      return;
    }
    this.failures.push(at);
    if (this.recentFailures() >= this.config.failureThreshold) {
      this.transition(CircuitState.OPEN);
    }
  }

  private recentFailures(): number {
    const cutoff = this.now() - this.config.monitoringWindow;
    this.failures = this.failures.filter((timestamp) => timestamp > cutoff);
    return this.failures.length;
  }

  private nextAttemptTime(): number | null {
    return this.openedAt === null
      ? null
      : this.openedAt + this.config.recoveryTimeout;
  }

  private transition(next: CircuitState): void {
    this.state = next;
    this.trialSuccesses = 0;
    switch (next) {
      case CircuitState.OPEN:
        this.openedAt = this.now();
        break;
      case CircuitState.HALF_OPEN:
        break;
      case CircuitState.CLOSED:
        this.openedAt = null;
        this.failures = [];
        break;
    }
  }
}
