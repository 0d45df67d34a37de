/**
 * Circuit Breaker
 *
 *   CLOSED  ──(N consecutive failures)──▶  OPEN
 *   OPEN    ──(cooldown elapsed)────────▶  HALF_OPEN
 *   HALF_OPEN ──(call succeeds)─────────▶  CLOSED
 *   HALF_OPEN ──(call fails)────────────▶  OPEN
 *
 * Guards the sports data gateway so a dead upstream does not make every
 * conversation turn wait out the full request timeout.
 *
 * Usage:
 *   const breaker = new CircuitBreaker({ name: 'dataGateway' });
 *   const body = await breaker.call(() => fetchJson(url));
 */

import { createLogger, type Logger } from './logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Name for logging. */
  name: string;
  /** Consecutive failures before the circuit opens. Default 5. */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before allowing a trial call. Default 30 000. */
  cooldownMs?: number;
  /** Injectable clock for tests. */
  now?: () => number;
}

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_COOLDOWN_MS = 30_000;

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit ${name} is open`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private openedAt = 0;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.cooldownMs = opts.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.now = opts.now ?? Date.now;
    this.logger = createLogger(`circuitBreaker:${this.name}`);
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.consecutiveFailures;
  }

  /**
   * Execute `fn` through the breaker.
   *
   * - **CLOSED** — calls pass through.
   * - **OPEN** — rejects with `CircuitOpenError` until the cooldown elapses,
   *   then lets one trial call through as HALF_OPEN.
   * - **HALF_OPEN** — trial success closes the circuit, failure re-opens it.
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.now() - this.openedAt >= this.cooldownMs) {
        this.state = 'HALF_OPEN';
        this.logger.info({}, 'transitioning to HALF_OPEN (trial call allowed)');
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    }
  }

  /** Force-close the breaker. */
  reset(): void {
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.openedAt = 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internal
  // ─────────────────────────────────────────────────────────────────────────

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.logger.info({}, 'trial call succeeded — circuit CLOSED');
    }
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
  }

  private onFailure(): void {
    this.consecutiveFailures++;

    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.state = 'OPEN';
    this.openedAt = this.now();
    this.logger.warn(
      { failures: this.consecutiveFailures, cooldownMs: this.cooldownMs },
      'circuit OPENED',
    );
  }
}
