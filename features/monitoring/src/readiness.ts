/**
 * Readiness strategies
 *
 * Decide when a freshly started stack is worth probing. Neither strategy
 * fails the run: reaching the deadline simply hands over to the final
 * health probe, which makes the success/failure call.
 */

import { sleep as defaultSleep, type HealthProbeResult, type Sleep } from '@stackwright/shared';
import type { HealthProbe } from './health.service.js';

export interface ReadinessReport {
  mode: 'fixed' | 'poll';
  ready: boolean;
  attempts: number;
  waitedMs: number;
  lastResult?: HealthProbeResult;
}

export interface ReadinessStrategy {
  readonly mode: 'fixed' | 'poll';
  wait(signal?: AbortSignal): Promise<ReadinessReport>;
}

// ============================================================================
// Fixed delay
// ============================================================================

/** Blind wait: sleep for a fixed duration, then assume the stack had time to start. */
export class FixedDelayReadiness implements ReadinessStrategy {
  readonly mode = 'fixed';

  constructor(
    private readonly delayMs: number,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async wait(signal?: AbortSignal): Promise<ReadinessReport> {
    await this.sleep(this.delayMs, signal);
    return { mode: this.mode, ready: true, attempts: 0, waitedMs: this.delayMs };
  }
}

// ============================================================================
// Poll until ready
// ============================================================================

export interface PollingReadinessOptions {
  timeoutMs: number;
  initialIntervalMs: number;
  maxIntervalMs: number;
  factor?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Probe repeatedly with geometric backoff until healthy or the deadline passes.
 */
export class PollingReadiness implements ReadinessStrategy {
  readonly mode = 'poll';
  private readonly factor: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly probe: HealthProbe,
    private readonly options: PollingReadinessOptions,
  ) {
    this.factor = options.factor ?? 2;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async wait(signal?: AbortSignal): Promise<ReadinessReport> {
    const start = this.now();
    const deadline = start + this.options.timeoutMs;
    let interval = this.options.initialIntervalMs;
    let attempts = 0;
    let lastResult: HealthProbeResult | undefined;

    for (;;) {
      attempts++;
      lastResult = await this.probe.probe(signal);
      if (lastResult.healthy) {
        return { mode: this.mode, ready: true, attempts, waitedMs: this.now() - start, lastResult };
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return { mode: this.mode, ready: false, attempts, waitedMs: this.now() - start, lastResult };
      }

      await this.sleep(Math.min(interval, remaining), signal);
      interval = Math.min(interval * this.factor, this.options.maxIntervalMs);
    }
  }
}
