/**
 * HealthService - HTTP liveness probe
 *
 * One bounded GET against the stack's health endpoint. Connection
 * failure, timeout and non-2xx are all reported as unhealthy; the
 * probe itself never throws.
 */

import { errorCause, errorCode, errorField, type HealthProbeResult } from '@stackwright/shared';

export interface HealthProbe {
  readonly url: string;
  probe(signal?: AbortSignal): Promise<HealthProbeResult>;
}

export interface HttpHealthProbeOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class HttpHealthProbe implements HealthProbe {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpHealthProbeOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async probe(signal?: AbortSignal): Promise<HealthProbeResult> {
    const startTime = Date.now();
    const timeout = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'GET',
        signal: signal ? anySignal([signal, timeout]) : timeout,
      });
      // Drain the body so the socket is released
      await response.arrayBuffer().catch(() => undefined);

      return {
        healthy: response.ok,
        url: this.url,
        statusCode: response.status,
        error: response.ok ? undefined : `HTTP ${response.status}`,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      return {
        healthy: false,
        url: this.url,
        error: describeFetchError(error, this.timeoutMs),
        duration: Date.now() - startTime,
      };
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function describeFetchError(error: unknown, timeoutMs: number): string {
  const name = errorField(error, 'name');
  if (name === 'TimeoutError') return `Timed out after ${timeoutMs}ms`;
  if (name === 'AbortError') return 'Aborted';

  // undici wraps the socket error: "fetch failed" { cause: ECONNREFUSED }
  const cause = errorCause(error);
  const detail = errorField(cause, 'message') || errorCode(cause);
  if (detail) return detail;

  return errorField(error, 'message') ?? String(error);
}

/** AbortSignal.any needs Node 20.3+. */
function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}
