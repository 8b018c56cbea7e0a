/**
 * Bounded health-check polling.
 *
 * The poll loop is a small state machine:
 *
 *   attempting -> healthy
 *   attempting -> exhausted            (attempt == maxAttempts)
 *   attempting -> retrying -> attempting
 *
 * Exhaustion is decided in `attempting`, so the sleep in `retrying` is
 * only ever reached when another attempt follows it: a fully failing
 * poll makes maxAttempts probes and maxAttempts - 1 sleeps.
 */

import { Environment } from '../domain/environment';
import { Logger, createLogger } from '../logger';
import { sleep as defaultSleep } from './step-runner';

export interface HealthCheckPolicy {
  maxAttempts: number;
  intervalMs: number;
  /** Per-probe timeout. */
  timeoutMs: number;
}

export const DEFAULT_HEALTH_CHECK_POLICY: Readonly<HealthCheckPolicy> = {
  maxAttempts: 10,
  intervalMs: 10_000,
  timeoutMs: 5_000,
};

/** Result of one probe. A transport failure has no status code. */
export interface ProbeResult {
  statusCode?: number;
  error?: string;
}

export type HealthProbe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

export type HealthCheckResult =
  | { status: 'healthy'; attempts: number; url: string }
  | { status: 'unhealthy'; attempts: number; url: string; lastStatusCode?: number; lastError?: string };

type PollState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'retrying'; attempt: number; last: ProbeResult }
  | { kind: 'healthy'; attempt: number }
  | { kind: 'exhausted'; attempt: number; last: ProbeResult };

/**
 * Exactly one GET. Redirects are not followed, so a 3xx is reported as
 * its own status and counts as a failed attempt.
 */
export const httpProbe: HealthProbe = async (url, timeoutMs) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { method: 'GET', redirect: 'manual', signal: controller.signal });
    await response.body?.cancel();
    return { statusCode: response.status };
  } catch (err) {
    if (controller.signal.aborted) {
      return { error: `timed out after ${timeoutMs}ms` };
    }
    return { error: err instanceof Error ? err.message : String(err) };
  } finally {
    clearTimeout(timeout);
  }
};

export interface HealthCheckerOptions {
  probe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class HealthChecker {
  private probe: HealthProbe;
  private sleep: (ms: number) => Promise<void>;
  private log: Logger;

  constructor(
    private urls: Record<Environment, string>,
    options: HealthCheckerOptions = {},
  ) {
    this.probe = options.probe ?? httpProbe;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger({ component: 'health-checker' });
  }

  urlFor(environment: Environment): string {
    return this.urls[environment];
  }

  /** A single probe with no retries, as used by status queries. */
  async probeOnce(environment: Environment, timeoutMs: number): Promise<ProbeResult & { healthy: boolean }> {
    const result = await this.safeProbe(this.urlFor(environment), timeoutMs);
    return { ...result, healthy: result.statusCode === 200 };
  }

  async poll(environment: Environment, policy: HealthCheckPolicy): Promise<HealthCheckResult> {
    const url = this.urlFor(environment);
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
    let state: PollState = { kind: 'attempting', attempt: 1 };

    for (;;) {
      switch (state.kind) {
        case 'attempting': {
          this.log.info('health check attempt', { environment, attempt: state.attempt, maxAttempts });
          const result = await this.safeProbe(url, policy.timeoutMs);
          if (result.statusCode === 200) {
            state = { kind: 'healthy', attempt: state.attempt };
          } else if (state.attempt >= maxAttempts) {
            state = { kind: 'exhausted', attempt: state.attempt, last: result };
          } else {
            state = { kind: 'retrying', attempt: state.attempt, last: result };
          }
          break;
        }
        case 'retrying':
          this.log.warn('health check failed, retrying', {
            environment,
            attempt: state.attempt,
            statusCode: state.last.statusCode,
            error: state.last.error,
            retryInMs: policy.intervalMs,
          });
          await this.sleep(policy.intervalMs);
          state = { kind: 'attempting', attempt: state.attempt + 1 };
          break;
        case 'healthy':
          this.log.info('health check passed', { environment, attempts: state.attempt });
          return { status: 'healthy', attempts: state.attempt, url };
        case 'exhausted':
          this.log.error('health check exhausted', { environment, attempts: state.attempt });
          return {
            status: 'unhealthy',
            attempts: state.attempt,
            url,
            lastStatusCode: state.last.statusCode,
            lastError: state.last.error,
          };
      }
    }
  }

  private async safeProbe(url: string, timeoutMs: number): Promise<ProbeResult> {
    try {
      return await this.probe(url, timeoutMs);
    } catch (err) {
      return { error: err instanceof Error ? err.message : String(err) };
    }
  }
}
