import { HealthStatus } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { HttpClient, isSuccessStatus } from '../http/https-client';

export type HealthProbe = () => Promise<HealthStatus>;

export interface WaitOptions {
  intervalMs: number;
  maxDurationMs: number;
  clock?: Clock;
  /** Called after every probe with the observed status and elapsed time */
  onProbe?: (status: HealthStatus, elapsedMs: number) => void;
}

/**
 * Polls `probe` every `intervalMs` until it reports healthy. Once
 * `maxDurationMs` has elapsed the last observed status is returned instead;
 * the caller decides whether that is fatal.
 */
export async function waitUntilHealthy(probe: HealthProbe, options: WaitOptions): Promise<HealthStatus> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let status: HealthStatus = 'unknown';

  for (;;) {
    status = await probe();
    const elapsed = clock.now() - startedAt;
    options.onProbe?.(status, elapsed);

    if (status === 'healthy') {
      return status;
    }
    if (elapsed >= options.maxDurationMs) {
      return status;
    }

    await clock.sleep(Math.min(options.intervalMs, options.maxDurationMs - elapsed));
  }
}

/**
 * Probe for an HTTP(S) health endpoint: 2xx is healthy, any other status is
 * unhealthy and a refused or timed-out connection is unreachable.
 */
export function createHttpProbe(url: string, client: HttpClient, requestTimeoutMs: number): HealthProbe {
  return async () => {
    try {
      const response = await client.request({ url, timeoutMs: requestTimeoutMs });
      return isSuccessStatus(response.status) ? 'healthy' : 'unhealthy';
    } catch {
      return 'unreachable';
    }
  };
}
