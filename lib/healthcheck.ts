import { errorMessage } from './errors';
import { createLogger } from './logging';

const logger = createLogger('healthcheck');

const REQUEST_TIMEOUT_MS = 5000;

export interface HealthChecker {
  /** Issues one GET to `url` and resolves with the response status. */
  status(url: string): Promise<number>;
}

export class HttpHealthChecker implements HealthChecker {
  async status(url: string): Promise<number> {
    const response = await fetch(url, {
      redirect: 'manual',
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    await response.body?.cancel();
    return response.status;
  }
}

export interface HealthcheckTarget {
  url: string;
  expectedStatus: number;
  timeoutMs: number;
}

/**
 * Repeats the check every `intervalMs` until `url` answers the expected status
 * or `timeoutMs` has passed. Connection errors count as a failed attempt.
 */
export async function waitForHealthy(
  checker: HealthChecker,
  target: HealthcheckTarget,
  intervalMs: number,
): Promise<boolean> {
  const deadline = Date.now() + target.timeoutMs;
  while (Date.now() < deadline) {
    try {
      const status = await checker.status(target.url);
      if (status === target.expectedStatus) return true;
      logger.debug(`${target.url} answered ${status}, waiting for ${target.expectedStatus}`);
    } catch (error) {
      logger.debug(`${target.url} not reachable yet:`, errorMessage(error));
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
  return false;
}
