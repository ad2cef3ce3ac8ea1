/**
 * Polling delays for waiting on a submitted transaction.
 */

export interface PollingConfig {
  /** Delay before the first status request (default: 50ms) */
  initialDelayMs: number;
  /** Added to the delay after every pending response (default: 200ms) */
  delayStepMs: number;
  /** Upper bound for a single delay (default: 10000ms) */
  maxDelayMs: number;
  /** Status requests made before giving up (default: 50) */
  maxAttempts: number;
}

/**
 * Delay before the given attempt: grows linearly from initialDelayMs by
 * delayStepMs, capped at maxDelayMs.
 *
 * @param attempt - Zero-based attempt number
 */
export function calculatePollDelay(attempt: number, config: PollingConfig): number {
  const delayMs = config.initialDelayMs + attempt * config.delayStepMs;
  return Math.min(delayMs, config.maxDelayMs);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
