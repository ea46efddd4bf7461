const QUOTED_429_KEY = /"key"\s*:\s*"429"/;
const RETRY_AFTER = /(\d+) seconds/;

/** True when stream text carries the vendor's rate-limit error. */
export function isRateLimitSignal(text: string): boolean {
  return QUOTED_429_KEY.test(text) || text.includes("rate limit");
}

/**
 * Reads the blocking period from texts such as
 * "Requests are blocked during the remaining period of 86400 seconds."
 */
export function parseRetryAfterSeconds(text: string, fallbackSeconds: number): number {
  const match = RETRY_AFTER.exec(text);
  if (!match) return fallbackSeconds;
  const seconds = Number(match[1]);
  return Number.isSafeInteger(seconds) ? seconds : fallbackSeconds;
}
