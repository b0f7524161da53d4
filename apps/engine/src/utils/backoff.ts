// Exponential backoff: base-2 gives 1s → 2s → 4s → 8s (capped at maxDelayMs).
// attempt is 0-indexed: the wait before the first retry is baseDelayMs.
export function calculateBackOff(
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 60000,
  jitterRatio: number = 0
): number {
  const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  if (jitterRatio <= 0) return Math.floor(delay);
  // ±jitterRatio spread to avoid retry storms against one agent
  const jitter = delay * jitterRatio;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.floor(Math.min(delay + randomJitter, maxDelayMs));
}
