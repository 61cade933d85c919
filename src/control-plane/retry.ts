/** Delay before the attempt following `attempt` (1-based): base, 2x base, 4x base... capped. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}
