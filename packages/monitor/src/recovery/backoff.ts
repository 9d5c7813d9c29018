/** Wait before attempt number `attempt` (1-based). Stages past the end reuse the last one. */
export function backoffDelay(stagesMs: readonly number[], attempt: number): number {
  if (stagesMs.length === 0) {
    return 0;
  }
  const index = Math.min(Math.max(attempt, 1), stagesMs.length) - 1;
  return stagesMs[index];
}

/**
 * Quiet period after an incident closes before the attempt counter starts
 * from zero again: the last backoff stage.
 */
export function cooldownPeriod(stagesMs: readonly number[]): number {
  return stagesMs.length === 0 ? 0 : stagesMs[stagesMs.length - 1];
}
