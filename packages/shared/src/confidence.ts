/**
 * Clamp to [0, 1] and round to two decimals.
 */
export function roundConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}
