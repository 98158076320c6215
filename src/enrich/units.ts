export const KMH_TO_MPH = 0.621371;

/** km/h → mph, one decimal. The only speed conversion in the codebase. */
export function kmhToMph(kmh: number): number {
  return Math.round(kmh * KMH_TO_MPH * 10) / 10;
}

/** "45s", "3m 20s", "5m"; "N/A" when missing. */
export function formatDuration(seconds: number | null | undefined): string {
  if (!seconds || seconds < 0 || !Number.isFinite(seconds)) return "N/A";
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return secs > 0 ? `${mins}m ${secs}s` : `${mins}m`;
}
