/**
 * Human-readable duration for CLI output: `850ms`, `4.2s`, `12m 5s`, `3h 20m`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3_600_000) {
    const minutes = Math.floor(ms / 60_000);
    return `${minutes}m ${Math.floor((ms % 60_000) / 1000)}s`;
  }
  const hours = Math.floor(ms / 3_600_000);
  return `${hours}h ${Math.floor((ms % 3_600_000) / 60_000)}m`;
}
