export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = Math.floor(ms / 1000) % 60;
  const minutes = Math.floor(ms / 60000);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${(ms / 1000).toFixed(1)}s`;
}

/** Resident set size in MB, as logged in MEM-STAMP lines. */
export function residentMemoryMb(): string {
  return (process.memoryUsage().rss / (1024 * 1024)).toFixed(1);
}
