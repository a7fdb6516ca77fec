/**
 * Get current ISO timestamp
 */
export function getIsoTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Milliseconds below one second, seconds with two decimals above
 */
export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Unix seconds as "YYYY-MM-DD HH:MM:SS UTC"
 */
export function formatUnixUtc(seconds: number): string {
  return `${new Date(seconds * 1000).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}
