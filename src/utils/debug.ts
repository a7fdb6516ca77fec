/**
 * [DEBUG] lines on stderr, enabled with TXAUDIT_DEBUG=1
 */

export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return env.TXAUDIT_DEBUG === "1";
}

export function debug(message: string, ...details: unknown[]): void {
  if (isDebugEnabled()) {
    console.error(`[DEBUG] ${message}`, ...details);
  }
}
