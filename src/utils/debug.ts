/**
 * Diagnostic logging, enabled with DEBUG=1 (or any non-empty value)
 */

export function debug(scope: string, message: string): void {
  if (process.env.DEBUG) {
    console.error(`[tally:${scope}] DEBUG: ${message}`)
  }
}
