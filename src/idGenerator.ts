/**
 * Generate a session ID for scripts that drive the guide without a client.
 * Format: {prefix}-timestamp-randomSuffix
 */
export function generateSessionId(prefix = "session"): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}
