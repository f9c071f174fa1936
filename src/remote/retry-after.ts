export const DEFAULT_RETRY_AFTER_SECONDS = 5;

/**
 * Reads a `Retry-After` header value as whole seconds. Accepts delta-seconds
 * or an HTTP date; anything else yields the fallback.
 */
export function parseRetryAfterSeconds(
  header: string | null | undefined,
  fallbackSeconds: number = DEFAULT_RETRY_AFTER_SECONDS,
  now: Date = new Date()
): number {
  const value = header?.trim();
  if (!value) return fallbackSeconds;

  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.ceil(Number(value));
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) return fallbackSeconds;

  return Math.max(0, Math.ceil((at - now.getTime()) / 1000));
}
