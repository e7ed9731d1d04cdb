export const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

const ZONE_DESIGNATOR = /(z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Normalizes a stored timestamp to a UTC `Date`. Strings without a zone
 * designator are naive and are read as UTC, never as local time.
 */
export function toUtcDate(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = trimmed.replace(' ', 'T');
  const timeIndex = iso.indexOf('T');
  const hasZone = timeIndex !== -1 && ZONE_DESIGNATOR.test(iso.slice(timeIndex));
  const normalized = timeIndex === -1 || hasZone ? iso : `${iso}Z`;

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * True when the token is expired or expires within the buffer. A missing or
 * unparseable expiry counts as expired.
 */
export function isTokenExpired(
  expiresAt: Date | string | null | undefined,
  now: Date = new Date(),
  bufferMs: number = EXPIRY_BUFFER_MS
): boolean {
  const expiry = toUtcDate(expiresAt);
  if (!expiry) return true;
  return now.getTime() + bufferMs >= expiry.getTime();
}

export function expiryFromNow(expiresInSeconds: number, now: Date = new Date()): Date {
  return new Date(now.getTime() + expiresInSeconds * 1000);
}
