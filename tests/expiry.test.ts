import { describe, expect, it } from 'vitest';
import { EXPIRY_BUFFER_MS, expiryFromNow, isTokenExpired, toUtcDate } from '../src/oauth/expiry.js';

const now = new Date('2026-10-19T12:00:00Z');

describe('toUtcDate', () => {
  it('reads naive timestamps as UTC', () => {
    expect(toUtcDate('2026-10-19T13:00:00')?.toISOString()).toBe('2026-10-19T13:00:00.000Z');
    expect(toUtcDate('2026-10-19 13:00:00')?.toISOString()).toBe('2026-10-19T13:00:00.000Z');
  });

  it('keeps explicit zones', () => {
    expect(toUtcDate('2026-10-19T13:00:00Z')?.toISOString()).toBe('2026-10-19T13:00:00.000Z');
    expect(toUtcDate('2026-10-19T13:00:00+02:00')?.toISOString()).toBe('2026-10-19T11:00:00.000Z');
  });

  it('returns null for empty or unparseable values', () => {
    expect(toUtcDate(null)).toBeNull();
    expect(toUtcDate('')).toBeNull();
    expect(toUtcDate('not a date')).toBeNull();
  });
});

describe('isTokenExpired', () => {
  it('treats a missing expiry as expired', () => {
    expect(isTokenExpired(null, now)).toBe(true);
    expect(isTokenExpired(undefined, now)).toBe(true);
  });

  it('applies the five minute buffer', () => {
    expect(isTokenExpired(new Date(now.getTime() + EXPIRY_BUFFER_MS), now)).toBe(true);
    expect(isTokenExpired(new Date(now.getTime() + EXPIRY_BUFFER_MS + 1000), now)).toBe(false);
    expect(isTokenExpired(new Date(now.getTime() - 1000), now)).toBe(true);
  });

  it('compares naive and zoned strings the same way', () => {
    expect(isTokenExpired('2026-10-19T13:00:00', now)).toBe(false);
    expect(isTokenExpired('2026-10-19T13:00:00Z', now)).toBe(false);
    expect(isTokenExpired('2026-10-19T12:04:00', now)).toBe(true);
  });
});

describe('expiryFromNow', () => {
  it('adds seconds to now', () => {
    expect(expiryFromNow(3600, now).toISOString()).toBe('2026-10-19T13:00:00.000Z');
  });
});
