import {
  computeAgeHours,
  formatCompactTimestamp,
  formatLongDate,
  parseDateToIso,
} from './date.util';

describe('date util', () => {
  it('normalizes parseable dates to ISO', () => {
    expect(parseDateToIso('Tue, 10 Jun 2025 08:00:00 GMT')).toBe(
      '2025-06-10T08:00:00.000Z',
    );
    expect(parseDateToIso('not a date')).toBe('');
  });

  it('computes age in hours against a fixed clock', () => {
    const now = new Date('2025-06-10T12:00:00.000Z');
    expect(computeAgeHours('2025-06-10T06:00:00.000Z', now)).toBe(6);
    expect(computeAgeHours('', now)).toBeNull();
  });

  it('formats long and compact dates in UTC', () => {
    expect(formatLongDate('2026-01-05T10:00:00.000Z')).toBe('January 05, 2026');
    expect(formatCompactTimestamp(new Date('2026-01-05T10:04:09.000Z'))).toBe(
      '20260105100409',
    );
  });
});
