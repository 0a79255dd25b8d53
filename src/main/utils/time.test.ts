import { describe, expect, it } from 'vitest';
import { formatDateStamp, formatDisplayTime, formatFileStamp } from './time';

describe('time formatting', () => {
  const date = new Date(2026, 2, 7, 9, 5, 3);

  it('formats stamps in local time', () => {
    expect(formatDateStamp(date)).toBe('20260307');
    expect(formatFileStamp(date)).toBe('20260307_090503');
    expect(formatDisplayTime(date)).toBe('2026-03-07 09:05:03');
  });
});
