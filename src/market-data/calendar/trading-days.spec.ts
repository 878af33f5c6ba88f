import {
  addDays,
  eachDate,
  exchangeDate,
  isWeekday,
  mergeRanges,
  zonedDate,
} from './trading-days';

describe('trading-days', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays('2025-11-30', 1)).toBe('2025-12-01');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28');
  });

  it('recognises weekdays', () => {
    expect(isWeekday('2025-11-21')).toBe(true); // Friday
    expect(isWeekday('2025-11-22')).toBe(false); // Saturday
    expect(isWeekday('2025-11-23')).toBe(false); // Sunday
    expect(isWeekday('2025-11-24')).toBe(true); // Monday
  });

  it('lists an inclusive date range', () => {
    expect(eachDate('2025-11-28', '2025-12-02')).toEqual([
      '2025-11-28',
      '2025-11-29',
      '2025-11-30',
      '2025-12-01',
      '2025-12-02',
    ]);
    expect(eachDate('2025-12-02', '2025-11-28')).toEqual([]);
  });

  it('merges overlapping and adjacent ranges', () => {
    expect(
      mergeRanges([
        { from: '2025-11-10', to: '2025-11-12' },
        { from: '2025-11-01', to: '2025-11-05' },
        { from: '2025-11-13', to: '2025-11-14' },
        { from: '2025-11-04', to: '2025-11-06' },
        { from: '2025-11-20', to: '2025-11-21' },
      ]),
    ).toEqual([
      { from: '2025-11-01', to: '2025-11-06' },
      { from: '2025-11-10', to: '2025-11-14' },
      { from: '2025-11-20', to: '2025-11-21' },
    ]);
  });

  it('derives the exchange date from epoch seconds and offset', () => {
    // 2025-11-20 14:30 UTC = 09:30 New York (UTC-5)
    const open = Date.UTC(2025, 10, 20, 14, 30) / 1000;
    expect(exchangeDate(open, -18000)).toBe('2025-11-20');
    // 2025-11-21 03:00 UTC is still 2025-11-20 in New York
    const late = Date.UTC(2025, 10, 21, 3, 0) / 1000;
    expect(exchangeDate(late, -18000)).toBe('2025-11-20');
  });

  it('formats a zoned calendar date', () => {
    const ms = Date.UTC(2025, 10, 21, 3, 0);
    expect(zonedDate(ms, 'America/New_York')).toBe('2025-11-20');
    expect(zonedDate(ms, 'Asia/Tokyo')).toBe('2025-11-21');
  });
});
