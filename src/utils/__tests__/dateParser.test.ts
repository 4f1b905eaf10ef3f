import { describe, it, expect } from 'vitest';
import { formatIndonesianDate, formatNumericDate, parseIndonesianDate, UNKNOWN_MONTH } from '../dateParser';

describe('parseIndonesianDate', () => {
  it.each([
    ['1 Juli 2024', '01-07-2024'],
    ['17 Agustus 1945', '17-08-1945'],
    ['31 Desember 2026', '31-12-2026'],
    ['31 desember 2023', '31-12-2023'],
    ['1 juli 2024', '01-07-2024'],
    ['2 MEI 2025', '02-05-2025'],
    ['  5   Februari   2026  ', '05-02-2026'],
    ['12 Januari 2026 pukul 10', '12-01-2026'],
  ])('parses %j as %j', (input, expected) => {
    expect(parseIndonesianDate(input)).toBe(expected);
  });

  it('uses the unknown-month placeholder for names outside the table', () => {
    expect(parseIndonesianDate('3 July 2024')).toBe(`03-${UNKNOWN_MONTH}-2024`);
  });

  it.each([
    ['garbage', 'garbage'],
    ['2024/07/01', '2024-07-01'],
    ['1 Juli', '1-Juli'],
    ['', ''],
  ])('falls back mechanically for %j', (input, expected) => {
    expect(parseIndonesianDate(input)).toBe(expected);
  });
});

describe('formatIndonesianDate', () => {
  it('writes the day without padding and the month name', () => {
    expect(formatIndonesianDate(new Date(2026, 0, 12))).toBe('12 Januari 2026');
    expect(formatIndonesianDate(new Date(2024, 6, 1))).toBe('1 Juli 2024');
  });

  it('round-trips through the parser', () => {
    expect(parseIndonesianDate(formatIndonesianDate(new Date(2024, 10, 9)))).toBe('09-11-2024');
  });
});

describe('formatNumericDate', () => {
  it('pads day and month', () => {
    expect(formatNumericDate(new Date(2024, 6, 1))).toBe('01-07-2024');
  });
});
