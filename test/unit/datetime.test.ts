import { describe, expect, test } from 'vitest';
import { compileFormat } from '../../src/core/datetime.js';

function parseTime(format: string, input: string): number | null {
  const date = compileFormat(format).parse(input);
  return date === null ? null : date.getTime();
}

describe('compileFormat', () => {
  test('numeric date fields', () => {
    expect(parseTime('%Y-%m-%d', '2024-01-05')).toBe(Date.UTC(2024, 0, 5));
    expect(parseTime('%Y-%m-%d', '2024-13-01')).toBeNull();
    expect(parseTime('%Y-%m-%d', '2024-02-30')).toBeNull();
  });

  test('missing fields default to 1900-01-01 00:00', () => {
    expect(parseTime('%Y', '2020')).toBe(Date.UTC(2020, 0, 1));
    expect(parseTime('%H:%M', '08:45')).toBe(Date.UTC(1900, 0, 1, 8, 45));
  });

  test('month names and whitespace', () => {
    expect(parseTime('%d %B %Y', '5 March 2024')).toBe(Date.UTC(2024, 2, 5));
    expect(parseTime('%d %b %Y', '05   mar 2024')).toBe(Date.UTC(2024, 2, 5));
  });

  test('12-hour clock', () => {
    expect(parseTime('%I:%M %p', '07:15 PM')).toBe(Date.UTC(1900, 0, 1, 19, 15));
    expect(parseTime('%I:%M %p', '12:00 am')).toBe(Date.UTC(1900, 0, 1, 0, 0));
  });

  test('two-digit years pivot at 69', () => {
    expect(parseTime('%y', '68')).toBe(Date.UTC(2068, 0, 1));
    expect(parseTime('%y', '69')).toBe(Date.UTC(1969, 0, 1));
  });

  test('day of year', () => {
    expect(parseTime('%Y-%j', '2024-060')).toBe(Date.UTC(2024, 1, 29));
    expect(parseTime('%Y-%j', '2023-366')).toBeNull();
  });

  test('fractional seconds keep millisecond precision', () => {
    expect(parseTime('%H:%M:%S.%f', '10:00:00.250')).toBe(Date.UTC(1900, 0, 1, 10, 0, 0, 250));
  });

  test('utc offsets', () => {
    const format = '%Y-%m-%dT%H:%M:%S%z';
    expect(parseTime(format, '2024-06-01T08:00:00-0530')).toBe(Date.UTC(2024, 5, 1, 13, 30));
    expect(parseTime(format, '2024-06-01T08:00:00+01:00')).toBe(Date.UTC(2024, 5, 1, 7, 0));
  });

  test('literal percent sign', () => {
    expect(parseTime('%Y%%', '2024%')).toBe(Date.UTC(2024, 0, 1));
  });

  test('the whole input must be consumed', () => {
    expect(parseTime('%Y', '2024x')).toBeNull();
    expect(parseTime('%Y', 'x2024')).toBeNull();
  });

  test('bad formats throw', () => {
    expect(() => compileFormat('%Q')).toThrow('unsupported directive "%Q"');
    expect(() => compileFormat('%Y%')).toThrow('stray "%"');
  });
});
