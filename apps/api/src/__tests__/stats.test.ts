import { describe, expect, it } from 'vitest';
import { average, countDistinct, median, mode } from '../utils/stats.js';

describe('stats', () => {
  it('averages values and returns null for no values', () => {
    expect(average([10, 20, 60])).toBe(30);
    expect(average([])).toBeNull();
  });

  it('takes the middle value, or the mean of the two middle values', () => {
    expect(median([2013, 2010, 2012])).toBe(2012);
    expect(median([2016, 2015])).toBe(2015.5);
    expect(median([])).toBeNull();
  });

  it('picks the most frequent value', () => {
    expect(mode(['fwd', 'fwd', 'rwd'])).toBe('fwd');
    expect(mode(['rwd', 'fwd', 'fwd'])).toBe('fwd');
  });

  it('breaks ties in favour of the value seen first', () => {
    expect(mode(['sedan', 'coupe', 'coupe', 'sedan'])).toBe('sedan');
    expect(mode(['coupe', null, 'sedan'])).toBe('coupe');
  });

  it('ignores nulls and returns null when nothing is left', () => {
    expect(mode([null, 'manual', null, null])).toBe('manual');
    expect(mode([null, null])).toBeNull();
    expect(mode([])).toBeNull();
  });

  it('counts distinct non-null values', () => {
    expect(countDistinct(['ford', 'honda', 'ford', null])).toBe(2);
    expect(countDistinct([])).toBe(0);
  });
});
