import { describe, expect, it } from 'vitest';
import { ageInHours, parseLastUpdate } from '../src/modules/audit/timestamps.js';

describe('parseLastUpdate', () => {
  it('reads an offset-aware timestamp', () => {
    expect(parseLastUpdate('2026-03-01T10:00:00+02:00')?.toISOString()).toBe('2026-03-01T08:00:00.000Z');
    expect(parseLastUpdate('2026-03-01T10:00:00Z')?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('takes a timestamp without offset as UTC', () => {
    expect(parseLastUpdate('2026-03-01T10:00:00')?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
  });

  it('truncates sub-millisecond digits and accepts compact offsets', () => {
    expect(parseLastUpdate('2026-03-01T10:00:00.123456+0000')?.toISOString()).toBe('2026-03-01T10:00:00.123Z');
  });

  it('returns null for values that are not timestamps', () => {
    expect(parseLastUpdate('')).toBeNull();
    expect(parseLastUpdate('yesterday')).toBeNull();
    expect(parseLastUpdate('2026-13-01T10:00:00Z')).toBeNull();
  });

  it('rejects dates and times that do not exist', () => {
    expect(parseLastUpdate('2026-02-30T10:00:00Z')).toBeNull();
    expect(parseLastUpdate('2026-02-31T10:00:00+00:00')).toBeNull();
    expect(parseLastUpdate('2026-03-01T24:00:00Z')).toBeNull();
    expect(parseLastUpdate('2026-03-01T10:60:00')).toBeNull();
    expect(parseLastUpdate('2028-02-29T10:00:00Z')?.toISOString()).toBe('2028-02-29T10:00:00.000Z');
  });
});

describe('ageInHours', () => {
  it('measures the elapsed time in hours', () => {
    expect(ageInHours(new Date('2026-03-01T04:00:00Z'), new Date('2026-03-01T12:00:00Z'))).toBe(8);
    expect(ageInHours(new Date('2026-03-01T11:30:00Z'), new Date('2026-03-01T12:00:00Z'))).toBe(0.5);
  });
});
