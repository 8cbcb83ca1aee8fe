import { describe, it, expect } from 'vitest';
import { timestampToMs, msToTimestamp, convertTimestamp } from './timecode';

describe('timestampToMs', () => {
  it('should convert timestamps in every notation', () => {
    expect(timestampToMs('00:00:01,000')).toBe(1000);
    expect(timestampToMs('01:30:45,500')).toBe(5445500);
    expect(timestampToMs('00:00:01.500')).toBe(1500);
    expect(timestampToMs('0:00:01.50')).toBe(1500);
    expect(timestampToMs('00:01.250')).toBe(1250);
  });

  it('should return null for values that are not timestamps', () => {
    expect(timestampToMs('invalid')).toBeNull();
    expect(timestampToMs('')).toBeNull();
  });
});

describe('msToTimestamp', () => {
  it('should render millisecond notations', () => {
    expect(msToTimestamp(5445500, 'srt')).toBe('01:30:45,500');
    expect(msToTimestamp(1500, 'vtt')).toBe('00:00:01.500');
    expect(msToTimestamp(1500, 'sbv')).toBe('0:00:01.500');
  });

  it('should round centisecond notations', () => {
    expect(msToTimestamp(3456, 'ass')).toBe('0:00:03.46');
    expect(msToTimestamp(3456, 'sub')).toBe('00:00:03.46');
  });
});

describe('convertTimestamp', () => {
  it('should convert between notations', () => {
    expect(convertTimestamp('00:00:01,000', 'vtt')).toBe('00:00:01.000');
    expect(convertTimestamp('0:00:01.50', 'srt')).toBe('00:00:01,500');
  });

  it('should keep values already in the target notation', () => {
    expect(convertTimestamp('00:00:01,000', 'srt')).toBe('00:00:01,000');
    expect(convertTimestamp('00:00:01.000', 'sbv')).toBe('00:00:01.000');
  });

  it('should pass unrecognised values through', () => {
    expect(convertTimestamp('not a time', 'srt')).toBe('not a time');
  });
});
