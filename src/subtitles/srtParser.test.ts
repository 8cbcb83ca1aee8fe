import { describe, it, expect } from 'vitest';
import { parseSrtContent, generateSrtContent } from './srtParser';

describe('parseSrtContent', () => {
  it('should parse valid SRT content', () => {
    const srt = `1
00:00:01,000 --> 00:00:03,500
Hello World

2
00:00:04,000 --> 00:00:07,000
This is a test
`;

    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(2);

    expect(entries[0]).toEqual({
      index: 1,
      startTime: '00:00:01,000',
      endTime: '00:00:03,500',
      text: 'Hello World',
    });

    expect(entries[1]).toEqual({
      index: 2,
      startTime: '00:00:04,000',
      endTime: '00:00:07,000',
      text: 'This is a test',
    });
  });

  it('should handle multi-line subtitles', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Line one
Line two`;

    const entries = parseSrtContent(srt);
    expect(entries[0]?.text).toBe('Line one\nLine two');
  });

  it('should handle Windows line endings and trailing whitespace', () => {
    const srt =
      '1\r\n00:00:01,000 --> 00:00:04,000  \r\nHello   \r\n \r\n2\r\n00:00:05,000 --> 00:00:06,000\r\nWorld';

    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(2);
    expect(entries[0]?.text).toBe('Hello');
    expect(entries[1]?.text).toBe('World');
  });

  it('should number entries by position, not by the file numbering', () => {
    const srt = `5
00:00:01,000 --> 00:00:02,000
A

9
00:00:03,000 --> 00:00:04,000
B`;

    const entries = parseSrtContent(srt);
    expect(entries.map((e) => e.index)).toEqual([1, 2]);
  });

  it('should skip malformed blocks', () => {
    const srt = `1
00:00:01,000 --> 00:00:04,000
Hello

invalid block

2
00:00:05,000 --> 00:00:08,000
World`;

    const entries = parseSrtContent(srt);
    expect(entries).toHaveLength(2);
    expect(entries[1]).toEqual({
      index: 2,
      startTime: '00:00:05,000',
      endTime: '00:00:08,000',
      text: 'World',
    });
  });

  it('should accept a block without a sequence number', () => {
    const entries = parseSrtContent('00:00:01,000 --> 00:00:02,000\nNo number');
    expect(entries).toEqual([
      { index: 1, startTime: '00:00:01,000', endTime: '00:00:02,000', text: 'No number' },
    ]);
  });

  it('should normalize period separators to SRT notation', () => {
    const entries = parseSrtContent('1\n00:00:01.5 --> 00:00:02.250\nX');
    expect(entries[0]?.startTime).toBe('00:00:01,500');
    expect(entries[0]?.endTime).toBe('00:00:02,250');
  });

  it('should accept hour fields wider than two digits', () => {
    const entries = parseSrtContent('1\n100:00:01,000 --> 100:00:02,500\nLate');
    expect(entries).toEqual([
      { index: 1, startTime: '100:00:01,000', endTime: '100:00:02,500', text: 'Late' },
    ]);
  });

  it('should return an empty list for empty content', () => {
    expect(parseSrtContent('')).toEqual([]);
    expect(parseSrtContent('\n\n  \n')).toEqual([]);
  });
});

describe('generateSrtContent', () => {
  it('should write one block followed by a blank line', () => {
    const content = generateSrtContent([
      { index: 1, startTime: '00:00:01,000', endTime: '00:00:03,500', text: 'Hi' },
    ]);

    expect(content).toBe('1\n00:00:01,000 --> 00:00:03,500\nHi\n');
  });

  it('should separate blocks with blank lines', () => {
    const content = generateSrtContent([
      { index: 1, startTime: '00:00:01,000', endTime: '00:00:02,000', text: 'A' },
      { index: 2, startTime: '00:00:03,000', endTime: '00:00:04,000', text: 'B' },
    ]);

    expect(content).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n'
    );
  });

  it('should re-index entries and convert other notations', () => {
    const content = generateSrtContent([
      { index: 7, startTime: '00:00:01.000', endTime: '00:00:02.500', text: 'Hi' },
    ]);

    expect(content).toBe('1\n00:00:01,000 --> 00:00:02,500\nHi\n');
  });

  it('should drop blank lines inside a caption', () => {
    const content = generateSrtContent([
      { index: 1, startTime: '00:00:01,000', endTime: '00:00:02,000', text: 'A\n\n  \nB' },
    ]);

    expect(content).toBe('1\n00:00:01,000 --> 00:00:02,000\nA\nB\n');
  });

  it('should produce empty output for no entries', () => {
    expect(generateSrtContent([])).toBe('');
  });
});
