import { describe, it, expect } from 'vitest';
import { detectEncoding, decodeSubtitleBuffer } from './encoding';

describe('detectEncoding', () => {
  it('should pick UTF-8 when a byte-order mark is present', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('Привет', 'utf-8')]);
    expect(detectEncoding(buffer)).toBe('utf-8');
  });
});

describe('decodeSubtitleBuffer', () => {
  it('should strip the UTF-8 byte-order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('Привет', 'utf-8')]);
    expect(decodeSubtitleBuffer(buffer)).toBe('Привет');
  });

  it('should decode UTF-16LE content', () => {
    const text = '1\n00:00:01,000 --> 00:00:02,000\nHola\n';
    const buffer = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')]);
    expect(decodeSubtitleBuffer(buffer)).toBe(text);
  });

  it('should decode plain ASCII', () => {
    expect(decodeSubtitleBuffer(Buffer.from('Hello world', 'ascii'))).toBe('Hello world');
  });

  it('should pass strings through without a byte-order mark', () => {
    expect(decodeSubtitleBuffer('\uFEFFHello')).toBe('Hello');
    expect(decodeSubtitleBuffer('Hello')).toBe('Hello');
  });
});
