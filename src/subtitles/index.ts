export * from './types';
export * from './errors';
export * from './timecode';
export * from './encoding';
export * from './subtitleCodec';
export { parseSrtContent, generateSrtContent } from './srtParser';
export { parseVttContent, generateVttContent } from './vttParser';
export { parseSbvContent, generateSbvContent } from './sbvParser';
export { parseSubViewerContent, generateSubViewerContent } from './subViewerParser';
export { parseAssContent, generateAssContent } from './assParser';
