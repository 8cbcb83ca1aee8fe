export * from './types';
export { JobStore, jobStore } from './jobStore';
export type { JobStoreDirs } from './jobStore';
