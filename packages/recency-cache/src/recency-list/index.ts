export { createRecencyList } from './recency-list.js';
export type { EntryHandle, RecencyEntry, RecencyList } from './types.js';
