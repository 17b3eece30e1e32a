export { createCriticalSection } from './critical-section.js';
export { CacheReentrancyError } from './types.js';
export type { CriticalSection } from './types.js';
