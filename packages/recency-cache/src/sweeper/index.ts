export { startExpirySweeper } from './expiry-sweeper.js';
export type { ExpirySweeper, ExpirySweeperConfig, SweepOutcome } from './types.js';
