import type { Instant } from '../../types/index.js';

export type Clock = () => Instant;

/**
 * Current wall-clock time in whole seconds
 */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
