/**
 * Mutual-exclusion boundary: at most one `work` per key runs at a time,
 * across every instance of the service.
 */
export interface RaffleLock {
  runExclusive<T>(key: string, work: () => Promise<T>): Promise<T>;
}

export const RAFFLE_LOCK = 'RAFFLE_LOCK';
