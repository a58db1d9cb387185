/**
 * Seed material the ledger hands to the entropy source at settlement.
 * `height` is the ledger's transition counter.
 */
export interface EntropySeed {
  timestamp: Date;
  height: number;
  raffle: string;
}

export interface EntropySource {
  nextRandom(seed: EntropySeed): bigint;
}

export const ENTROPY_SOURCE = 'ENTROPY_SOURCE';
