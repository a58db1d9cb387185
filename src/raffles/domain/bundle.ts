export enum BundleTier {
  SMALL = 'small',
  MEDIUM = 'medium',
  LARGE = 'large',
}

export interface Bundle {
  tier: BundleTier;
  amount: bigint; // tickets granted
  price: bigint;  // base units of the raffle currency
}

export const SMALL_BUNDLE_AMOUNT = 45n;
export const MEDIUM_BUNDLE_AMOUNT = 200n;
export const LARGE_BUNDLE_AMOUNT = 660n;

export const PRICE_MEDIUM_BUNDLE_MULTIPLIER = 3n;
export const PRICE_LARGE_BUNDLE_MULTIPLIER = 5n;

const BUNDLE_TABLE: ReadonlyArray<{ tier: BundleTier; amount: bigint; multiplier: bigint }> = [
  { tier: BundleTier.SMALL, amount: SMALL_BUNDLE_AMOUNT, multiplier: 1n },
  { tier: BundleTier.MEDIUM, amount: MEDIUM_BUNDLE_AMOUNT, multiplier: PRICE_MEDIUM_BUNDLE_MULTIPLIER },
  { tier: BundleTier.LARGE, amount: LARGE_BUNDLE_AMOUNT, multiplier: PRICE_LARGE_BUNDLE_MULTIPLIER },
];

/**
 * Derive the three fixed bundles from the base ticket price, smallest first.
 * Price per ticket falls with every tier.
 */
export function buildBundles(ticketPrice: bigint): Bundle[] {
  return BUNDLE_TABLE.map(({ tier, amount, multiplier }) => ({
    tier,
    amount,
    price: ticketPrice * multiplier,
  }));
}

export function isBundleTier(value: string): value is BundleTier {
  return Object.values<string>(BundleTier).includes(value);
}
