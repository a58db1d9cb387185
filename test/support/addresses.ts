import { getAddress } from 'ethers';

/** Deterministic checksummed address for test actors */
export function addressOf(n: number): string {
  return getAddress(`0x${n.toString(16).padStart(40, '0')}`);
}
