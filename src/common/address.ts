import { getAddress, isAddress } from 'ethers';

/**
 * Checksummed form of an EVM address, or null when the input is not one
 */
export function toChecksumAddress(value: string): string | null {
  if (!isAddress(value)) return null;
  return getAddress(value);
}
