import { toChecksumAddress } from '../../common/address';

/** The chain's own coin; every other asset is named by its token address */
export const NATIVE_ASSET = 'native';

export function toAsset(value: string): string | null {
  if (value.toLowerCase() === NATIVE_ASSET) return NATIVE_ASSET;
  return toChecksumAddress(value);
}
