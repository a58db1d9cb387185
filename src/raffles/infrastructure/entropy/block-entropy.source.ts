import { Injectable } from '@nestjs/common';
import { hexlify, randomBytes, solidityPackedKeccak256 } from 'ethers';
import { EntropySeed, EntropySource } from '../../domain/entropy';

/**
 * Mixes the seed with a fresh 32-byte beacon, the way block randomness,
 * timestamp and height get hashed together on chain. Whoever controls the
 * beacon can predict the draw, so settlement stays a manual owner action.
 */
@Injectable()
export class BlockEntropySource implements EntropySource {
  nextRandom(seed: EntropySeed): bigint {
    const beacon = hexlify(randomBytes(32));
    const hash = solidityPackedKeccak256(
      ['uint256', 'bytes32', 'uint256', 'address'],
      [Math.floor(seed.timestamp.getTime() / 1000), beacon, seed.height, seed.raffle],
    );
    return BigInt(hash);
  }
}
