import { Raffle } from './raffle.entity';

export interface IRaffleRepository {
  findAll(): Promise<Raffle[]>;
  findByAddress(address: string): Promise<Raffle | null>;
  countByOwner(owner: string): Promise<number>;
  create(raffle: Raffle): Promise<Raffle>;
  /**
   * Replace the stored ledger state with `raffle`, provided the stored
   * revision still equals `raffle.revision`; otherwise fails with
   * ConcurrentUpdate. Bumps `raffle.revision` on success.
   */
  save(raffle: Raffle): Promise<Raffle>;
}

export const RAFFLE_REPOSITORY = 'RAFFLE_REPOSITORY';
