import { Raffle } from '../../src/raffles/domain/raffle.entity';
import { RaffleError, RaffleErrorCode } from '../../src/raffles/domain/raffle.errors';
import { IRaffleRepository } from '../../src/raffles/domain/raffle.repository';

/**
 * Stores copies so a test only sees what was explicitly saved
 */
export class InMemoryRaffleRepository implements IRaffleRepository {
  private readonly raffles = new Map<string, Raffle>();
  private nextId = 1;
  failNextSave = false;
  saves = 0;

  async findAll(): Promise<Raffle[]> {
    return [...this.raffles.values()].map((raffle) => raffle.clone());
  }

  async findByAddress(address: string): Promise<Raffle | null> {
    const raffle = this.raffles.get(address);
    return raffle ? raffle.clone() : null;
  }

  async countByOwner(owner: string): Promise<number> {
    return [...this.raffles.values()].filter((raffle) => raffle.owner === owner).length;
  }

  async create(raffle: Raffle): Promise<Raffle> {
    const stored = raffle.clone();
    stored.id = String(this.nextId++);
    this.raffles.set(stored.address, stored);
    return stored.clone();
  }

  async save(raffle: Raffle): Promise<Raffle> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error('write conflict');
    }
    const stored = this.raffles.get(raffle.address);
    if (!stored || stored.revision !== raffle.revision) {
      throw new RaffleError(
        RaffleErrorCode.CONCURRENT_UPDATE,
        `Raffle ${raffle.address} changed since revision ${raffle.revision}`,
      );
    }
    this.saves += 1;
    raffle.revision += 1;
    const next = raffle.clone();
    next.id = stored.id;
    this.raffles.set(raffle.address, next);
    return next.clone();
  }
}
