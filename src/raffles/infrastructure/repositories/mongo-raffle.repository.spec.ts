import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { addressOf } from '../../../../test/support/addresses';
import { Raffle } from '../../domain/raffle.entity';
import { RaffleError, RaffleErrorCode } from '../../domain/raffle.errors';
import { RaffleDocument } from '../schemas/raffle.schema';
import { MongoRaffleRepository } from './mongo-raffle.repository';

interface RaffleUpdate {
  $set: Record<string, unknown>;
  $unset?: Record<string, 1>;
}

const OWNER = addressOf(1);
const RAFFLE = addressOf(100);

function openRaffle(): Raffle {
  return Raffle.open(
    {
      address: RAFFLE,
      owner: OWNER,
      currency: { kind: 'native' },
      decimals: 0,
      ticketPrice: 1000n,
      durationDays: 30,
      donationPercent: 75,
    },
    new Date('2026-01-01T00:00:00.000Z'),
  );
}

describe('MongoRaffleRepository', () => {
  let repository: MongoRaffleRepository;
  const raffleModel = { findOneAndUpdate: jest.fn() };

  beforeEach(async () => {
    raffleModel.findOneAndUpdate.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        MongoRaffleRepository,
        { provide: getModelToken(RaffleDocument.name), useValue: raffleModel },
      ],
    }).compile();

    repository = moduleRef.get(MongoRaffleRepository);
  });

  describe('save', () => {
    it('writes only over the revision it was loaded at', async () => {
      raffleModel.findOneAndUpdate.mockImplementation((_filter: unknown, update: RaffleUpdate) => ({
        exec: async () => ({ _id: { toString: () => 'doc-1' }, ...update.$set }),
      }));
      const raffle = openRaffle();
      raffle.revision = 3;

      const saved = await repository.save(raffle);

      const [filter, update] = raffleModel.findOneAndUpdate.mock.calls[0];
      expect(filter).toEqual({ address: RAFFLE, revision: 3 });
      expect(update.$set.revision).toBe(4);
      expect(update.$unset).toEqual({
        fixedPrize: 1,
        winner: 1,
        donationAddress: 1,
        distribution: 1,
        settledAt: 1,
      });
      expect(raffle.revision).toBe(4);
      expect(saved.id).toBe('doc-1');
      expect(saved.revision).toBe(4);
      expect(saved.pot).toBe(0n);
    });

    it('reports a concurrent update when the stored revision moved on', async () => {
      raffleModel.findOneAndUpdate.mockReturnValue({ exec: async () => null });
      const raffle = openRaffle();
      raffle.revision = 3;

      const error = await repository.save(raffle).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RaffleError);
      expect(error).toMatchObject({ code: RaffleErrorCode.CONCURRENT_UPDATE });
      expect(raffle.revision).toBe(3);
    });
  });
});
