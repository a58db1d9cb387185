import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Raffle, RaffleCurrency } from '../../domain/raffle.entity';
import { RaffleError, RaffleErrorCode } from '../../domain/raffle.errors';
import { IRaffleRepository } from '../../domain/raffle.repository';
import { RaffleDocument } from '../schemas/raffle.schema';

const OPTIONAL_FIELDS = ['fixedPrize', 'winner', 'donationAddress', 'distribution', 'settledAt'] as const;

@Injectable()
export class MongoRaffleRepository implements IRaffleRepository {
  constructor(
    @InjectModel(RaffleDocument.name)
    private readonly raffleModel: Model<RaffleDocument>,
  ) {}

  async findAll(): Promise<Raffle[]> {
    const docs = await this.raffleModel.find().sort({ createdAt: -1 }).exec();
    return docs.map((doc) => this.toEntity(doc));
  }

  async findByAddress(address: string): Promise<Raffle | null> {
    const doc = await this.raffleModel.findOne({ address }).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async countByOwner(owner: string): Promise<number> {
    return this.raffleModel.countDocuments({ owner }).exec();
  }

  async create(raffle: Raffle): Promise<Raffle> {
    const created = await this.raffleModel.create(this.toPersistence(raffle));
    return this.toEntity(created);
  }

  async save(raffle: Raffle): Promise<Raffle> {
    // Undefined keys are dropped from $set, so cleared fields need an explicit $unset
    const set = Object.fromEntries(
      Object.entries(this.toPersistence(raffle)).filter(([, value]) => value !== undefined),
    );
    const unset: Record<string, 1> = {};
    for (const field of OPTIONAL_FIELDS) {
      if (raffle[field] === undefined) unset[field] = 1;
    }
    const revision = raffle.revision + 1;

    const doc = await this.raffleModel
      .findOneAndUpdate(
        { address: raffle.address, revision: raffle.revision },
        Object.keys(unset).length > 0
          ? { $set: { ...set, revision }, $unset: unset }
          : { $set: { ...set, revision } },
        { new: true },
      )
      .exec();
    if (!doc) {
      throw new RaffleError(
        RaffleErrorCode.CONCURRENT_UPDATE,
        `Raffle ${raffle.address} changed since revision ${raffle.revision}`,
      );
    }
    raffle.revision = revision;
    return this.toEntity(doc);
  }

  private toPersistence(raffle: Raffle) {
    return {
      address: raffle.address,
      owner: raffle.owner,
      currency:
        raffle.currency.kind === 'token'
          ? { kind: raffle.currency.kind, token: raffle.currency.token }
          : { kind: raffle.currency.kind },
      decimals: raffle.decimals,
      ticketPrice: raffle.ticketPrice.toString(),
      bundles: raffle.bundles.map((bundle) => ({
        tier: bundle.tier,
        amount: bundle.amount.toString(),
        price: bundle.price.toString(),
      })),
      fixedPrize: raffle.fixedPrize?.toString(),
      donationPercent: raffle.donationPercent,
      raffleEndDate: raffle.raffleEndDate,
      pot: raffle.pot.toString(),
      players: [...raffle.tickets.entries()].map(([address, tickets]) => ({
        address,
        tickets: tickets.toString(),
      })),
      winner: raffle.winner,
      donationAddress: raffle.donationAddress,
      distribution: raffle.distribution && {
        prize: raffle.distribution.prize.toString(),
        donation: raffle.distribution.donation.toString(),
        commission: raffle.distribution.commission.toString(),
      },
      settledAt: raffle.settledAt,
      paidShares: [...raffle.paidShares],
      height: raffle.height,
      revision: raffle.revision,
      events: raffle.events.map((event) => ({
        name: event.name,
        height: event.height,
        at: event.at,
        args: event.args,
      })),
      createdAt: raffle.createdAt,
      updatedAt: raffle.updatedAt,
    };
  }

  private toEntity(doc: RaffleDocument): Raffle {
    const currency: RaffleCurrency =
      doc.currency.kind === 'token' && doc.currency.token
        ? { kind: 'token', token: doc.currency.token }
        : { kind: 'native' };

    return new Raffle({
      id: doc._id.toString(),
      address: doc.address,
      owner: doc.owner,
      currency,
      decimals: doc.decimals,
      ticketPrice: BigInt(doc.ticketPrice),
      bundles: doc.bundles.map((bundle) => ({
        tier: bundle.tier,
        amount: BigInt(bundle.amount),
        price: BigInt(bundle.price),
      })),
      fixedPrize: doc.fixedPrize !== undefined && doc.fixedPrize !== null ? BigInt(doc.fixedPrize) : undefined,
      donationPercent: doc.donationPercent,
      raffleEndDate: doc.raffleEndDate,
      pot: BigInt(doc.pot),
      tickets: new Map(doc.players.map((player) => [player.address, BigInt(player.tickets)])),
      winner: doc.winner ?? undefined,
      donationAddress: doc.donationAddress ?? undefined,
      distribution: doc.distribution
        ? {
            prize: BigInt(doc.distribution.prize),
            donation: BigInt(doc.distribution.donation),
            commission: BigInt(doc.distribution.commission),
          }
        : undefined,
      settledAt: doc.settledAt ?? undefined,
      paidShares: [...doc.paidShares],
      height: doc.height,
      revision: doc.revision,
      events: doc.events.map((event) => ({
        name: event.name,
        height: event.height,
        at: event.at,
        args: Object.fromEntries(event.args),
      })),
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    });
  }
}
