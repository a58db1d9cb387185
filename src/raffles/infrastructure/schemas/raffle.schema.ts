import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';
import { BundleTier } from '../../domain/bundle';
import { PayoutShare, RaffleEventName } from '../../domain/raffle.entity';

// Amounts are bigints and are stored as decimal strings

@Schema({ _id: false })
export class CurrencyEntry {
  @Prop({ required: true, enum: ['native', 'token'] })
  kind!: 'native' | 'token';

  @Prop()
  token?: string;
}

@Schema({ _id: false })
export class BundleEntry {
  @Prop({ required: true, enum: Object.values(BundleTier) })
  tier!: BundleTier;

  @Prop({ required: true })
  amount!: string;

  @Prop({ required: true })
  price!: string;
}

@Schema({ _id: false })
export class PlayerEntry {
  @Prop({ required: true })
  address!: string;

  @Prop({ required: true })
  tickets!: string;
}

@Schema({ _id: false })
export class DistributionEntry {
  @Prop({ required: true })
  prize!: string;

  @Prop({ required: true })
  donation!: string;

  @Prop({ required: true })
  commission!: string;
}

@Schema({ _id: false })
export class EventEntry {
  @Prop({ required: true })
  name!: RaffleEventName;

  @Prop({ required: true })
  height!: number;

  @Prop({ required: true })
  at!: Date;

  @Prop({ type: Map, of: String, default: {} })
  args!: Map<string, string>;
}

@Schema({ collection: 'raffles' })
export class RaffleDocument extends Document<Types.ObjectId> {
  @Prop({ required: true, unique: true })
  address!: string;

  @Prop({ required: true, index: true })
  owner!: string;

  @Prop({ type: SchemaFactory.createForClass(CurrencyEntry), required: true })
  currency!: CurrencyEntry;

  @Prop({ required: true, min: 0 })
  decimals!: number;

  @Prop({ required: true })
  ticketPrice!: string;

  @Prop({ type: [SchemaFactory.createForClass(BundleEntry)], required: true })
  bundles!: BundleEntry[];

  @Prop()
  fixedPrize?: string;

  @Prop({ required: true, min: 0, max: 100 })
  donationPercent!: number;

  @Prop({ required: true })
  raffleEndDate!: Date;

  @Prop({ required: true, default: '0' })
  pot!: string;

  // Insertion order is the order of the weighted scan
  @Prop({ type: [SchemaFactory.createForClass(PlayerEntry)], default: [] })
  players!: PlayerEntry[];

  @Prop()
  winner?: string;

  @Prop()
  donationAddress?: string;

  @Prop({ type: SchemaFactory.createForClass(DistributionEntry) })
  distribution?: DistributionEntry;

  @Prop()
  settledAt?: Date;

  @Prop({ type: [String], enum: ['prize', 'donation', 'commission'], default: [] })
  paidShares!: PayoutShare[];

  @Prop({ required: true, default: 0 })
  height!: number;

  @Prop({ required: true, default: 0 })
  revision!: number;

  @Prop({ type: [SchemaFactory.createForClass(EventEntry)], default: [] })
  events!: EventEntry[];

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export const RaffleSchema = SchemaFactory.createForClass(RaffleDocument);
