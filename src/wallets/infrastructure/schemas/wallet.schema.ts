import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

@Schema({ collection: 'wallets', timestamps: true })
export class WalletDocument extends Document {
  @Prop({ required: true })
  asset!: string;

  @Prop({ required: true, index: true })
  account!: string;

  @Prop({ type: Types.Decimal128, required: true, default: () => Types.Decimal128.fromString('0') })
  balance!: Types.Decimal128;
}

export const WalletSchema = SchemaFactory.createForClass(WalletDocument);

WalletSchema.index({ asset: 1, account: 1 }, { unique: true });
