import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

@Schema({ collection: 'allowances', timestamps: true })
export class AllowanceDocument extends Document {
  @Prop({ required: true })
  asset!: string;

  @Prop({ required: true })
  owner!: string;

  @Prop({ required: true })
  spender!: string;

  @Prop({ type: Types.Decimal128, required: true })
  amount!: Types.Decimal128;
}

export const AllowanceSchema = SchemaFactory.createForClass(AllowanceDocument);

AllowanceSchema.index({ asset: 1, owner: 1, spender: 1 }, { unique: true });
