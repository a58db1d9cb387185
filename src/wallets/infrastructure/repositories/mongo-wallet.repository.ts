import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { IWalletRepository } from '../../domain/wallet.repository';
import { AllowanceDocument } from '../schemas/allowance.schema';
import { WalletDocument } from '../schemas/wallet.schema';
import { fromDecimal128, toDecimal128 } from '../decimal';

@Injectable()
export class MongoWalletRepository implements IWalletRepository {
  constructor(
    @InjectModel(WalletDocument.name)
    private readonly walletModel: Model<WalletDocument>,
    @InjectModel(AllowanceDocument.name)
    private readonly allowanceModel: Model<AllowanceDocument>,
  ) {}

  async getBalance(asset: string, account: string): Promise<bigint> {
    const doc = await this.walletModel.findOne({ asset, account }).exec();
    return doc ? fromDecimal128(doc.balance) : 0n;
  }

  async credit(asset: string, account: string, amount: bigint): Promise<void> {
    await this.walletModel
      .updateOne({ asset, account }, { $inc: { balance: toDecimal128(amount) } }, { upsert: true })
      .exec();
  }

  async debit(asset: string, account: string, amount: bigint): Promise<boolean> {
    // The $gte guard and the $inc run as one document update
    const result = await this.walletModel
      .updateOne(
        { asset, account, balance: { $gte: toDecimal128(amount) } },
        { $inc: { balance: toDecimal128(-amount) } },
      )
      .exec();
    return result.modifiedCount === 1;
  }

  async getAllowance(asset: string, owner: string, spender: string): Promise<bigint> {
    const doc = await this.allowanceModel.findOne({ asset, owner, spender }).exec();
    return doc ? fromDecimal128(doc.amount) : 0n;
  }

  async setAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void> {
    await this.allowanceModel
      .updateOne(
        { asset, owner, spender },
        { $set: { amount: toDecimal128(amount) } },
        { upsert: true },
      )
      .exec();
  }

  async spendAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<boolean> {
    const result = await this.allowanceModel
      .updateOne(
        { asset, owner, spender, amount: { $gte: toDecimal128(amount) } },
        { $inc: { amount: toDecimal128(-amount) } },
      )
      .exec();
    return result.modifiedCount === 1;
  }

  async restoreAllowance(asset: string, owner: string, spender: string, amount: bigint): Promise<void> {
    await this.allowanceModel
      .updateOne({ asset, owner, spender }, { $inc: { amount: toDecimal128(amount) } }, { upsert: true })
      .exec();
  }
}
