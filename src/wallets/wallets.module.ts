import { forwardRef, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { WalletDocument, WalletSchema } from './infrastructure/schemas/wallet.schema';
import { AllowanceDocument, AllowanceSchema } from './infrastructure/schemas/allowance.schema';
import { MongoWalletRepository } from './infrastructure/repositories/mongo-wallet.repository';
import { WALLET_REPOSITORY } from './domain/wallet.repository';
import { CURRENCY_PORT } from './domain/currency.port';
import { WalletsService } from './application/wallets.service';
import { WalletsController } from './presentation/wallets.controller';
import { RafflesModule } from '../raffles/raffles.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: WalletDocument.name, schema: WalletSchema },
      { name: AllowanceDocument.name, schema: AllowanceSchema },
    ]),
    forwardRef(() => RafflesModule),
  ],
  controllers: [WalletsController],
  providers: [
    WalletsService,
    {
      provide: WALLET_REPOSITORY,
      useClass: MongoWalletRepository,
    },
    {
      provide: CURRENCY_PORT,
      useExisting: WalletsService,
    },
  ],
  exports: [WalletsService, CURRENCY_PORT],
})
export class WalletsModule {}
