import { forwardRef, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { RafflesService } from './application/raffles.service';
import { RafflesController } from './presentation/raffles.controller';
import { RaffleDocument, RaffleSchema } from './infrastructure/schemas/raffle.schema';
import { MongoRaffleRepository } from './infrastructure/repositories/mongo-raffle.repository';
import { BlockEntropySource } from './infrastructure/entropy/block-entropy.source';
import { RedisRaffleLock } from './infrastructure/locks/redis-raffle.lock';
import { RAFFLE_REPOSITORY } from './domain/raffle.repository';
import { RAFFLE_LOCK } from './domain/raffle-lock';
import { ENTROPY_SOURCE } from './domain/entropy';
import { CLOCK, systemClock } from '../common/clock';
import { WalletsModule } from '../wallets/wallets.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: RaffleDocument.name, schema: RaffleSchema },
    ]),
    forwardRef(() => WalletsModule),
  ],
  controllers: [RafflesController],
  providers: [
    RafflesService,
    {
      provide: RAFFLE_REPOSITORY,
      useClass: MongoRaffleRepository,
    },
    {
      provide: RAFFLE_LOCK,
      useClass: RedisRaffleLock,
    },
    {
      provide: ENTROPY_SOURCE,
      useClass: BlockEntropySource,
    },
    {
      provide: CLOCK,
      useValue: systemClock,
    },
  ],
  exports: [RafflesService],
})
export class RafflesModule {}
