import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseModule } from './database/database.module';
import { RedisModule } from './redis/redis.module';
import { AuthModule } from './auth/auth.module';
import { WalletsModule } from './wallets/wallets.module';
import { RafflesModule } from './raffles/raffles.module';

@Module({
  imports: [
    RedisModule,
    DatabaseModule,
    AuthModule,
    WalletsModule,
    RafflesModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
