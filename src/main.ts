import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './database/config.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  await app.listen(configService.port);
  Logger.log(`Raffle Ledger listening on port ${configService.port} (${configService.nodeEnv})`, 'Bootstrap');
}

bootstrap().catch((error) => {
  Logger.error('Failed to start', error, 'Bootstrap');
  process.exit(1);
});
