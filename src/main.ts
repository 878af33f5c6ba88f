import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('app.port') ?? 3000;
  await app.listen(port);
  Logger.log(`🚀 listening on :${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    `bootstrap failed: ${err instanceof Error ? err.message : String(err)}`,
    'Bootstrap',
  );
  process.exit(1);
});
