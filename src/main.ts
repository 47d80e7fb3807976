import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const cfg = app.get(ConfigService);

  // les documents complets dépassent la limite express par défaut (100kb)
  app.useBodyParser('json', { limit: cfg.get<string>('BODY_LIMIT') || '5mb' });
  app.enableShutdownHooks();

  const port = Number(cfg.get<string>('PORT') ?? 3000);
  await app.listen(port);
  Logger.log(`listening on :${port}`, 'Bootstrap');
}

bootstrap().catch((e) => {
  const msg = e instanceof Error ? e.message : String(e);
  console.error('Startup failed:', msg);
  process.exit(1);
});
