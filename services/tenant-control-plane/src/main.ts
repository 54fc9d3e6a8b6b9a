import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { type AppConfig, appConfig } from './config';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });

  app.enableShutdownHooks();

  const logger = app.get(Logger);
  app.useLogger(logger);

  const { port } = app.get<AppConfig>(appConfig.KEY);
  await app.listen(port);
  logger.log(`Server is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new NestLogger('Bootstrap').error('Failed to start tenant control plane', error);
  process.exitCode = 1;
});
