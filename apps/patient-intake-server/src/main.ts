import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app/app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });
  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  const port = process.env.PORT || 3001;
  await app.listen(port);
  Logger.log(`Patient intake server is running on: http://localhost:${port}/${globalPrefix}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
