import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { describeError } from './common/errors/engine.errors';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`Движок распределения капитала запущен на порту: ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Запуск прерван: ${describeError(error)}`);
  process.exit(1);
});
