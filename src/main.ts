import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { errorStack } from './common/errors';
import { JSON_BODY_LIMIT, NODE_ENV, PORT } from './env';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule);

  // Un track de varias horas a 1 Hz supera el límite por defecto de express
  app.useBodyParser('json', { limit: JSON_BODY_LIMIT });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.enableShutdownHooks();

  await app.listen(PORT);
  logger.log(`ride-analyzer listening on port ${PORT} (${NODE_ENV})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', errorStack(error));
  process.exit(1);
});
