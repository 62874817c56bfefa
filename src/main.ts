import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { validateEnv } from './common/config/env.validation';
import { configureApp } from './common/http/configure-app';
import { createLogger, logger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  logger.boot('Venue sanitizer service');

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureApp(app, validatedEnv);

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Venue sanitizer service listening on port ${validatedEnv.PORT}`);
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap venue sanitizer service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
