import { BadRequestException, ValidationPipe, type INestApplication } from '@nestjs/common';
import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { json } from 'express';
import helmet from 'helmet';
import type { AppEnv } from '../config/env.validation';
import { INVALID_PAYLOAD_MESSAGE } from '../constants/error-messages.constants';
import { HttpExceptionFilter } from '../filters/http-exception.filter';
import { requestIdMiddleware } from '../middleware/request-id.middleware';
import { createLogger } from '../utils/logger';

const bootstrapLogger = createLogger('Bootstrap');

type OriginCallback = (error: Error | null, allow?: boolean) => void;

export type OriginHandler = (origin: string | undefined, callback: OriginCallback) => void;

/**
 * Middleware, pipes, filters and CORS shared by the server bootstrap and the e2e suite.
 * The app must be created with `bodyParser: false`: the JSON parser is mounted here.
 */
export function configureApp(app: INestApplication, env: AppEnv): void {
  app.use(helmet());
  app.use(json({ limit: env.BODY_LIMIT }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  bootstrapLogger.info('cors_configuration', {
    event: 'cors_configuration',
    strict: env.NODE_ENV === 'production',
    allowedOriginsCount: env.ALLOWED_ORIGINS.length,
  });
  app.enableCors(buildCorsOptions(env));
}

/** Production only answers allowlisted origins; other environments reflect any origin. */
export function buildCorsOptions(env: Pick<AppEnv, 'NODE_ENV' | 'ALLOWED_ORIGINS'>): CorsOptions {
  return {
    origin: env.NODE_ENV === 'production' ? originAllowlist(env.ALLOWED_ORIGINS) : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-request-id'],
    exposedHeaders: ['x-request-id'],
  };
}

export function originAllowlist(allowedOrigins: string[]): OriginHandler {
  const allowed = new Set(allowedOrigins.map(normalizeOrigin));

  return (origin, callback) => {
    // Same-origin and server-to-server calls carry no Origin header.
    if (origin === undefined || allowed.has(normalizeOrigin(origin))) {
      callback(null, true);
      return;
    }

    bootstrapLogger.security('cors_origin_rejected', {
      event: 'cors_origin_rejected',
      origin,
    });
    callback(new Error('Origin not allowed by CORS'));
  };
}

/** `scheme://host[:port]`, lowercased, without path or trailing slash. */
export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();

  try {
    const parsed = new URL(trimmed);
    return `${parsed.protocol}//${parsed.host}`.toLowerCase();
  } catch {
    return trimmed.replace(/\/+$/, '').toLowerCase();
  }
}
