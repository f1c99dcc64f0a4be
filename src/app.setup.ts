import { LogLevel, ValidationPipe } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { UserNotFoundFilter } from './instagram/user-not-found.filter';

export function logLevels(debug: boolean): LogLevel[] {
  return debug ? ['error', 'warn', 'log', 'debug', 'verbose'] : ['error', 'warn', 'log'];
}

/**
 * Pipes, filters and response headers shared by the server and the
 * HTTP-level tests.
 */
export function configureApp(app: NestFastifyApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
    }),
  );

  app.useGlobalFilters(new UserNotFoundFilter(app.get(HttpAdapterHost)));

  app.getHttpAdapter().getInstance().addHook('onSend', async (_request, reply) => {
    reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('X-XSS-Protection', '1; mode=block');
  });
}

export function corsOptions(origins: string) {
  const allowedOrigins = origins.split(',').map((origin) => origin.trim()).filter(Boolean);
  const wildcard = allowedOrigins.length === 0 || allowedOrigins.includes('*');

  return {
    origin: wildcard ? true : allowedOrigins,
    // credentials cannot be combined with a wildcard origin
    credentials: !wildcard,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Requested-With'],
    preflightContinue: false,
    optionsSuccessStatus: 204,
  };
}
