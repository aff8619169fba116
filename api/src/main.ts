// Sentry instrumentation MUST be imported first, before any other modules.
import './sentry/instrument';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import type { LogLevel } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { PerfLoggingInterceptor } from './common/perf-logging.interceptor';
import { SentryExceptionFilter } from './sentry/sentry-exception.filter';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });

  // Security headers (X-Content-Type-Options, X-Frame-Options, HSTS, etc.)
  app.use(helmet());

  // Trust first proxy hop so req.protocol honors X-Forwarded-Proto
  if (process.env.NODE_ENV === 'production') {
    app.getHttpAdapter().getInstance().set('trust proxy', 1);
  }

  app.useGlobalInterceptors(new PerfLoggingInterceptor());
  app.useGlobalFilters(new SentryExceptionFilter());

  // Shutdown hooks finalize the call in progress before the process exits
  app.enableShutdownHooks();

  await app.listen(process.env.PORT ?? 3000);
}
void bootstrap();
