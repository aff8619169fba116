/**
 * Sentry instrumentation for the tracker API.
 * MUST be imported first in main.ts, before any other imports.
 * Enabled when SENTRY_DSN is set; opt out with DISABLE_TELEMETRY=true.
 */
import * as Sentry from '@sentry/nestjs';
import * as os from 'os';

const dsn = process.env.SENTRY_DSN;
const isProduction = process.env.NODE_ENV === 'production';
const telemetryDisabled = process.env.DISABLE_TELEMETRY === 'true';

/** Client errors are answered at the HTTP edge and never reported. */
const IGNORED_EXCEPTION_TYPES = new Set([
  'BadRequestException',
  'UnauthorizedException',
  'ForbiddenException',
  'NotFoundException',
]);

if (dsn && !telemetryDisabled) {
  Sentry.init({
    dsn,
    environment: isProduction ? 'production' : 'development',
    tracesSampleRate: isProduction ? 0.1 : 1.0,
    beforeSend(event) {
      const exceptionType = event.exception?.values?.[0]?.type;
      if (exceptionType && IGNORED_EXCEPTION_TYPES.has(exceptionType)) {
        return null;
      }
      return event;
    },
    initialScope: {
      tags: {
        deployment: os.hostname(),
      },
    },
  });
}
