type InitOptions = Record<string, unknown>;
type BeforeSend = (
  event: Record<string, unknown>,
) => Record<string, unknown> | null;

function loadInstrument(env: Record<string, string | undefined> = {}): {
  sentryInitMock: jest.MockedFunction<(options?: InitOptions) => void>;
} {
  const saved: Record<string, string | undefined> = {};
  for (const key of ['NODE_ENV', 'SENTRY_DSN', 'DISABLE_TELEMETRY']) {
    saved[key] = process.env[key];
    if (env[key] === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = env[key];
    }
  }

  jest.resetModules();
  jest.mock('@sentry/nestjs', () => ({
    init: jest.fn(),
  }));

  // Re-require to trigger module-level side effects
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  require('./instrument');
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  const sentry = require('@sentry/nestjs') as {
    init: jest.MockedFunction<(options?: InitOptions) => void>;
  };

  for (const key of Object.keys(saved)) {
    if (saved[key] === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = saved[key];
    }
  }

  return { sentryInitMock: sentry.init };
}

const TEST_DSN = 'https://public@sentry.example.test/1';

describe('Sentry instrument.ts', () => {
  afterEach(() => {
    jest.resetModules();
  });

  describe('with a DSN configured', () => {
    let config: InitOptions;

    beforeEach(() => {
      const { sentryInitMock } = loadInstrument({ SENTRY_DSN: TEST_DSN });
      expect(sentryInitMock).toHaveBeenCalledTimes(1);
      config = sentryInitMock.mock.calls[0][0] as InitOptions;
    });

    it('passes the DSN through', () => {
      expect(config['dsn']).toBe(TEST_DSN);
    });

    it('samples every trace outside production', () => {
      expect(config['tracesSampleRate']).toBe(1.0);
      expect(config['environment']).toBe('development');
    });

    it('drops client-error exceptions', () => {
      const beforeSend = config['beforeSend'] as BeforeSend;

      expect(
        beforeSend({ exception: { values: [{ type: 'ForbiddenException' }] } }),
      ).toBeNull();
    });

    it('keeps store failures', () => {
      const beforeSend = config['beforeSend'] as BeforeSend;
      const event = { exception: { values: [{ type: 'DurationStoreError' }] } };

      expect(beforeSend(event)).toBe(event);
    });
  });

  it('samples 10% of traces in production', () => {
    const { sentryInitMock } = loadInstrument({
      SENTRY_DSN: TEST_DSN,
      NODE_ENV: 'production',
    });

    const config = sentryInitMock.mock.calls[0][0] as InitOptions;
    expect(config['tracesSampleRate']).toBe(0.1);
    expect(config['environment']).toBe('production');
  });

  it('stays off without a DSN', () => {
    const { sentryInitMock } = loadInstrument({});

    expect(sentryInitMock).not.toHaveBeenCalled();
  });

  it('stays off when DISABLE_TELEMETRY=true', () => {
    const { sentryInitMock } = loadInstrument({
      SENTRY_DSN: TEST_DSN,
      DISABLE_TELEMETRY: 'true',
    });

    expect(sentryInitMock).not.toHaveBeenCalled();
  });
});
