import { loadTrackerConfig, parseExportTimeout } from './tracker.config';

function load(env: Record<string, string>) {
  return loadTrackerConfig((key) => env[key]);
}

describe('loadTrackerConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(load({})).toEqual({
      timezone: 'UTC',
      qualifyMinSeconds: 300,
      checkpointIntervalSeconds: 600,
      rosterPollSeconds: 30,
      dailyPostTime: { hour: 22, minute: 0 },
      boardDisplayLimit: 10,
      complimentsEnabled: true,
      quoteOfTheDayEnabled: true,
      minDailySeconds: 0,
      trackBots: false,
      aliasGroupsJson: '{}',
      discord: {
        token: null,
        guildId: null,
        voiceChannelId: null,
        postChannelId: null,
      },
      export: { enabled: false, url: null, secret: null, timeoutMs: 1500 },
      adminApiToken: null,
    });
  });

  it('reads overrides', () => {
    const config = load({
      TRACKER_TIMEZONE: 'Europe/Berlin',
      QUALIFY_MIN_SECONDS: '120',
      DAILY_POST_TIME: '7:05',
      COMPLIMENTS_ENABLED: 'off',
      QUOTE_OF_THE_DAY_ENABLED: 'false',
      MIN_DAILY_SECONDS: '900',
      TRACK_BOTS: 'YES',
      DISCORD_VOICE_CHANNEL_ID: ' v1 ',
      DISCORD_POST_CHANNEL_ID: '',
      LEADERBOARD_WEB_EXPORT_ENABLED: 'true',
      LEADERBOARD_INGEST_URL: 'https://board.example.test/ingest',
      LEADERBOARD_INGEST_SECRET: 'test-secret',
      LEADERBOARD_EXPORT_TIMEOUT_MS: '-5',
    });

    expect(config.timezone).toBe('Europe/Berlin');
    expect(config.qualifyMinSeconds).toBe(120);
    expect(config.dailyPostTime).toEqual({ hour: 7, minute: 5 });
    expect(config.complimentsEnabled).toBe(false);
    expect(config.quoteOfTheDayEnabled).toBe(false);
    expect(config.minDailySeconds).toBe(900);
    expect(config.trackBots).toBe(true);
    expect(config.discord.voiceChannelId).toBe('v1');
    expect(config.discord.postChannelId).toBeNull();
    expect(config.export).toEqual({
      enabled: true,
      url: 'https://board.example.test/ingest',
      secret: 'test-secret',
      timeoutMs: 0,
    });
  });

  it('rejects an unknown time zone', () => {
    expect(() => load({ TRACKER_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'Invalid tracker configuration: TRACKER_TIMEZONE: Unknown IANA time zone',
    );
  });

  it('rejects a malformed post time', () => {
    expect(() => load({ DAILY_POST_TIME: '24:00' })).toThrow(
      'Invalid tracker configuration: DAILY_POST_TIME: Expected HH:MM',
    );
  });

  it('rejects a non-positive threshold', () => {
    expect(() => load({ QUALIFY_MIN_SECONDS: '0' })).toThrow(
      /^Invalid tracker configuration: QUALIFY_MIN_SECONDS: /,
    );
  });
});

describe('parseExportTimeout', () => {
  it('defaults to 1500 when unset or unparsable', () => {
    expect(parseExportTimeout(undefined)).toBe(1500);
    expect(parseExportTimeout('soon')).toBe(1500);
  });

  it('clamps negatives to zero', () => {
    expect(parseExportTimeout('-250')).toBe(0);
  });

  it('reads whole milliseconds', () => {
    expect(parseExportTimeout(' 2500 ')).toBe(2500);
  });
});
