import type { TrackerConfig } from '../../config/tracker.config';

/** TrackerConfig with the documented defaults, overridable per test. */
export function makeTrackerConfig(
  overrides: Partial<TrackerConfig> = {},
): TrackerConfig {
  return {
    timezone: 'UTC',
    qualifyMinSeconds: 300,
    checkpointIntervalSeconds: 600,
    rosterPollSeconds: 30,
    dailyPostTime: { hour: 22, minute: 0 },
    boardDisplayLimit: 10,
    complimentsEnabled: false,
    quoteOfTheDayEnabled: false,
    minDailySeconds: 0,
    trackBots: false,
    aliasGroupsJson: '{}',
    discord: {
      token: null,
      guildId: null,
      voiceChannelId: null,
      postChannelId: null,
    },
    export: {
      enabled: false,
      url: null,
      secret: null,
      timeoutMs: 1500,
    },
    adminApiToken: null,
    ...overrides,
  };
}
