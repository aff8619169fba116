import {
  makeEntry,
  makeSnapshot,
} from '../../common/testing/leaderboard-fixtures';
import { EMBED_COLORS } from '../discord-bot.constants';
import {
  EMPTY_BOARD_TEXT,
  FIELD_VALUE_LIMIT,
  LeaderboardEmbedFactory,
  dayFlare,
  rankIcon,
} from './leaderboard-embed.factory';

describe('LeaderboardEmbedFactory', () => {
  const factory = new LeaderboardEmbedFactory();

  it('renders one field per board', () => {
    const json = factory.buildLeaderboardEmbed(makeSnapshot()).toJSON();

    expect(json.title).toBe('📊 LEADERBOARD - DAY 3 🔥');
    expect(json.color).toBe(EMBED_COLORS.LEADERBOARD);
    expect(json.timestamp).toBe('2024-03-03T22:00:00.000Z');
    expect(json.footer?.text).toBe('Includes the call in progress');
    expect(json.fields).toEqual([
      {
        name: '📅 Today - 03.03.24 (SUNDAY)',
        value: '🥇 **@alice** - 75m 💪\n🥈 **Bob** - 12m ✅',
      },
      {
        name: '📆 This Week - 01.03.24 - 07.03.24 (WEEK 1)',
        value: '🥇 **@alice** - 200m 🚀',
      },
      {
        name: '🗓️ This Month - 01.03.24 - 30.03.24 (MONTH 1)',
        value: EMPTY_BOARD_TEXT,
      },
    ]);
  });

  it('appends compliments in italics', () => {
    const snapshot = makeSnapshot();
    snapshot.boards[1].entries = [
      makeEntry({ compliment: 'Steady as a metronome.' }),
    ];

    const json = factory.buildLeaderboardEmbed(snapshot).toJSON();

    expect(json.fields?.[1].value).toBe(
      '🥇 **@alice** - 75m 💪 - *Steady as a metronome.*',
    );
  });

  it('uses the muted color and no footer for an empty historical post', () => {
    const snapshot = makeSnapshot({ live: false });
    for (const board of snapshot.boards) board.entries = [];

    const json = factory.buildLeaderboardEmbed(snapshot).toJSON();

    expect(json.color).toBe(EMBED_COLORS.EMPTY);
    expect(json.footer).toBeUndefined();
    expect(json.fields?.map((f) => f.value)).toEqual([
      EMPTY_BOARD_TEXT,
      EMPTY_BOARD_TEXT,
      EMPTY_BOARD_TEXT,
    ]);
  });

  it('adds the word of the day as a spoiler', () => {
    const json = factory
      .buildLeaderboardEmbed(makeSnapshot({ quote: 'Small rooms, big focus.' }))
      .toJSON();

    expect(json.fields).toHaveLength(4);
    expect(json.fields?.[3]).toEqual({
      name: 'WORD OF THE DAY 🌟',
      value: '||***Small rooms, big focus.***||',
    });
  });

  it('keeps long boards within the field limit', () => {
    const snapshot = makeSnapshot();
    snapshot.boards[0].entries = Array.from({ length: 20 }, (_, i) =>
      makeEntry({ rank: i + 1, displayName: 'x'.repeat(100) }),
    );

    const value = factory.buildLeaderboardEmbed(snapshot).toJSON().fields?.[0]
      .value;

    expect(value?.length).toBeLessThanOrEqual(FIELD_VALUE_LIMIT);
    expect(value?.startsWith('🥇 **')).toBe(true);
  });
});

describe('rankIcon', () => {
  it.each([
    [1, '🥇'],
    [3, '🥉'],
    [4, '4️⃣'],
    [10, '🔟'],
    [11, '11.'],
  ])('rank %i -> %s', (rank, icon) => {
    expect(rankIcon(rank)).toBe(icon);
  });
});

describe('dayFlare', () => {
  it('wraps around in both directions', () => {
    expect(dayFlare(1)).toBe('💥');
    expect(dayFlare(16)).toBe('💥');
    expect(dayFlare(0)).toBe('💎');
  });
});
