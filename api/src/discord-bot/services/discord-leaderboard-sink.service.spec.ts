import { Test } from '@nestjs/testing';
import { EmbedBuilder } from 'discord.js';
import { TRACKER_CONFIG, TrackerConfig } from '../../config/tracker.config';
import { makeSnapshot } from '../../common/testing/leaderboard-fixtures';
import { makeTrackerConfig } from '../../common/testing/tracker-config';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DiscordLeaderboardSink } from './discord-leaderboard-sink.service';
import { LeaderboardEmbedFactory } from './leaderboard-embed.factory';

describe('DiscordLeaderboardSink', () => {
  let mockClientService: { sendEmbed: jest.Mock };

  async function create(
    discord: Partial<TrackerConfig['discord']> = {},
  ): Promise<DiscordLeaderboardSink> {
    const module = await Test.createTestingModule({
      providers: [
        DiscordLeaderboardSink,
        LeaderboardEmbedFactory,
        { provide: DiscordBotClientService, useValue: mockClientService },
        {
          provide: TRACKER_CONFIG,
          useValue: makeTrackerConfig({
            discord: {
              token: 'test-token',
              guildId: 'g1',
              voiceChannelId: 'v1',
              postChannelId: 't1',
              ...discord,
            },
          }),
        },
      ],
    }).compile();
    return module.get(DiscordLeaderboardSink);
  }

  beforeEach(() => {
    mockClientService = {
      sendEmbed: jest.fn().mockResolvedValue({ id: 'm1' }),
    };
  });

  it('posts the rendered embed to the post channel', async () => {
    const sink = await create();

    await sink.deliver(makeSnapshot());

    expect(mockClientService.sendEmbed).toHaveBeenCalledWith(
      't1',
      expect.any(EmbedBuilder),
    );
    const embed: EmbedBuilder = mockClientService.sendEmbed.mock.calls[0][1];
    expect(embed.toJSON().title).toBe('📊 LEADERBOARD - DAY 3 🔥');
  });

  it('fails without a post channel', async () => {
    const sink = await create({ postChannelId: null });

    await expect(sink.deliver(makeSnapshot())).rejects.toThrow(
      'DISCORD_POST_CHANNEL_ID is not configured',
    );
    expect(mockClientService.sendEmbed).not.toHaveBeenCalled();
  });

  it('propagates send failures', async () => {
    mockClientService.sendEmbed.mockRejectedValueOnce(
      new Error('Discord bot is not connected'),
    );
    const sink = await create();

    await expect(sink.deliver(makeSnapshot())).rejects.toThrow(
      'Discord bot is not connected',
    );
  });
});
