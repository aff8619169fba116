import { Inject, Injectable, Logger } from '@nestjs/common';
import type { LeaderboardSnapshotDto } from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../../config/tracker.config';
import type { LeaderboardSink } from '../../leaderboard/leaderboard.constants';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { LeaderboardEmbedFactory } from './leaderboard-embed.factory';

/** Posts leaderboard snapshots to DISCORD_POST_CHANNEL_ID. */
@Injectable()
export class DiscordLeaderboardSink implements LeaderboardSink {
  private readonly logger = new Logger(DiscordLeaderboardSink.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly embedFactory: LeaderboardEmbedFactory,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  async deliver(snapshot: LeaderboardSnapshotDto): Promise<void> {
    const channelId = this.config.discord.postChannelId;
    if (!channelId) {
      throw new Error('DISCORD_POST_CHANNEL_ID is not configured');
    }

    const embed = this.embedFactory.buildLeaderboardEmbed(snapshot);
    const message = await this.clientService.sendEmbed(channelId, embed);
    this.logger.log(
      `Posted leaderboard for ${snapshot.referenceDate} to ${channelId} (message ${message.id})`,
    );
  }
}
