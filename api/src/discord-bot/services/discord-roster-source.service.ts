import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ChannelType, type Channel, type GuildMember } from 'discord.js';
import { TRACKER_CONFIG, TrackerConfig } from '../../config/tracker.config';
import type {
  RosterMember,
  RosterReading,
  RosterSource,
} from '../../tracker/roster-source';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { withBackoff } from '../utils/backoff';

export const CHANNEL_FETCH_ATTEMPTS = 4;
export const CHANNEL_FETCH_BASE_DELAY_MS = 500;

/**
 * Reads the tracked voice (or stage) channel as a roster.
 *
 * A live stage keeps its stage instance id as call id. Otherwise a call is
 * the stretch during which the channel has anyone in it: an occupancy id is
 * minted on the first member and dropped when the channel empties.
 */
@Injectable()
export class DiscordRosterSource implements RosterSource {
  private readonly logger = new Logger(DiscordRosterSource.name);
  private occupancyId: string | null = null;

  constructor(
    private readonly clientService: DiscordBotClientService,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  async read(): Promise<RosterReading> {
    const { guildId, voiceChannelId } = this.config.discord;
    if (!voiceChannelId) {
      return { status: 'unknown', reason: 'no voice channel configured' };
    }
    if (!this.clientService.isConnected()) {
      return { status: 'unknown', reason: 'discord not connected' };
    }

    let channel: Channel | null;
    try {
      channel = await withBackoff(
        () => this.clientService.fetchChannel(voiceChannelId),
        {
          attempts: CHANNEL_FETCH_ATTEMPTS,
          baseDelayMs: CHANNEL_FETCH_BASE_DELAY_MS,
          jitterMs: 250,
          onRetry: (attempt, delayMs, error) =>
            this.logger.warn(
              `Channel fetch failed (attempt ${attempt}/${CHANNEL_FETCH_ATTEMPTS}): ${error instanceof Error ? error.message : String(error)}; retrying in ${Math.round(delayMs)}ms`,
            ),
        },
      );
    } catch (error) {
      return {
        status: 'unknown',
        reason: `channel fetch failed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!channel || !channel.isVoiceBased()) {
      return {
        status: 'unknown',
        reason: `channel ${voiceChannelId} is not a voice channel`,
      };
    }
    if (guildId && channel.guildId !== guildId) {
      return {
        status: 'unknown',
        reason: `channel ${voiceChannelId} belongs to guild ${channel.guildId}`,
      };
    }

    const members = channel.members
      .filter((member) => this.config.trackBots || !member.user.bot)
      .map((member) => this.toRosterMember(member));

    const stage =
      channel.type === ChannelType.GuildStageVoice
        ? channel.stageInstance
        : null;
    if (stage) {
      return { status: 'observed', callId: `stage:${stage.id}`, members };
    }

    if (members.length === 0) {
      this.occupancyId = null;
    } else if (!this.occupancyId) {
      this.occupancyId = `occupancy:${randomUUID()}`;
    }
    return { status: 'observed', callId: this.occupancyId, members };
  }

  private toRosterMember(member: GuildMember): RosterMember {
    return {
      userId: member.id,
      displayName: member.displayName,
      username: member.user.username,
    };
  }
}
