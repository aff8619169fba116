import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import {
  ROSTER_EVENTS,
  RosterSourceReadyPayload,
} from '../tracker/tracker.constants';
import { DiscordBotClientService } from './discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from './discord-bot.constants';

@Injectable()
export class DiscordBotService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(DiscordBotService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  /**
   * Auto-connect on startup if a token is configured. Not awaited:
   * `@OnEvent` listeners are only attached during bootstrap, and CONNECTED
   * must reach them.
   */
  onApplicationBootstrap(): void {
    void this.connectOnStartup();
  }

  async connectOnStartup(): Promise<void> {
    const { token, guildId, voiceChannelId } = this.config.discord;
    if (!token) {
      this.logger.warn('DISCORD_BOT_TOKEN not set; roster stays unknown');
      return;
    }
    if (!guildId || !voiceChannelId) {
      this.logger.warn(
        'DISCORD_GUILD_ID / DISCORD_VOICE_CHANNEL_ID not set; no call is tracked',
      );
    }

    try {
      this.logger.log('Discord bot token configured, connecting...');
      await this.clientService.connect(token);
    } catch (error) {
      this.logger.error(
        'Failed to auto-connect Discord bot on startup:',
        error instanceof Error ? error.message : error,
      );
    }
  }

  /**
   * Graceful shutdown.
   */
  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }

  /** Tell the tracker which group it is attached to. */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async handleConnected(): Promise<void> {
    const groupKey = this.groupKey();
    if (!groupKey) return;

    const payload: RosterSourceReadyPayload = { groupKey };
    await this.eventEmitter.emitAsync(ROSTER_EVENTS.SOURCE_READY, payload);
  }

  /** `<guildId>:<channelId>`, or null when either is unset. */
  groupKey(): string | null {
    const { guildId, voiceChannelId } = this.config.discord;
    if (!guildId || !voiceChannelId) return null;
    return `${guildId}:${voiceChannelId}`;
  }
}
