import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Client,
  GatewayIntentBits,
  Events,
  type Channel,
  type EmbedBuilder,
  type Message,
} from 'discord.js';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

const CONNECT_TIMEOUT_MS = 15_000;

@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private client: Client | null = null;
  private connecting = false;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  async connect(token: string): Promise<void> {
    // Disconnect any existing client first
    if (this.client) {
      await this.disconnect();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMembers,
      ],
    });
    this.client = client;
    this.connecting = true;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.connecting = false;
        reject(new Error('Discord bot connection timed out after 15s'));
      }, CONNECT_TIMEOUT_MS);

      client.once(Events.ClientReady, () => {
        clearTimeout(timeout);
        this.connecting = false;
        this.logger.log(`Discord bot connected as ${client.user?.tag}`);

        // emitAsync so async CONNECTED handlers (roster source attach) finish
        // before connect() resolves. Handler errors do not reject connect().
        this.eventEmitter
          .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
          .catch((err: unknown) => {
            this.logger.error(
              'Error in CONNECTED event handlers:',
              err instanceof Error ? err.message : err,
            );
          })
          .finally(() => {
            resolve();
          });
      });

      client.once(Events.Error, (error: Error) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(error);
        this.logger.error('Discord bot connection error:', message);
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
        reject(new Error(message));
      });

      client.login(token).catch((err: unknown) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(err);
        this.logger.error('Discord bot login failed:', message);
        this.client = null;
        reject(new Error(message));
      });
    });
  }

  async disconnect(): Promise<void> {
    this.connecting = false;

    if (!this.client) return;

    try {
      await this.client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    } finally {
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isReady() ?? false;
  }

  /**
   * Get the underlying Discord.js Client instance.
   * Used by listeners to register gateway handlers.
   */
  getClient(): Client | null {
    return this.client;
  }

  isConnecting(): boolean {
    return this.connecting;
  }

  /** Fetch a channel, bypassing the cache so member lists are current. */
  async fetchChannel(channelId: string): Promise<Channel | null> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }
    return this.client.channels.fetch(channelId, { force: true });
  }

  /**
   * Send an embed message to a specific channel.
   * @returns The sent Message object
   */
  async sendEmbed(channelId: string, embed: EmbedBuilder): Promise<Message> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }

    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }

    return channel.send({ embeds: [embed] });
  }
}
