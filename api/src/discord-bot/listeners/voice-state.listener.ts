import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { Events, type StageInstance, type VoiceState } from 'discord.js';
import { TRACKER_CONFIG, TrackerConfig } from '../../config/tracker.config';
import { ROSTER_EVENTS } from '../../tracker/tracker.constants';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';

/** Collapse bursts of voice updates into one roster refresh. */
export const DEBOUNCE_MS = 2000;

/**
 * Listens for `voiceStateUpdate` and stage start/end on the tracked channel
 * and asks the tracker loop for a refresh.
 *
 * Registers on bot connect, unregisters on disconnect. Mute, deafen and
 * stream toggles (same channel before and after) are ignored.
 */
@Injectable()
export class VoiceStateListener {
  private readonly logger = new Logger(VoiceStateListener.name);

  /** Bound handler references for cleanup */
  private voiceHandler:
    | ((oldState: VoiceState, newState: VoiceState) => void)
    | null = null;
  private stageHandler: ((stage: StageInstance) => void) | null = null;

  private debounceTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  onBotConnected(): void {
    const client = this.clientService.getClient();
    if (!client) return;

    // Remove any existing handlers first (handles reconnects)
    this.removeHandlers();

    this.voiceHandler = (oldState, newState) =>
      this.handleVoiceStateUpdate(oldState, newState);
    this.stageHandler = (stage) => this.handleStageChange(stage);

    client.on(Events.VoiceStateUpdate, this.voiceHandler);
    client.on(Events.StageInstanceCreate, this.stageHandler);
    client.on(Events.StageInstanceDelete, this.stageHandler);
    this.logger.log('Registered voiceStateUpdate listener for the tracked call');
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  onBotDisconnected(): void {
    this.removeHandlers();
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  handleVoiceStateUpdate(oldState: VoiceState, newState: VoiceState): void {
    const tracked = this.config.discord.voiceChannelId;
    if (!tracked) return;
    if (oldState.channelId === newState.channelId) return;
    if (oldState.channelId !== tracked && newState.channelId !== tracked) {
      return;
    }

    const verb = newState.channelId === tracked ? 'joined' : 'left';
    this.logger.debug(`${newState.id} ${verb} the tracked channel`);
    this.scheduleRefresh();
  }

  handleStageChange(stage: StageInstance): void {
    if (stage.channelId !== this.config.discord.voiceChannelId) return;
    this.scheduleRefresh();
  }

  private scheduleRefresh(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.eventEmitter.emit(ROSTER_EVENTS.CHANGED);
    }, DEBOUNCE_MS);
  }

  private removeHandlers(): void {
    const client = this.clientService.getClient();
    if (client && this.voiceHandler) {
      client.removeListener(Events.VoiceStateUpdate, this.voiceHandler);
    }
    if (client && this.stageHandler) {
      client.removeListener(Events.StageInstanceCreate, this.stageHandler);
      client.removeListener(Events.StageInstanceDelete, this.stageHandler);
    }
    this.voiceHandler = null;
    this.stageHandler = null;
  }
}
