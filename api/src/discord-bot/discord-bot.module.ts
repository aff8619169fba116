import { Module } from '@nestjs/common';
import { LEADERBOARD_SINK } from '../leaderboard/leaderboard.constants';
import { ROSTER_SOURCE } from '../tracker/roster-source';
import { DiscordBotService } from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';
import { VoiceStateListener } from './listeners/voice-state.listener';
import { DiscordLeaderboardSink } from './services/discord-leaderboard-sink.service';
import { DiscordRosterSource } from './services/discord-roster-source.service';
import { LeaderboardEmbedFactory } from './services/leaderboard-embed.factory';

@Module({
  providers: [
    DiscordBotService,
    DiscordBotClientService,
    DiscordRosterSource,
    { provide: ROSTER_SOURCE, useExisting: DiscordRosterSource },
    LeaderboardEmbedFactory,
    DiscordLeaderboardSink,
    { provide: LEADERBOARD_SINK, useExisting: DiscordLeaderboardSink },
    VoiceStateListener,
  ],
  exports: [ROSTER_SOURCE, LEADERBOARD_SINK, DiscordBotClientService],
})
export class DiscordBotModule {}
