import { Module } from '@nestjs/common';
import { DiscordBotModule } from '../discord-bot/discord-bot.module';
import { TrackerModule } from '../tracker/tracker.module';
import { AdminTokenGuard } from './admin-token.guard';
import { BackfillService } from './backfill.service';
import { LeaderboardController } from './leaderboard.controller';
import { LeaderboardExportService } from './leaderboard-export.service';
import { LeaderboardPublisherService } from './leaderboard-publisher.service';

@Module({
  imports: [TrackerModule, DiscordBotModule],
  controllers: [LeaderboardController],
  providers: [
    AdminTokenGuard,
    LeaderboardPublisherService,
    LeaderboardExportService,
    BackfillService,
  ],
})
export class LeaderboardModule {}
