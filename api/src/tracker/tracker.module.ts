import { Module } from '@nestjs/common';
import { DiscordBotModule } from '../discord-bot/discord-bot.module';
import { AliasResolver } from './alias-resolver';
import { ComplimentPicker } from './compliment-picker.service';
import { QuoteOfTheDayService } from './quote-of-the-day.service';
import { DrizzleDurationStore } from './drizzle-duration-store';
import { DURATION_STORE } from './duration-store';
import { PeriodAggregator } from './period-aggregator.service';
import { SessionTracker } from './session-tracker.service';
import { TrackerLoopService } from './tracker-loop.service';
import { TrackerMetaService } from './tracker-meta.service';

@Module({
  imports: [DiscordBotModule],
  providers: [
    { provide: DURATION_STORE, useClass: DrizzleDurationStore },
    AliasResolver,
    SessionTracker,
    ComplimentPicker,
    QuoteOfTheDayService,
    TrackerMetaService,
    PeriodAggregator,
    TrackerLoopService,
  ],
  exports: [
    DURATION_STORE,
    AliasResolver,
    SessionTracker,
    TrackerMetaService,
    PeriodAggregator,
    TrackerLoopService,
  ],
})
export class TrackerModule {}
