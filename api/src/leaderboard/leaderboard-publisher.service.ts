import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as Sentry from '@sentry/nestjs';
import type { LeaderboardSnapshotDto } from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { PeriodAggregator } from '../tracker/period-aggregator.service';
import { TrackerMetaService } from '../tracker/tracker-meta.service';
import { getZonedParts, toLocalDate } from '../tracker/time-zone.util';
import {
  LEADERBOARD_EVENTS,
  LEADERBOARD_SINK,
  LeaderboardPublishedPayload,
  LeaderboardSink,
} from './leaderboard.constants';

export interface PublishOptions {
  /** Record today as posted so the daily check skips it */
  markDaily: boolean;
}

/**
 * Builds the live snapshot and hands it to the sink. Owns the daily post:
 * checked every minute and once at startup so a missed post catches up.
 */
@Injectable()
export class LeaderboardPublisherService implements OnApplicationBootstrap {
  private readonly logger = new Logger(LeaderboardPublisherService.name);

  constructor(
    @Inject(LEADERBOARD_SINK) private readonly sink: LeaderboardSink,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly aggregator: PeriodAggregator,
    private readonly meta: TrackerMetaService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.checkDailyPost(new Date());
  }

  @Cron(CronExpression.EVERY_MINUTE, {
    name: 'LeaderboardPublisherService_checkDailyPost',
    waitForCompletion: true,
  })
  async handleDailyPostCron(): Promise<void> {
    await this.checkDailyPost(new Date());
  }

  /**
   * Nothing is delivered, marked or emitted unless the snapshot was built.
   */
  async publish(
    options: PublishOptions,
    now: Date = new Date(),
  ): Promise<LeaderboardSnapshotDto> {
    const snapshot = await this.aggregator.buildBoard(now);
    await this.sink.deliver(snapshot);
    if (options.markDaily) {
      await this.meta.markPosted(snapshot.referenceDate);
    }

    const payload: LeaderboardPublishedPayload = {
      snapshot,
      daily: options.markDaily,
    };
    this.eventEmitter.emit(LEADERBOARD_EVENTS.PUBLISHED, payload);
    this.logger.log(
      `Leaderboard for ${snapshot.referenceDate} published${options.markDaily ? ' (daily)' : ''}`,
    );
    return snapshot;
  }

  /** Post when the local post time has passed and today is not yet marked. */
  async checkDailyPost(now: Date): Promise<boolean> {
    const { timezone, dailyPostTime } = this.config;
    const local = getZonedParts(now, timezone);
    const minuteOfDay = local.hour * 60 + local.minute;
    if (minuteOfDay < dailyPostTime.hour * 60 + dailyPostTime.minute) {
      return false;
    }

    const today = toLocalDate(now, timezone);
    try {
      if ((await this.meta.getLastPostDate()) === today) return false;
      await this.publish({ markDaily: true }, now);
      return true;
    } catch (err) {
      this.logger.error(
        `Daily post for ${today} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      Sentry.captureException(err);
      return false;
    }
  }
}
