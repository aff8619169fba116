import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import {
  LeaderboardExportPayloadSchema,
  type BackfillDateResultDto,
  type BackfillResponseDto,
} from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { DURATION_STORE, DurationStore } from '../tracker/duration-store';
import { PeriodAggregator } from '../tracker/period-aggregator.service';
import {
  addDays,
  localDateTimeToUtc,
  parseLocalDate,
  toLocalDate,
} from '../tracker/time-zone.util';
import { LeaderboardExportService } from './leaderboard-export.service';

/** Days replayed when no start date is given. */
export const DEFAULT_BACKFILL_DAYS = 60;

export interface BackfillOptions {
  start?: string;
  end?: string;
  /** Return the snapshots instead of sending them */
  inspect: boolean;
}

/**
 * Replays historical snapshots to the export endpoint.
 *
 * Each date is rebuilt from committed totals as of that date's post time,
 * with today's alias groups and anchor. Results are best effort.
 */
@Injectable()
export class BackfillService {
  private readonly logger = new Logger(BackfillService.name);

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly aggregator: PeriodAggregator,
    private readonly exporter: LeaderboardExportService,
  ) {}

  async replay(
    options: BackfillOptions,
    now: Date = new Date(),
  ): Promise<BackfillResponseDto> {
    const { start, end } = this.resolveRange(options, now);
    if (!options.inspect && !this.exporter.enabled) {
      throw new BadRequestException('Leaderboard export is not configured');
    }

    const tracked = new Set(
      await this.store.listTrackedDates({ from: start, to: end }),
    );
    this.logger.log(
      `Backfill ${start}..${end}: ${tracked.size} date(s) with data${options.inspect ? ' (inspect)' : ''}`,
    );

    const results: BackfillDateResultDto[] = [];
    for (let date = start; date <= end; date = addDays(date, 1)) {
      if (!tracked.has(date)) {
        this.logger.warn(`Backfill ${date}: no tracked seconds, skipped`);
        results.push({ date, status: 'skipped', detail: 'no data' });
        continue;
      }
      results.push(await this.replayDate(date, options.inspect));
    }

    return { start, end, results };
  }

  private resolveRange(
    options: BackfillOptions,
    now: Date,
  ): { start: string; end: string } {
    const yesterday = addDays(toLocalDate(now, this.config.timezone), -1);
    const end = options.end === undefined ? yesterday : parseLocalDate(options.end);
    if (end === null) {
      throw new BadRequestException(`Invalid end date: ${options.end}`);
    }
    const start =
      options.start === undefined
        ? addDays(end, -(DEFAULT_BACKFILL_DAYS - 1))
        : parseLocalDate(options.start);
    if (start === null) {
      throw new BadRequestException(`Invalid start date: ${options.start}`);
    }
    if (start > end) {
      throw new BadRequestException(`Start ${start} is after end ${end}`);
    }
    return { start, end };
  }

  private async replayDate(
    date: string,
    inspect: boolean,
  ): Promise<BackfillDateResultDto> {
    const { hour, minute } = this.config.dailyPostTime;
    try {
      const postedAt = localDateTimeToUtc(
        date,
        hour,
        minute,
        0,
        this.config.timezone,
      );
      const snapshot = await this.aggregator.buildBoard(postedAt, date);
      const payload = LeaderboardExportPayloadSchema.safeParse({
        source: 'tracker',
        ...snapshot,
      });
      if (!payload.success) {
        const detail = payload.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        this.logger.error(`Backfill ${date}: invalid payload (${detail})`);
        return { date, status: 'failed', detail };
      }

      if (inspect) return { date, status: 'inspected', snapshot };

      const httpStatus = await this.exporter.send(snapshot);
      if (httpStatus < 200 || httpStatus >= 300) {
        this.logger.warn(`Backfill ${date}: export returned HTTP ${httpStatus}`);
        return { date, status: 'failed', httpStatus };
      }
      return { date, status: 'sent', httpStatus };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error(`Backfill ${date} failed: ${detail}`);
      return { date, status: 'failed', detail };
    }
  }
}
