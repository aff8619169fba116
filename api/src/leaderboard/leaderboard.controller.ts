import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  BackfillRequestSchema,
  LeaderboardQuerySchema,
  type BackfillResponseDto,
  type LeaderboardSnapshotDto,
  type LiveParticipantDto,
  type LiveSessionResponseDto,
  type PostNowResponseDto,
  type TrackerResetResponseDto,
} from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { AliasResolver } from '../tracker/alias-resolver';
import { DURATION_STORE, DurationStore } from '../tracker/duration-store';
import { PeriodAggregator } from '../tracker/period-aggregator.service';
import { SessionTracker } from '../tracker/session-tracker.service';
import { TrackerMetaService } from '../tracker/tracker-meta.service';
import { AdminTokenGuard } from './admin-token.guard';
import { BackfillService } from './backfill.service';
import { LeaderboardPublisherService } from './leaderboard-publisher.service';

/**
 * Admin surface for the boards and the live session.
 * Every route needs `Authorization: Bearer <ADMIN_API_TOKEN>`.
 */
@Controller()
@UseGuards(AdminTokenGuard)
export class LeaderboardController {
  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly aggregator: PeriodAggregator,
    private readonly publisher: LeaderboardPublisherService,
    private readonly backfill: BackfillService,
    private readonly tracker: SessionTracker,
    private readonly aliases: AliasResolver,
    private readonly meta: TrackerMetaService,
  ) {}

  /**
   * GET /leaderboard?date=YYYY-MM-DD
   * Live boards, or the committed boards of a past date.
   */
  @Get('leaderboard')
  async getLeaderboard(
    @Query() query: Record<string, unknown>,
  ): Promise<LeaderboardSnapshotDto> {
    const parsed = LeaderboardQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten().fieldErrors);
    }
    return this.aggregator.buildBoard(new Date(), parsed.data.date);
  }

  /** POST /leaderboard/post-now: does not count as the daily post. */
  @Post('leaderboard/post-now')
  @HttpCode(HttpStatus.OK)
  async postNow(): Promise<PostNowResponseDto> {
    const snapshot = await this.publisher.publish({ markDaily: false });
    return { posted: true, snapshot };
  }

  @Post('leaderboard/backfill')
  @HttpCode(HttpStatus.OK)
  async runBackfill(@Body() body: unknown): Promise<BackfillResponseDto> {
    const parsed = BackfillRequestSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten().fieldErrors);
    }
    return this.backfill.replay(parsed.data);
  }

  @Get('tracker/live')
  async getLiveSession(): Promise<LiveSessionResponseDto> {
    const snapshot = this.tracker.liveSnapshot();
    await this.aliases.refresh();
    const directory = new Map(
      (await this.store.listParticipants()).map((p) => [p.userId, p]),
    );

    const participants: LiveParticipantDto[] = [...snapshot.active]
      .sort(
        ([aId, a], [bId, b]) =>
          a.getTime() - b.getTime() || aId.localeCompare(bId),
      )
      .map(([userId, joinedAt]) => {
        const canonicalUserId = this.aliases.canonicalOf(userId);
        return {
          userId,
          canonicalUserId,
          displayName:
            this.aliases.labelOf(canonicalUserId) ??
            directory.get(userId)?.displayName ??
            userId,
          joinedAt: joinedAt.toISOString(),
          accumulatedSeconds: snapshot.accumulated.get(userId) ?? 0,
          qualified: snapshot.qualified.has(userId),
        };
      });

    return {
      callId: snapshot.callId,
      startedAt: snapshot.startedAt?.toISOString() ?? null,
      qualifyMinSeconds: this.config.qualifyMinSeconds,
      participants,
    };
  }

  /** POST /tracker/reset: wipes totals and compliments, re-anchors at today. */
  @Post('tracker/reset')
  @HttpCode(HttpStatus.OK)
  async resetTracker(): Promise<TrackerResetResponseDto> {
    const anchorDate = await this.meta.resetCounters(new Date());
    return { anchorDate };
  }
}
