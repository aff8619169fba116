import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  LeaderboardBoardDto,
  LeaderboardEntryDto,
  LeaderboardSnapshotDto,
} from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { perfLog } from '../common/perf-logger';
import { AliasResolver } from './alias-resolver';
import { ComplimentPicker } from './compliment-picker.service';
import { spanSeconds } from './day-split';
import {
  DURATION_STORE,
  DurationStore,
  ParticipantRecord,
} from './duration-store';
import {
  PeriodWindow,
  badgeFor,
  buildWindows,
  windowBounds,
  windowLabel,
} from './period-windows';
import { QuoteOfTheDayService } from './quote-of-the-day.service';
import { SessionTracker } from './session-tracker.service';
import { TrackerMetaService } from './tracker-meta.service';
import { toLocalDate } from './time-zone.util';

/** Canonical id -> seconds for one window. */
type Totals = Map<string, number>;

interface LiveGroup {
  accumulatedSeconds: number;
  elapsedSeconds: number;
  qualified: boolean;
}

/**
 * Builds the day / week / month leaderboards.
 *
 * Committed totals come from the DurationStore and are folded onto
 * canonical ids. Without an explicit reference date the open segments of
 * the live session are blended in as well; nothing blended is written back.
 * Any store failure rejects the whole build.
 */
@Injectable()
export class PeriodAggregator {
  private readonly logger = new Logger(PeriodAggregator.name);

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly tracker: SessionTracker,
    private readonly aliases: AliasResolver,
    private readonly compliments: ComplimentPicker,
    private readonly meta: TrackerMetaService,
    private readonly quotes: QuoteOfTheDayService,
  ) {}

  async buildBoard(
    now: Date,
    referenceDate?: string,
  ): Promise<LeaderboardSnapshotDto> {
    const startedAt = performance.now();
    const { timezone } = this.config;

    await this.aliases.refresh();
    const anchorDate = await this.meta.ensureAnchor(now);
    const live = referenceDate === undefined;
    const reference = referenceDate ?? toLocalDate(now, timezone);
    const windows = buildWindows(anchorDate, reference);

    const totals: Totals[] = [];
    for (const window of windows) {
      const raw = await this.store.sumSecondsByUser(
        { from: window.startDate, to: window.endDate },
        this.config.minDailySeconds,
      );
      totals.push(this.fold(raw));
    }

    if (live) this.blendLive(windows, totals, now);

    const directory = new Map<string, ParticipantRecord>(
      (await this.store.listParticipants()).map((p) => [p.userId, p]),
    );
    const ranked = windows.map((window, i) =>
      this.rank(totals[i], directory),
    );
    if (this.compliments.enabled) {
      await this.decorate(windows, ranked);
    }

    const boards: LeaderboardBoardDto[] = windows.map((window, i) => {
      const bounds = windowBounds(window, timezone);
      return {
        scope: window.scope,
        index: window.index,
        periodStart: bounds.start.toISOString(),
        periodEnd: bounds.end.toISOString(),
        label: windowLabel(window),
        entries: ranked[i],
      };
    });

    perfLog('TRACKER', 'buildBoard', performance.now() - startedAt, {
      reference,
      live: String(live),
    });
    this.logger.debug(
      `Board for ${reference}: ${boards.map((b) => `${b.scope}=${b.entries.length}`).join(' ')}`,
    );

    const snapshot: LeaderboardSnapshotDto = {
      postedAt: now.toISOString(),
      anchorDate,
      referenceDate: reference,
      live,
      boards,
    };
    if (this.quotes.enabled) {
      snapshot.quote = this.quotes.forDay(windows[0].index);
    }
    return snapshot;
  }

  private fold(raw: Map<string, number>): Totals {
    const folded: Totals = new Map();
    for (const [userId, seconds] of raw) {
      const canonicalId = this.aliases.canonicalOf(userId);
      folded.set(canonicalId, (folded.get(canonicalId) ?? 0) + seconds);
    }
    return folded;
  }

  /**
   * Add each live participant's open segment to every window it overlaps.
   *
   * Qualification is judged per canonical id over all its raw ids. Elapsed
   * time counts from the later of the join and the window's local start.
   * Aliases present at the same time add up.
   */
  private blendLive(
    windows: PeriodWindow[],
    totals: Totals[],
    now: Date,
  ): void {
    const snapshot = this.tracker.liveSnapshot();
    if (snapshot.active.size === 0) return;

    const groups = new Map<string, LiveGroup>();
    const groupOf = (rawId: string): LiveGroup => {
      const canonicalId = this.aliases.canonicalOf(rawId);
      let group = groups.get(canonicalId);
      if (!group) {
        group = { accumulatedSeconds: 0, elapsedSeconds: 0, qualified: false };
        groups.set(canonicalId, group);
      }
      return group;
    };
    for (const [rawId, seconds] of snapshot.accumulated) {
      const group = groupOf(rawId);
      group.accumulatedSeconds += seconds;
      if (snapshot.qualified.has(rawId)) group.qualified = true;
    }
    for (const [rawId, joinedAt] of snapshot.active) {
      groupOf(rawId).elapsedSeconds += spanSeconds(joinedAt, now);
    }

    const storedDay = new Map(totals[0]);
    const starts = windows.map(
      (window) => windowBounds(window, this.config.timezone).start,
    );

    for (const [rawId, joinedAt] of snapshot.active) {
      const canonicalId = this.aliases.canonicalOf(rawId);
      const group = groupOf(rawId);
      const qualified =
        group.qualified ||
        group.accumulatedSeconds + group.elapsedSeconds >=
          this.config.qualifyMinSeconds;
      if (!qualified) continue;

      windows.forEach((window, i) => {
        const from = joinedAt > starts[i] ? joinedAt : starts[i];
        const elapsed = spanSeconds(from, now);
        if (elapsed <= 0) return;
        const current = totals[i].get(canonicalId) ?? 0;
        const base =
          window.scope === 'day'
            ? Math.max(storedDay.get(canonicalId) ?? 0, current)
            : current;
        totals[i].set(canonicalId, base + elapsed);
      });
    }
  }

  private rank(
    totals: Totals,
    directory: Map<string, ParticipantRecord>,
  ): LeaderboardEntryDto[] {
    return [...totals.entries()]
      .filter(([, seconds]) => seconds > 0)
      .sort(([aId, a], [bId, b]) =>
        b !== a ? b - a : aId < bId ? -1 : aId > bId ? 1 : 0,
      )
      .slice(0, this.config.boardDisplayLimit)
      .map(([userId, seconds], i) => {
        const minutes = Math.floor(seconds / 60);
        return {
          rank: i + 1,
          userId,
          minutes,
          seconds,
          displayName: this.displayName(userId, directory),
          badge: badgeFor(minutes),
        };
      });
  }

  private displayName(
    canonicalId: string,
    directory: Map<string, ParticipantRecord>,
  ): string {
    const label = this.aliases.labelOf(canonicalId);
    if (label) return label;
    const participant = directory.get(canonicalId);
    if (participant?.username) return `@${participant.username}`;
    if (participant?.displayName) return participant.displayName;
    return canonicalId;
  }

  /** Week and month first so the day pick can avoid them. */
  private async decorate(
    windows: PeriodWindow[],
    ranked: LeaderboardEntryDto[][],
  ): Promise<void> {
    const picked = new Map<string, Set<string>>();
    const boards = windows.map((window, i) => ({ window, entries: ranked[i] }));
    const order = [
      ...boards.filter((b) => b.window.scope !== 'day'),
      ...boards.filter((b) => b.window.scope === 'day'),
    ];

    for (const { window, entries } of order) {
      for (const entry of entries) {
        const avoid =
          window.scope === 'day'
            ? (picked.get(entry.userId) ?? new Set<string>())
            : new Set<string>();
        entry.compliment = await this.compliments.pick(
          window.scope,
          window.periodKey,
          entry.userId,
          avoid,
        );
        if (window.scope !== 'day') {
          const seen = picked.get(entry.userId) ?? new Set<string>();
          seen.add(entry.compliment);
          picked.set(entry.userId, seen);
        }
      }
    }
  }
}
