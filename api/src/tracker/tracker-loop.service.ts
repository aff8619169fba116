import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  BeforeApplicationShutdown,
} from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import * as Sentry from '@sentry/nestjs';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { perfLog } from '../common/perf-logger';
import { AliasResolver } from './alias-resolver';
import { DURATION_STORE, DurationStore } from './duration-store';
import { ROSTER_SOURCE, RosterMember, RosterSource } from './roster-source';
import {
  ReconcileResult,
  SegmentCommitError,
  SessionTracker,
} from './session-tracker.service';
import { ROSTER_EVENTS, RosterSourceReadyPayload } from './tracker.constants';
import { TrackerMetaService } from './tracker-meta.service';

/**
 * Drives the tracker: polls the roster source on an interval, reacts to
 * change notifications, checkpoints long stays and finalizes the session on
 * shutdown.
 *
 * At most one refresh runs at a time. A trigger that arrives while one is in
 * flight is dropped; the next poll sees the same roster anyway.
 */
@Injectable()
export class TrackerLoopService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(TrackerLoopService.name);
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = false;

  constructor(
    @Inject(ROSTER_SOURCE) private readonly roster: RosterSource,
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
    private readonly tracker: SessionTracker,
    private readonly aliases: AliasResolver,
    private readonly meta: TrackerMetaService,
  ) {}

  onApplicationBootstrap(): void {
    this.pollTimer = setInterval(() => {
      void this.requestRefresh();
    }, this.config.rosterPollSeconds * 1000);
    void this.requestRefresh();
  }

  async beforeApplicationShutdown(): Promise<void> {
    this.stopped = true;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    if (this.inFlight) await this.inFlight;

    try {
      const qualified = await this.tracker.finalize(new Date());
      if (qualified.length > 0) {
        this.logger.log(`Shutdown finalize qualified: ${qualified.join(', ')}`);
      }
    } catch (err) {
      this.reportFailure('Final commit on shutdown failed', err);
    }
  }

  @OnEvent(ROSTER_EVENTS.CHANGED)
  handleRosterChanged(): void {
    void this.requestRefresh();
  }

  /**
   * The source is attached to a group. A different group than last run
   * wipes the counters before the first refresh.
   */
  @OnEvent(ROSTER_EVENTS.SOURCE_READY)
  async handleSourceReady(payload: RosterSourceReadyPayload): Promise<void> {
    // Queued behind the current refresh, never dropped.
    while (this.inFlight) await this.inFlight;
    if (this.stopped) return;
    await this.occupy(() => this.syncGroup(payload.groupKey));
  }

  /**
   * Start a refresh unless one is already running. Resolves when the
   * started refresh settles; never rejects.
   */
  requestRefresh(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    if (this.inFlight) {
      this.logger.debug('Refresh already in flight; trigger dropped');
      return Promise.resolve();
    }
    return this.occupy(() => this.refresh());
  }

  get refreshing(): boolean {
    return this.inFlight !== null;
  }

  private occupy(task: () => Promise<void>): Promise<void> {
    const run = task()
      .catch((err: unknown) => this.reportFailure('Roster refresh failed', err))
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }

  private async syncGroup(groupKey: string): Promise<void> {
    try {
      await this.meta.syncGroupKey(groupKey, new Date());
    } catch (err) {
      this.reportFailure(`Group sync for ${groupKey} failed`, err);
      return;
    }
    await this.refresh();
  }

  private async refresh(): Promise<void> {
    const startedAt = performance.now();
    const reading = await this.roster.read();
    if (reading.status === 'unknown') {
      this.logger.warn(`Roster unavailable (${reading.reason}); state kept`);
      return;
    }

    const now = new Date();
    if (reading.callId !== null) {
      try {
        const qualified = await this.tracker.checkpoint(now);
        if (qualified.length > 0) {
          this.logger.log(`Checkpoint qualified: ${qualified.join(', ')}`);
        }
      } catch (err) {
        this.reportFailure('Checkpoint commit failed', err);
      }
    }

    let result: ReconcileResult;
    try {
      result = await this.tracker.reconcile(
        {
          callId: reading.callId,
          participants: reading.members.map((m) => m.userId),
        },
        now,
      );
    } catch (err) {
      // Joins still apply when a leaver's commit fails.
      if (err instanceof SegmentCommitError && err.result) {
        await this.recordJoined(reading.members, err.result);
      }
      throw err;
    }

    await this.recordJoined(reading.members, result);
    this.logRoster(reading.callId, reading.members, result);
    perfLog('TRACKER', 'refresh', performance.now() - startedAt, {
      callId: reading.callId,
      members: reading.members.length,
    });
  }

  /** Keep the participant directory current for names and alias matching. */
  private async recordJoined(
    members: RosterMember[],
    result: ReconcileResult,
  ): Promise<void> {
    if (result.joined.length === 0) return;
    const joined = new Set(result.joined);
    for (const member of members) {
      if (!joined.has(member.userId)) continue;
      await this.store.upsertParticipant(member);
      joined.delete(member.userId);
    }
    await this.aliases.refresh();
  }

  private logRoster(
    callId: string | null,
    members: RosterMember[],
    result: ReconcileResult,
  ): void {
    if (result.sessionEnded) {
      this.logger.log(`Session ${result.sessionEnded} ended`);
    }
    if (callId === null) {
      this.logger.debug('No active call');
      return;
    }

    const names = members.map((member) => {
      const label = this.aliases.labelOf(
        this.aliases.canonicalOf(member.userId),
      );
      return label ?? member.displayName;
    });
    const line = `In call (${members.length}): ${names.length > 0 ? names.join(', ') : '-'}`;
    if (result.joined.length > 0 || result.left.length > 0) {
      this.logger.log(line);
    } else {
      this.logger.debug(line);
    }
  }

  private reportFailure(context: string, err: unknown): void {
    this.logger.error(
      `${context}: ${err instanceof Error ? err.message : String(err)}`,
    );
    Sentry.captureException(err);
  }
}
