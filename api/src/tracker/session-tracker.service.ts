import { Inject, Injectable, Logger } from '@nestjs/common';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { splitSpanByLocalDay, spanSeconds, toEpochSeconds } from './day-split';
import { DURATION_STORE, DurationStore } from './duration-store';

/** What the roster source reports for one poll. */
export interface RosterObservation {
  /** Identity of the live call, or null when no call is running */
  callId: string | null;
  /** Raw ids currently present; duplicates are tolerated */
  participants: Iterable<string>;
}

/** Closed presence interval `[start, end)` of one raw user. */
export interface Segment {
  userId: string;
  start: Date;
  end: Date;
}

/**
 * Per-user qualification gate for the current session.
 *
 * `pending` buffers closed segments until the accumulated seconds reach the
 * threshold; `qualified` is sticky and commits new segments straight away.
 */
export type ParticipantGate =
  | { kind: 'pending'; accumulatedSeconds: number; buffered: Segment[] }
  | { kind: 'qualified'; accumulatedSeconds: number };

interface ActiveSession {
  callId: string;
  startedAt: Date;
  /** Raw id -> start of the currently open segment */
  active: Map<string, Date>;
  gates: Map<string, ParticipantGate>;
}

export interface ReconcileResult {
  sessionStarted: string | null;
  sessionEnded: string | null;
  joined: string[];
  left: string[];
  /** Users whose gate flipped to qualified during this call */
  qualified: string[];
}

/** Read-only copy of the tracker state for blending and inspection. */
export interface LiveSessionSnapshot {
  callId: string | null;
  startedAt: Date | null;
  active: Map<string, Date>;
  accumulated: Map<string, number>;
  qualified: Set<string>;
}

export interface CommitFailure {
  /** The part of the segment that was not written */
  segment: Segment;
  cause: unknown;
}

function describeSegment(segment: Segment): string {
  return `${segment.userId} ${segment.start.toISOString()}..${segment.end.toISOString()}`;
}

export class SegmentCommitError extends Error {
  /**
   * @param result - What the failed reconcile still applied (joins, leaves,
   *   session changes); absent for checkpoint and finalize.
   */
  constructor(
    readonly failures: CommitFailure[],
    readonly result: ReconcileResult | null = null,
  ) {
    super(
      `Failed to commit ${failures.length} segment(s): ${failures
        .map((f) => describeSegment(f.segment))
        .join(', ')}`,
    );
    this.name = 'SegmentCommitError';
  }
}

/**
 * Owns the live session: turns roster observations into segments, applies
 * the per-session qualification gate and commits qualified time to the
 * DurationStore, split at local midnights.
 *
 * Callers serialize access (see TrackerLoopService). Every public mutation
 * finishes its in-memory bookkeeping before surfacing commit failures as a
 * single {@link SegmentCommitError}.
 */
@Injectable()
export class SessionTracker {
  private readonly logger = new Logger(SessionTracker.name);
  private session: ActiveSession | null = null;

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  get currentCallId(): string | null {
    return this.session?.callId ?? null;
  }

  async reconcile(
    observation: RosterObservation,
    now: Date,
  ): Promise<ReconcileResult> {
    const failures: CommitFailure[] = [];
    const result: ReconcileResult = {
      sessionStarted: null,
      sessionEnded: null,
      joined: [],
      left: [],
      qualified: [],
    };

    if (this.session && this.session.callId !== observation.callId) {
      result.sessionEnded = this.session.callId;
      result.qualified.push(...(await this.endSession(now, failures)));
    }

    if (observation.callId !== null) {
      if (!this.session) {
        this.session = {
          callId: observation.callId,
          startedAt: now,
          active: new Map(),
          gates: new Map(),
        };
        result.sessionStarted = observation.callId;
        this.logger.log(
          `Session ${observation.callId} started; gate is ${this.config.qualifyMinSeconds}s`,
        );
      }
      await this.applyRoster(
        this.session,
        new Set(observation.participants),
        now,
        result,
        failures,
      );
    }

    if (failures.length > 0) throw new SegmentCommitError(failures, result);
    return result;
  }

  /**
   * Close and reopen every open segment at least one checkpoint interval
   * old, so long stays reach the store without a leave event.
   */
  async checkpoint(now: Date): Promise<string[]> {
    const session = this.session;
    if (!session) return [];

    const failures: CommitFailure[] = [];
    const qualified: string[] = [];
    for (const [userId, openedAt] of [...session.active]) {
      if (spanSeconds(openedAt, now) < this.config.checkpointIntervalSeconds) {
        continue;
      }
      if (await this.closeSegment(session, userId, openedAt, now, failures)) {
        qualified.push(userId);
      }
      session.active.set(userId, now);
    }

    if (failures.length > 0) throw new SegmentCommitError(failures);
    return qualified;
  }

  /** End the current session, committing qualified users and dropping the rest. */
  async finalize(now: Date): Promise<string[]> {
    if (!this.session) return [];
    const failures: CommitFailure[] = [];
    const qualified = await this.endSession(now, failures);
    if (failures.length > 0) throw new SegmentCommitError(failures);
    return qualified;
  }

  liveSnapshot(): LiveSessionSnapshot {
    const session = this.session;
    const accumulated = new Map<string, number>();
    const qualified = new Set<string>();
    if (session) {
      for (const [userId, gate] of session.gates) {
        accumulated.set(userId, gate.accumulatedSeconds);
        if (gate.kind === 'qualified') qualified.add(userId);
      }
    }
    return {
      callId: session?.callId ?? null,
      startedAt: session?.startedAt ?? null,
      active: new Map(session?.active ?? []),
      accumulated,
      qualified,
    };
  }

  private async applyRoster(
    session: ActiveSession,
    roster: Set<string>,
    now: Date,
    result: ReconcileResult,
    failures: CommitFailure[],
  ): Promise<void> {
    for (const userId of roster) {
      if (!session.active.has(userId)) {
        session.active.set(userId, now);
        result.joined.push(userId);
      }
    }

    for (const [userId, openedAt] of [...session.active]) {
      if (roster.has(userId)) continue;
      session.active.delete(userId);
      result.left.push(userId);
      if (await this.closeSegment(session, userId, openedAt, now, failures)) {
        result.qualified.push(userId);
      }
    }
  }

  private async endSession(
    now: Date,
    failures: CommitFailure[],
  ): Promise<string[]> {
    const session = this.session;
    if (!session) return [];

    const qualified: string[] = [];
    for (const [userId, openedAt] of [...session.active]) {
      if (await this.closeSegment(session, userId, openedAt, now, failures)) {
        qualified.push(userId);
      }
    }
    session.active.clear();

    let discarded = 0;
    for (const [userId, gate] of session.gates) {
      if (gate.kind !== 'pending' || gate.buffered.length === 0) continue;
      if (gate.accumulatedSeconds >= this.config.qualifyMinSeconds) {
        // Only reachable when an earlier flush failed part-way.
        if (await this.qualify(session, userId, gate, failures)) {
          qualified.push(userId);
        }
      } else {
        discarded += gate.buffered.length;
      }
    }

    this.session = null;
    this.logger.log(
      `Session ${session.callId} ended; ${discarded} sub-threshold segment(s) discarded`,
    );
    return qualified;
  }

  /**
   * Route a closed segment through the user's gate. Returns true when this
   * segment made the user qualify.
   */
  private async closeSegment(
    session: ActiveSession,
    userId: string,
    start: Date,
    end: Date,
    failures: CommitFailure[],
  ): Promise<boolean> {
    const seconds = spanSeconds(start, end);
    if (seconds <= 0) return false;

    const segment: Segment = { userId, start, end };
    const gate: ParticipantGate = session.gates.get(userId) ?? {
      kind: 'pending',
      accumulatedSeconds: 0,
      buffered: [],
    };
    session.gates.set(userId, gate);
    gate.accumulatedSeconds += seconds;

    if (gate.kind === 'qualified') {
      const failure = await this.commitSegment(segment);
      if (failure) failures.push(failure);
      return false;
    }

    gate.buffered.push(segment);
    if (gate.accumulatedSeconds < this.config.qualifyMinSeconds) return false;
    return this.qualify(session, userId, gate, failures);
  }

  /**
   * The single pending -> qualified transition: flush every buffered
   * segment, oldest first. A segment leaves the buffer only once written;
   * if anything fails the gate stays pending with the unwritten remainder.
   */
  private async qualify(
    session: ActiveSession,
    userId: string,
    gate: Extract<ParticipantGate, { kind: 'pending' }>,
    failures: CommitFailure[],
  ): Promise<boolean> {
    const unwritten: Segment[] = [];
    for (const segment of gate.buffered) {
      const failure = await this.commitSegment(segment);
      if (failure) {
        failures.push(failure);
        unwritten.push(failure.segment);
      }
    }

    if (unwritten.length > 0) {
      gate.buffered = unwritten;
      return false;
    }

    session.gates.set(userId, {
      kind: 'qualified',
      accumulatedSeconds: gate.accumulatedSeconds,
    });
    this.logger.log(
      `${userId} qualified with ${gate.accumulatedSeconds}s in session ${session.callId}`,
    );
    return true;
  }

  /**
   * Write a segment day by day. On failure returns the part that was not
   * written, starting at the failed day portion.
   */
  private async commitSegment(segment: Segment): Promise<CommitFailure | null> {
    let cursor = toEpochSeconds(segment.start);
    for (const portion of splitSpanByLocalDay(
      segment.start,
      segment.end,
      this.config.timezone,
    )) {
      try {
        await this.store.addSeconds(
          portion.date,
          segment.userId,
          portion.seconds,
        );
      } catch (err) {
        const remainder: Segment = {
          userId: segment.userId,
          start: new Date(cursor * 1000),
          end: segment.end,
        };
        this.logger.error(
          `Commit failed for ${describeSegment(remainder)}: ${err instanceof Error ? err.message : String(err)}`,
        );
        return { segment: remainder, cause: err };
      }
      cursor += portion.seconds;
    }
    return null;
  }
}
