export const DURATION_STORE = 'durationStore';

/** Inclusive range of local calendar dates (YYYY-MM-DD). */
export interface DateRange {
  from: string;
  to: string;
}

export interface ParticipantRecord {
  userId: string;
  displayName: string;
  username: string | null;
}

/**
 * Metadata keys kept in the tracker's key/value table.
 */
export const TRACKER_META_KEYS = {
  ANCHOR_DATE: 'anchor_date',
  LAST_POST_DATE: 'last_post_date',
  GROUP_KEY: 'group_key',
  GROUP_SINCE: 'group_since',
} as const;

export type TrackerMetaKey =
  (typeof TRACKER_META_KEYS)[keyof typeof TRACKER_META_KEYS];

/**
 * Persistence boundary of the tracker: the per-day seconds ledger plus the
 * small tables around it (metadata, participant directory, compliment
 * choices).
 *
 * Writes are additive or idempotent point-writes; a single process owns the
 * tracker, so no read-modify-write transaction is needed. Every method
 * rejects with {@link DurationStoreError} on failure.
 */
export interface DurationStore {
  /** Additive increment; `delta <= 0` is a no-op. */
  addSeconds(date: string, userId: string, delta: number): Promise<void>;
  getDaySeconds(userId: string, date: string): Promise<number>;
  sumSeconds(userId: string, range: DateRange): Promise<number>;
  /**
   * Users with a positive sum in the range, keyed by raw id. A day row
   * below `minDailySeconds` contributes nothing.
   */
  sumSecondsByUser(
    range: DateRange,
    minDailySeconds?: number,
  ): Promise<Map<string, number>>;
  /** Distinct dates holding any seconds, ascending. */
  listTrackedDates(range: DateRange): Promise<string[]>;

  getMeta(key: TrackerMetaKey): Promise<string | null>;
  setMeta(key: TrackerMetaKey, value: string): Promise<void>;

  upsertParticipant(participant: ParticipantRecord): Promise<void>;
  listParticipants(): Promise<ParticipantRecord[]>;

  getCompliment(periodKey: string, userId: string): Promise<string | null>;
  saveCompliment(
    periodKey: string,
    userId: string,
    compliment: string,
  ): Promise<void>;
  /** Compliments the user got in any period whose key starts with the prefix. */
  listCompliments(periodPrefix: string, userId: string): Promise<string[]>;

  /** Wipe day totals and compliment choices plus the given metadata keys. */
  resetTracking(metaKeysToClear: readonly TrackerMetaKey[]): Promise<void>;
}

export class DurationStoreError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(
      `DurationStore.${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'DurationStoreError';
  }
}
