import { Inject, Injectable, Logger } from '@nestjs/common';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import {
  DURATION_STORE,
  DurationStore,
  TRACKER_META_KEYS,
} from './duration-store';
import { parseLocalDate, toLocalDate } from './time-zone.util';

/**
 * Tracker bookkeeping kept in the meta table: the anchor date that numbers
 * days and blocks, the last daily post, and the identity of the tracked
 * group.
 */
@Injectable()
export class TrackerMetaService {
  private readonly logger = new Logger(TrackerMetaService.name);

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  /** Stored anchor date; today's local date is written when absent or unparsable. */
  async ensureAnchor(now: Date): Promise<string> {
    const stored = await this.store.getMeta(TRACKER_META_KEYS.ANCHOR_DATE);
    const parsed = stored ? parseLocalDate(stored) : null;
    if (parsed) return parsed;

    if (stored) {
      this.logger.warn(`Ignoring unparsable anchor_date "${stored}"`);
    }
    const today = toLocalDate(now, this.config.timezone);
    await this.store.setMeta(TRACKER_META_KEYS.ANCHOR_DATE, today);
    return today;
  }

  /**
   * Reset everything when the tracked group changed since the last run.
   * Returns true when a reset happened.
   */
  async syncGroupKey(groupKey: string, now: Date): Promise<boolean> {
    const previous = await this.store.getMeta(TRACKER_META_KEYS.GROUP_KEY);
    if (previous === groupKey) return false;

    await this.store.resetTracking(Object.values(TRACKER_META_KEYS));
    const anchor = toLocalDate(now, this.config.timezone);
    await this.store.setMeta(TRACKER_META_KEYS.ANCHOR_DATE, anchor);
    await this.store.setMeta(TRACKER_META_KEYS.GROUP_KEY, groupKey);
    await this.store.setMeta(TRACKER_META_KEYS.GROUP_SINCE, now.toISOString());

    this.logger.log(
      `Tracked group changed (${previous ?? 'none'} -> ${groupKey}); counters reset, anchor ${anchor}`,
    );
    return true;
  }

  /** Manual reset: clears totals and compliments, keeps the group. */
  async resetCounters(now: Date): Promise<string> {
    await this.store.resetTracking([
      TRACKER_META_KEYS.ANCHOR_DATE,
      TRACKER_META_KEYS.LAST_POST_DATE,
    ]);
    const anchor = toLocalDate(now, this.config.timezone);
    await this.store.setMeta(TRACKER_META_KEYS.ANCHOR_DATE, anchor);
    this.logger.log(`Counters reset; anchor ${anchor}`);
    return anchor;
  }

  async getLastPostDate(): Promise<string | null> {
    return this.store.getMeta(TRACKER_META_KEYS.LAST_POST_DATE);
  }

  async markPosted(date: string): Promise<void> {
    await this.store.setMeta(TRACKER_META_KEYS.LAST_POST_DATE, date);
  }
}
