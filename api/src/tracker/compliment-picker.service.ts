import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import type { BoardScope } from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import { DURATION_STORE, DurationStore } from './duration-store';
import complimentPool from './data/compliments.json';

const ComplimentPoolSchema = z.array(z.string().min(1)).min(1);

/**
 * Picks a decorative compliment per user and period, once.
 *
 * Week and month picks avoid anything the user already got in that scope;
 * day picks avoid whatever the caller passes (the user's current week and
 * month compliments). When exclusions leave nothing, the whole pool is used.
 */
@Injectable()
export class ComplimentPicker {
  private readonly pool: readonly string[];

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {
    this.pool = ComplimentPoolSchema.parse(complimentPool);
  }

  get enabled(): boolean {
    return this.config.complimentsEnabled;
  }

  async pick(
    scope: BoardScope,
    periodKey: string,
    userId: string,
    avoid: ReadonlySet<string> = new Set(),
  ): Promise<string> {
    const existing = await this.store.getCompliment(periodKey, userId);
    if (existing) return existing;

    const excluded = new Set(avoid);
    if (scope !== 'day') {
      const used = await this.store.listCompliments(`${scope}:`, userId);
      for (const compliment of used) excluded.add(compliment);
    }

    const candidates = this.pool.filter((c) => !excluded.has(c));
    const choices = candidates.length > 0 ? candidates : this.pool;
    const choice = choices[Math.floor(Math.random() * choices.length)];

    await this.store.saveCompliment(periodKey, userId, choice);
    return choice;
  }
}
