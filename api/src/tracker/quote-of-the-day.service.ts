import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import quotePool from './data/quotes.json';

const QuotePoolSchema = z.array(z.string().min(1)).min(1);

/** Rotates through the quote pool, one quote per day since the anchor. */
@Injectable()
export class QuoteOfTheDayService {
  private readonly pool: readonly string[];

  constructor(@Inject(TRACKER_CONFIG) private readonly config: TrackerConfig) {
    this.pool = QuotePoolSchema.parse(quotePool);
  }

  get enabled(): boolean {
    return this.config.quoteOfTheDayEnabled;
  }

  /** Day 1 gets the first quote; the pool wraps around. */
  forDay(dayIndex: number): string {
    const n = this.pool.length;
    return this.pool[(((dayIndex - 1) % n) + n) % n];
  }

  get size(): number {
    return this.pool.length;
  }
}
