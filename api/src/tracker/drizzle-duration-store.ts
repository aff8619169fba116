import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, asc, between, eq, gt, inArray, like, sql } from 'drizzle-orm';
import { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import {
  DateRange,
  DurationStore,
  DurationStoreError,
  ParticipantRecord,
  TrackerMetaKey,
} from './duration-store';

/**
 * PostgreSQL-backed {@link DurationStore}.
 *
 * Every statement goes through {@link DrizzleDurationStore.run} so driver
 * failures surface as `DurationStoreError` with the operation name.
 */
@Injectable()
export class DrizzleDurationStore implements DurationStore {
  private readonly logger = new Logger(DrizzleDurationStore.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.logger.error(`${operation} failed: ${errorMessage(err)}`);
      throw new DurationStoreError(operation, err);
    }
  }

  async addSeconds(date: string, userId: string, delta: number): Promise<void> {
    if (!Number.isFinite(delta) || delta <= 0) return;
    const seconds = Math.floor(delta);
    if (seconds <= 0) return;

    await this.run('addSeconds', () =>
      this.db
        .insert(schema.dayTotals)
        .values({ day: date, userId, seconds })
        .onConflictDoUpdate({
          target: [schema.dayTotals.day, schema.dayTotals.userId],
          set: {
            seconds: sql`${schema.dayTotals.seconds} + ${seconds}`,
          },
        }),
    );
  }

  async getDaySeconds(userId: string, date: string): Promise<number> {
    const rows = await this.run('getDaySeconds', () =>
      this.db
        .select({ seconds: schema.dayTotals.seconds })
        .from(schema.dayTotals)
        .where(
          and(
            eq(schema.dayTotals.userId, userId),
            eq(schema.dayTotals.day, date),
          ),
        )
        .limit(1),
    );
    return rows[0]?.seconds ?? 0;
  }

  async sumSeconds(userId: string, range: DateRange): Promise<number> {
    const rows = await this.run('sumSeconds', () =>
      this.db
        .select({
          total: sql<number>`coalesce(sum(${schema.dayTotals.seconds}), 0)::int`,
        })
        .from(schema.dayTotals)
        .where(
          and(
            eq(schema.dayTotals.userId, userId),
            between(schema.dayTotals.day, range.from, range.to),
          ),
        ),
    );
    return Number(rows[0]?.total ?? 0);
  }

  async sumSecondsByUser(
    range: DateRange,
    minDailySeconds = 0,
  ): Promise<Map<string, number>> {
    const seconds = schema.dayTotals.seconds;
    const rows = await this.run('sumSecondsByUser', () =>
      this.db
        .select({
          userId: schema.dayTotals.userId,
          total: sql<number>`sum(case when ${seconds} >= ${minDailySeconds} then ${seconds} else 0 end)::int`,
        })
        .from(schema.dayTotals)
        .where(between(schema.dayTotals.day, range.from, range.to))
        .groupBy(schema.dayTotals.userId),
    );

    const totals = new Map<string, number>();
    for (const row of rows) {
      const total = Number(row.total);
      if (total > 0) totals.set(row.userId, total);
    }
    return totals;
  }

  async listTrackedDates(range: DateRange): Promise<string[]> {
    const rows = await this.run('listTrackedDates', () =>
      this.db
        .selectDistinct({ day: schema.dayTotals.day })
        .from(schema.dayTotals)
        .where(
          and(
            between(schema.dayTotals.day, range.from, range.to),
            gt(schema.dayTotals.seconds, 0),
          ),
        )
        .orderBy(asc(schema.dayTotals.day)),
    );
    return rows.map((row) => row.day);
  }

  async getMeta(key: TrackerMetaKey): Promise<string | null> {
    const rows = await this.run('getMeta', () =>
      this.db
        .select({ value: schema.trackerMeta.value })
        .from(schema.trackerMeta)
        .where(eq(schema.trackerMeta.key, key))
        .limit(1),
    );
    return rows[0]?.value ?? null;
  }

  async setMeta(key: TrackerMetaKey, value: string): Promise<void> {
    await this.run('setMeta', () =>
      this.db
        .insert(schema.trackerMeta)
        .values({ key, value, updatedAt: new Date() })
        .onConflictDoUpdate({
          target: schema.trackerMeta.key,
          set: { value, updatedAt: new Date() },
        }),
    );
  }

  async upsertParticipant(participant: ParticipantRecord): Promise<void> {
    const seenAt = new Date();
    await this.run('upsertParticipant', () =>
      this.db
        .insert(schema.participants)
        .values({ ...participant, lastSeenAt: seenAt })
        .onConflictDoUpdate({
          target: schema.participants.userId,
          set: {
            displayName: participant.displayName,
            username: participant.username,
            lastSeenAt: seenAt,
          },
        }),
    );
  }

  async listParticipants(): Promise<ParticipantRecord[]> {
    const rows = await this.run('listParticipants', () =>
      this.db
        .select({
          userId: schema.participants.userId,
          displayName: schema.participants.displayName,
          username: schema.participants.username,
        })
        .from(schema.participants)
        .orderBy(asc(schema.participants.userId)),
    );
    return rows;
  }

  async getCompliment(
    periodKey: string,
    userId: string,
  ): Promise<string | null> {
    const rows = await this.run('getCompliment', () =>
      this.db
        .select({ compliment: schema.periodCompliments.compliment })
        .from(schema.periodCompliments)
        .where(
          and(
            eq(schema.periodCompliments.periodKey, periodKey),
            eq(schema.periodCompliments.userId, userId),
          ),
        )
        .limit(1),
    );
    return rows[0]?.compliment ?? null;
  }

  async saveCompliment(
    periodKey: string,
    userId: string,
    compliment: string,
  ): Promise<void> {
    await this.run('saveCompliment', () =>
      this.db
        .insert(schema.periodCompliments)
        .values({ periodKey, userId, compliment })
        .onConflictDoUpdate({
          target: [
            schema.periodCompliments.periodKey,
            schema.periodCompliments.userId,
          ],
          set: { compliment },
        }),
    );
  }

  async listCompliments(
    periodPrefix: string,
    userId: string,
  ): Promise<string[]> {
    const rows = await this.run('listCompliments', () =>
      this.db
        .select({ compliment: schema.periodCompliments.compliment })
        .from(schema.periodCompliments)
        .where(
          and(
            eq(schema.periodCompliments.userId, userId),
            like(schema.periodCompliments.periodKey, `${periodPrefix}%`),
          ),
        ),
    );
    return rows.map((row) => row.compliment);
  }

  async resetTracking(
    metaKeysToClear: readonly TrackerMetaKey[],
  ): Promise<void> {
    await this.run('resetTracking', () =>
      this.db.transaction(async (tx) => {
        await tx.delete(schema.dayTotals);
        await tx.delete(schema.periodCompliments);
        if (metaKeysToClear.length > 0) {
          await tx
            .delete(schema.trackerMeta)
            .where(inArray(schema.trackerMeta.key, [...metaKeysToClear]));
        }
      }),
    );
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
