import { z } from 'zod';

// ============================================================
// Leaderboard Schemas
// ============================================================

/** Rolling window a board covers */
export const BoardScopeEnum = z.enum(['day', 'week', 'month']);
export type BoardScope = z.infer<typeof BoardScopeEnum>;

/** Badge tier derived from whole minutes on a board */
export const BadgeTierEnum = z.enum([
  'legend',
  'blazing',
  'strong',
  'present',
  'idle',
]);
export type BadgeTier = z.infer<typeof BadgeTierEnum>;

/** Calendar date in the tracker time zone (YYYY-MM-DD) */
export const LocalDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');
export type LocalDate = z.infer<typeof LocalDateSchema>;

export const LeaderboardEntrySchema = z.object({
  rank: z.number().int().min(1),
  /** Canonical (alias-folded) identity */
  userId: z.string(),
  minutes: z.number().int().min(0),
  seconds: z.number().int().min(1),
  displayName: z.string(),
  badge: BadgeTierEnum,
  compliment: z.string().optional(),
});
export type LeaderboardEntryDto = z.infer<typeof LeaderboardEntrySchema>;

export const LeaderboardBoardSchema = z.object({
  scope: BoardScopeEnum,
  /** 1-based day / week block / 30-day block number counted from the anchor */
  index: z.number().int(),
  periodStart: z.string().datetime(),
  periodEnd: z.string().datetime(),
  label: z.string(),
  /** Empty when nobody qualified in the window */
  entries: z.array(LeaderboardEntrySchema),
});
export type LeaderboardBoardDto = z.infer<typeof LeaderboardBoardSchema>;

export const LeaderboardSnapshotSchema = z.object({
  postedAt: z.string().datetime(),
  anchorDate: LocalDateSchema,
  referenceDate: LocalDateSchema,
  /** Whether the in-progress session was blended in */
  live: z.boolean(),
  boards: z.array(LeaderboardBoardSchema),
  /** Word of the day, rotated by day number */
  quote: z.string().optional(),
});
export type LeaderboardSnapshotDto = z.infer<typeof LeaderboardSnapshotSchema>;

/** Body POSTed to the leaderboard ingest webhook */
export const LeaderboardExportPayloadSchema = LeaderboardSnapshotSchema.extend({
  source: z.literal('tracker'),
  boards: z.array(LeaderboardBoardSchema).min(1),
});
export type LeaderboardExportPayloadDto = z.infer<
  typeof LeaderboardExportPayloadSchema
>;

/** Query for GET /leaderboard */
export const LeaderboardQuerySchema = z.object({
  date: LocalDateSchema.optional(),
});
export type LeaderboardQueryDto = z.infer<typeof LeaderboardQuerySchema>;

/** Body for POST /leaderboard/backfill */
export const BackfillRequestSchema = z.object({
  start: LocalDateSchema.optional(),
  end: LocalDateSchema.optional(),
  inspect: z.boolean().default(false),
});
export type BackfillRequestDto = z.infer<typeof BackfillRequestSchema>;

export const BackfillDateResultSchema = z.object({
  date: LocalDateSchema,
  status: z.enum(['sent', 'inspected', 'skipped', 'failed']),
  detail: z.string().optional(),
  httpStatus: z.number().int().nullable().optional(),
  snapshot: LeaderboardSnapshotSchema.optional(),
});
export type BackfillDateResultDto = z.infer<typeof BackfillDateResultSchema>;

export const BackfillResponseSchema = z.object({
  start: LocalDateSchema,
  end: LocalDateSchema,
  results: z.array(BackfillDateResultSchema),
});
export type BackfillResponseDto = z.infer<typeof BackfillResponseSchema>;

export const PostNowResponseSchema = z.object({
  posted: z.boolean(),
  snapshot: LeaderboardSnapshotSchema,
});
export type PostNowResponseDto = z.infer<typeof PostNowResponseSchema>;
