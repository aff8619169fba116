import { z } from 'zod';
import { LocalDateSchema } from './leaderboard.schema';

// ============================================================
// Live Tracker Schemas
// ============================================================

/** One raw participant currently present in the tracked call */
export const LiveParticipantSchema = z.object({
  userId: z.string(),
  canonicalUserId: z.string(),
  displayName: z.string(),
  joinedAt: z.string().datetime(),
  /** Seconds closed into segments so far in this session (excludes the open one) */
  accumulatedSeconds: z.number().int().min(0),
  qualified: z.boolean(),
});
export type LiveParticipantDto = z.infer<typeof LiveParticipantSchema>;

/** Response for GET /tracker/live */
export const LiveSessionResponseSchema = z.object({
  callId: z.string().nullable(),
  startedAt: z.string().datetime().nullable(),
  qualifyMinSeconds: z.number().int(),
  participants: z.array(LiveParticipantSchema),
});
export type LiveSessionResponseDto = z.infer<typeof LiveSessionResponseSchema>;

/** Response for POST /tracker/reset */
export const TrackerResetResponseSchema = z.object({
  anchorDate: LocalDateSchema,
});
export type TrackerResetResponseDto = z.infer<typeof TrackerResetResponseSchema>;
