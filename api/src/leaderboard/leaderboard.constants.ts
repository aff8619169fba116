import type { LeaderboardSnapshotDto } from '@presence-board/contract';

export const LEADERBOARD_SINK = 'leaderboardSink';

export const LEADERBOARD_EVENTS = {
  PUBLISHED: 'leaderboard.published',
} as const;

export interface LeaderboardPublishedPayload {
  snapshot: LeaderboardSnapshotDto;
  /** True for the scheduled daily post */
  daily: boolean;
}

/** Where a published snapshot is shown (chat channel, console, ...). */
export interface LeaderboardSink {
  deliver(snapshot: LeaderboardSnapshotDto): Promise<void>;
}
