export const ROSTER_SOURCE = 'rosterSource';

export interface RosterMember {
  userId: string;
  displayName: string;
  username: string | null;
}

/**
 * One read of the tracked call.
 *
 * `unknown` means the source could not tell (not connected, fetch failed):
 * the tracker keeps its state. `observed` with a null callId means no call
 * is running and ends any tracked session.
 */
export type RosterReading =
  | { status: 'unknown'; reason: string }
  | { status: 'observed'; callId: string | null; members: RosterMember[] };

export interface RosterSource {
  read(): Promise<RosterReading>;
}
