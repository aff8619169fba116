/** Events emitted around the tracked call. */
export const ROSTER_EVENTS = {
  /** The roster probably changed; payload-free, triggers a refresh */
  CHANGED: 'roster.changed',
  /** The roster source connected to a call group */
  SOURCE_READY: 'roster.source-ready',
} as const;

export interface RosterSourceReadyPayload {
  /** Identity of the tracked group, e.g. `${guildId}:${channelId}` */
  groupKey: string;
}
