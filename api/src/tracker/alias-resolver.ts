import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { z } from 'zod';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import {
  DURATION_STORE,
  DurationStore,
  ParticipantRecord,
} from './duration-store';

export interface AliasGroup {
  /** Username the group is shown under, without the leading `@` */
  canonicalName: string;
  /** Usernames or raw ids, in configured order */
  members: string[];
}

const AliasMembersSchema = z.array(z.string().trim().min(1)).min(1);

function normalizeUsername(value: string): string {
  return value.trim().replace(/^@/, '').toLowerCase();
}

/**
 * Parse the ALIAS_GROUPS JSON. Invalid JSON yields no groups; a group whose
 * members are not a non-empty string array is skipped. Problems are reported
 * through `warn` and never thrown.
 */
export function parseAliasGroups(
  raw: string,
  warn: (message: string) => void,
): AliasGroup[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    warn(
      `ALIAS_GROUPS is not valid JSON, alias folding disabled: ${err instanceof Error ? err.message : String(err)}`,
    );
    return [];
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    warn('ALIAS_GROUPS must be a JSON object of name -> members');
    return [];
  }

  const groups: AliasGroup[] = [];
  for (const [name, value] of Object.entries(parsed)) {
    const canonicalName = name.trim().replace(/^@/, '');
    const members = AliasMembersSchema.safeParse(value);
    if (!canonicalName || !members.success) {
      warn(`Skipping alias group "${name}": expected a non-empty string array`);
      continue;
    }
    groups.push({ canonicalName, members: members.data });
  }
  return groups;
}

/**
 * Folds raw participant ids into canonical identities.
 *
 * Members are matched against the participant directory by username or raw
 * id. The canonical id of a group is the observed id of its canonical name,
 * falling back to the first observed member. Maps are rebuilt only by
 * {@link AliasResolver.refresh}; `lastRefreshedAt` tells how old they are.
 */
@Injectable()
export class AliasResolver implements OnModuleInit {
  private readonly logger = new Logger(AliasResolver.name);
  private readonly groups: AliasGroup[];

  private aliasToCanonical = new Map<string, string>();
  private canonicalLabels = new Map<string, string>();
  private refreshedAt: Date | null = null;

  constructor(
    @Inject(DURATION_STORE) private readonly store: DurationStore,
    @Inject(TRACKER_CONFIG) config: TrackerConfig,
  ) {
    this.groups = parseAliasGroups(config.aliasGroupsJson, (message) =>
      this.logger.warn(message),
    );
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.refresh();
    } catch (err) {
      this.logger.error(
        `Initial alias refresh failed, folding stays identity until the next refresh: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  get lastRefreshedAt(): Date | null {
    return this.refreshedAt;
  }

  get configuredGroups(): readonly AliasGroup[] {
    return this.groups;
  }

  /** Rebuild the maps from the configured groups and the participant directory. */
  async refresh(): Promise<void> {
    const participants = await this.store.listParticipants();
    this.rebuild(participants);
    this.refreshedAt = new Date();
  }

  canonicalOf(rawId: string): string {
    return this.aliasToCanonical.get(rawId) ?? rawId;
  }

  labelOf(canonicalId: string): string | undefined {
    return this.canonicalLabels.get(canonicalId);
  }

  private rebuild(participants: ParticipantRecord[]): void {
    const idByUsername = new Map<string, string>();
    const knownIds = new Set<string>();
    for (const participant of participants) {
      knownIds.add(participant.userId);
      if (participant.username) {
        idByUsername.set(
          normalizeUsername(participant.username),
          participant.userId,
        );
      }
    }

    const resolve = (member: string): string | undefined =>
      idByUsername.get(normalizeUsername(member)) ??
      (knownIds.has(member.trim()) ? member.trim() : undefined);

    const aliasToCanonical = new Map<string, string>();
    const canonicalLabels = new Map<string, string>();

    for (const group of this.groups) {
      // The canonical name is tried first so its id leads when observed.
      const ids: string[] = [];
      for (const member of [group.canonicalName, ...group.members]) {
        const id = resolve(member);
        if (id && !aliasToCanonical.has(id) && !ids.includes(id)) {
          ids.push(id);
        }
      }
      if (ids.length === 0) continue;

      const canonicalId = ids[0];
      for (const id of ids) aliasToCanonical.set(id, canonicalId);
      canonicalLabels.set(canonicalId, `@${group.canonicalName}`);
    }

    this.aliasToCanonical = aliasToCanonical;
    this.canonicalLabels = canonicalLabels;
    this.logger.debug(
      `Alias maps rebuilt: ${aliasToCanonical.size} ids in ${canonicalLabels.size} groups`,
    );
  }
}
