import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import type {
  LeaderboardExportPayloadDto,
  LeaderboardSnapshotDto,
} from '@presence-board/contract';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';
import {
  LEADERBOARD_EVENTS,
  LeaderboardPublishedPayload,
} from './leaderboard.constants';

export const LEADERBOARD_SECRET_HEADER = 'X-Leaderboard-Secret';

/**
 * Pushes published snapshots to the external ingest endpoint. Off unless
 * the export flag, URL and secret are all configured.
 */
@Injectable()
export class LeaderboardExportService {
  private readonly logger = new Logger(LeaderboardExportService.name);

  constructor(
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  get enabled(): boolean {
    const { enabled, url, secret } = this.config.export;
    return enabled && url !== null && secret !== null;
  }

  @OnEvent(LEADERBOARD_EVENTS.PUBLISHED)
  async handlePublished(payload: LeaderboardPublishedPayload): Promise<void> {
    if (!this.enabled) return;
    try {
      const status = await this.send(payload.snapshot);
      if (status < 200 || status >= 300) {
        this.logger.warn(
          `Leaderboard export for ${payload.snapshot.referenceDate} rejected: HTTP ${status}`,
        );
      }
    } catch (err) {
      this.logger.warn(
        `Leaderboard export for ${payload.snapshot.referenceDate} failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  /** POST one snapshot; resolves with the HTTP status, rejects on transport errors. */
  async send(snapshot: LeaderboardSnapshotDto): Promise<number> {
    const { url, secret, timeoutMs } = this.config.export;
    if (url === null || secret === null) {
      throw new Error('Leaderboard export URL and secret are not configured');
    }

    const body: LeaderboardExportPayloadDto = { source: 'tracker', ...snapshot };
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        [LEADERBOARD_SECRET_HEADER]: secret,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
    this.logger.debug(`Exported ${snapshot.referenceDate}: HTTP ${response.status}`);
    return response.status;
  }
}
