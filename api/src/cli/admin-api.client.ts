import {
  BackfillResponseSchema,
  LeaderboardSnapshotSchema,
  LiveSessionResponseSchema,
  PostNowResponseSchema,
  TrackerResetResponseSchema,
  type BackfillRequestDto,
  type BackfillResponseDto,
  type LeaderboardSnapshotDto,
  type LiveSessionResponseDto,
  type PostNowResponseDto,
  type TrackerResetResponseDto,
} from '@presence-board/contract';
import type { z } from 'zod';

/** Non-2xx answer from the admin API. */
export class AdminApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly body?: unknown,
  ) {
    super(message);
    this.name = 'AdminApiError';
  }
}

/** Network-level failure: connection refused, DNS, timeout. */
export class AdminApiConnectionError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'AdminApiConnectionError';
  }
}

export interface AdminApiClientOptions {
  /** Origin of the running API, e.g. http://localhost:3000 */
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

/**
 * Typed client for the tracker's admin endpoints. Every response is checked
 * against the shared contract before it is handed back.
 */
export class AdminApiClient {
  private readonly timeoutMs: number;

  constructor(private readonly options: AdminApiClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  getLeaderboard(date?: string): Promise<LeaderboardSnapshotDto> {
    return this.request('GET', '/leaderboard', LeaderboardSnapshotSchema, {
      query: { date },
    });
  }

  postNow(): Promise<PostNowResponseDto> {
    return this.request('POST', '/leaderboard/post-now', PostNowResponseSchema);
  }

  backfill(body: Partial<BackfillRequestDto>): Promise<BackfillResponseDto> {
    return this.request(
      'POST',
      '/leaderboard/backfill',
      BackfillResponseSchema,
      { body },
    );
  }

  getLive(): Promise<LiveSessionResponseDto> {
    return this.request('GET', '/tracker/live', LiveSessionResponseSchema);
  }

  reset(): Promise<TrackerResetResponseDto> {
    return this.request('POST', '/tracker/reset', TrackerResetResponseSchema);
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    options: {
      query?: Record<string, string | undefined>;
      body?: unknown;
    } = {},
  ): Promise<z.infer<S>> {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
    };
    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url.toString(), init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new AdminApiConnectionError(
        `Failed to ${method} ${path}: ${message}`,
        error,
      );
    }

    const body: unknown = await response.json().catch(() => undefined);
    if (!response.ok) {
      throw new AdminApiError(
        `${method} ${path} failed with ${response.status}: ${errorMessageOf(body)}`,
        response.status,
        body,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AdminApiError(
        `${method} ${path} returned an unexpected body`,
        response.status,
        parsed.error.flatten(),
      );
    }
    return parsed.data;
  }
}

/** Nest error bodies carry `message` as a string or a list of strings. */
function errorMessageOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.join(', ');
  }
  return 'no error message';
}
