import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TRACKER_CONFIG } from '../config/tracker.config';
import { InMemoryDurationStore } from '../common/testing/in-memory-duration-store';
import { makeSnapshot } from '../common/testing/leaderboard-fixtures';
import { makeTrackerConfig } from '../common/testing/tracker-config';
import { AliasResolver } from '../tracker/alias-resolver';
import { DURATION_STORE, TRACKER_META_KEYS } from '../tracker/duration-store';
import { PeriodAggregator } from '../tracker/period-aggregator.service';
import { SessionTracker } from '../tracker/session-tracker.service';
import { TrackerMetaService } from '../tracker/tracker-meta.service';
import { BackfillService } from './backfill.service';
import { LeaderboardController } from './leaderboard.controller';
import { LeaderboardPublisherService } from './leaderboard-publisher.service';

describe('LeaderboardController', () => {
  let controller: LeaderboardController;
  let store: InMemoryDurationStore;
  let tracker: SessionTracker;
  let mockAggregator: { buildBoard: jest.Mock };
  let mockPublisher: { publish: jest.Mock };
  let mockBackfill: { replay: jest.Mock };
  const snapshot = makeSnapshot();

  beforeEach(async () => {
    store = new InMemoryDurationStore();
    mockAggregator = { buildBoard: jest.fn().mockResolvedValue(snapshot) };
    mockPublisher = { publish: jest.fn().mockResolvedValue(snapshot) };
    mockBackfill = {
      replay: jest
        .fn()
        .mockResolvedValue({ start: '2024-03-02', end: '2024-03-02', results: [] }),
    };

    const module = await Test.createTestingModule({
      controllers: [LeaderboardController],
      providers: [
        SessionTracker,
        AliasResolver,
        TrackerMetaService,
        { provide: PeriodAggregator, useValue: mockAggregator },
        { provide: LeaderboardPublisherService, useValue: mockPublisher },
        { provide: BackfillService, useValue: mockBackfill },
        { provide: DURATION_STORE, useValue: store },
        {
          provide: TRACKER_CONFIG,
          useValue: makeTrackerConfig({ adminApiToken: 'test-secret' }),
        },
      ],
    }).compile();

    controller = module.get(LeaderboardController);
    tracker = module.get(SessionTracker);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('getLeaderboard', () => {
    it('replays a given date', async () => {
      const result = await controller.getLeaderboard({ date: '2024-03-02' });

      expect(result).toBe(snapshot);
      expect(mockAggregator.buildBoard).toHaveBeenCalledWith(
        expect.any(Date),
        '2024-03-02',
      );
    });

    it('builds the live board without a date', async () => {
      await controller.getLeaderboard({});

      expect(mockAggregator.buildBoard).toHaveBeenCalledWith(
        expect.any(Date),
        undefined,
      );
    });

    it('rejects a malformed date', async () => {
      await expect(
        controller.getLeaderboard({ date: '02.03.2024' }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  it('posts now without marking the daily post', async () => {
    const result = await controller.postNow();

    expect(mockPublisher.publish).toHaveBeenCalledWith({ markDaily: false });
    expect(result).toEqual({ posted: true, snapshot });
  });

  describe('runBackfill', () => {
    it('passes the validated request on', async () => {
      await controller.runBackfill({ start: '2024-03-02', inspect: true });

      expect(mockBackfill.replay).toHaveBeenCalledWith({
        start: '2024-03-02',
        inspect: true,
      });
    });

    it('defaults to sending for an empty body', async () => {
      await controller.runBackfill(undefined);

      expect(mockBackfill.replay).toHaveBeenCalledWith({ inspect: false });
    });

    it('rejects an invalid body', async () => {
      await expect(
        controller.runBackfill({ inspect: 'yes' }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(mockBackfill.replay).not.toHaveBeenCalled();
    });
  });

  it('describes the live session', async () => {
    await store.upsertParticipant({
      userId: 'u1',
      displayName: 'Alice',
      username: null,
    });
    await tracker.reconcile(
      { callId: 'c1', participants: ['u1'] },
      new Date('2024-03-03T10:00:00Z'),
    );
    await tracker.reconcile(
      { callId: 'c1', participants: ['u1', 'u2'] },
      new Date('2024-03-03T10:02:00Z'),
    );
    await tracker.reconcile(
      { callId: 'c1', participants: ['u2'] },
      new Date('2024-03-03T10:06:00Z'),
    );
    await tracker.reconcile(
      { callId: 'c1', participants: ['u1', 'u2'] },
      new Date('2024-03-03T10:07:00Z'),
    );

    const live = await controller.getLiveSession();

    expect(live).toEqual({
      callId: 'c1',
      startedAt: '2024-03-03T10:00:00.000Z',
      qualifyMinSeconds: 300,
      participants: [
        {
          userId: 'u2',
          canonicalUserId: 'u2',
          displayName: 'u2',
          joinedAt: '2024-03-03T10:02:00.000Z',
          accumulatedSeconds: 0,
          qualified: false,
        },
        {
          userId: 'u1',
          canonicalUserId: 'u1',
          displayName: 'Alice',
          joinedAt: '2024-03-03T10:07:00.000Z',
          accumulatedSeconds: 360,
          qualified: true,
        },
      ],
    });
  });

  it('resets the counters and re-anchors', async () => {
    jest.useFakeTimers({ now: new Date('2024-03-03T12:00:00Z') });
    store.seed('2024-03-02', 'u1', 600);
    store.meta.set(TRACKER_META_KEYS.ANCHOR_DATE, '2024-03-01');

    const result = await controller.resetTracker();

    expect(result).toEqual({ anchorDate: '2024-03-03' });
    expect(store.totalSeconds()).toBe(0);
  });
});
