import { Test } from '@nestjs/testing';
import { TRACKER_CONFIG } from '../config/tracker.config';
import { InMemoryDurationStore } from '../common/testing/in-memory-duration-store';
import { makeTrackerConfig } from '../common/testing/tracker-config';
import { DURATION_STORE, TRACKER_META_KEYS } from './duration-store';
import { TrackerMetaService } from './tracker-meta.service';

const NOW = new Date('2024-05-10T21:30:00Z');

describe('TrackerMetaService', () => {
  let service: TrackerMetaService;
  let store: InMemoryDurationStore;

  beforeEach(async () => {
    store = new InMemoryDurationStore();

    const module = await Test.createTestingModule({
      providers: [
        TrackerMetaService,
        { provide: DURATION_STORE, useValue: store },
        {
          provide: TRACKER_CONFIG,
          useValue: makeTrackerConfig({ timezone: 'Asia/Tashkent' }),
        },
      ],
    }).compile();

    service = module.get(TrackerMetaService);
  });

  describe('ensureAnchor', () => {
    it('writes the local date when no anchor exists', async () => {
      expect(await service.ensureAnchor(NOW)).toBe('2024-05-11');
      expect(store.meta.get(TRACKER_META_KEYS.ANCHOR_DATE)).toBe('2024-05-11');
    });

    it('keeps an existing anchor', async () => {
      store.meta.set(TRACKER_META_KEYS.ANCHOR_DATE, '2024-04-01');
      expect(await service.ensureAnchor(NOW)).toBe('2024-04-01');
    });

    it('replaces an unparsable anchor', async () => {
      store.meta.set(TRACKER_META_KEYS.ANCHOR_DATE, 'garbage');
      expect(await service.ensureAnchor(NOW)).toBe('2024-05-11');
    });
  });

  describe('syncGroupKey', () => {
    it('does nothing when the group is unchanged', async () => {
      store.meta.set(TRACKER_META_KEYS.GROUP_KEY, 'g1:c1');
      store.seed('2024-05-01', 'u1', 900);

      expect(await service.syncGroupKey('g1:c1', NOW)).toBe(false);
      expect(store.dayTotal('2024-05-01', 'u1')).toBe(900);
    });

    it('resets totals, compliments and meta for a new group', async () => {
      store.meta.set(TRACKER_META_KEYS.GROUP_KEY, 'g1:c1');
      store.meta.set(TRACKER_META_KEYS.LAST_POST_DATE, '2024-05-09');
      store.meta.set(TRACKER_META_KEYS.ANCHOR_DATE, '2024-04-01');
      store.seed('2024-05-01', 'u1', 900);
      await store.saveCompliment('week:2024-04-29', 'u1', 'Nice');

      expect(await service.syncGroupKey('g2:c9', NOW)).toBe(true);

      expect(store.totalSeconds()).toBe(0);
      expect(store.compliments.size).toBe(0);
      expect(Object.fromEntries(store.meta)).toEqual({
        anchor_date: '2024-05-11',
        group_key: 'g2:c9',
        group_since: '2024-05-10T21:30:00.000Z',
      });
    });
  });

  it('resetCounters keeps the group key', async () => {
    store.meta.set(TRACKER_META_KEYS.GROUP_KEY, 'g1:c1');
    store.meta.set(TRACKER_META_KEYS.LAST_POST_DATE, '2024-05-09');
    store.seed('2024-05-01', 'u1', 900);

    expect(await service.resetCounters(NOW)).toBe('2024-05-11');

    expect(store.totalSeconds()).toBe(0);
    expect(await service.getLastPostDate()).toBeNull();
    expect(store.meta.get(TRACKER_META_KEYS.GROUP_KEY)).toBe('g1:c1');
  });

  it('markPosted records the last post date', async () => {
    await service.markPosted('2024-05-11');
    expect(await service.getLastPostDate()).toBe('2024-05-11');
  });
});
