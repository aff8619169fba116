import { withBackoff } from './backoff';

describe('withBackoff', () => {
  const sleep = jest.fn<Promise<void>, [number]>();

  beforeEach(() => {
    sleep.mockReset().mockResolvedValue(undefined);
  });

  it('returns the first successful result', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    const result = await withBackoff(fn, {
      attempts: 3,
      baseDelayMs: 100,
      sleep,
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it('doubles the delay and rethrows the last error', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));
    const onRetry = jest.fn();

    await expect(
      withBackoff(fn, { attempts: 3, baseDelayMs: 100, sleep, onRetry }),
    ).rejects.toThrow('third');

    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenLastCalledWith(2, 200, new Error('second'));
  });
});
