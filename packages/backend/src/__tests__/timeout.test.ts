/**
 * Tests for deadlines on external calls
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import { getTimeoutStats, TimeoutError, withTimeout } from '../utils/timeout';

describe('withTimeout', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves with the value when the call settles in time', async () => {
    await expect(withTimeout(Promise.resolve('rows'), 100, 'sheets-read')).resolves.toBe('rows');
  });

  it('passes the call failure through', async () => {
    await expect(withTimeout(Promise.reject(new Error('quota')), 100, 'sheets-read')).rejects.toThrow('quota');
  });

  it('rejects with TimeoutError at the deadline and counts it', async () => {
    const pending = withTimeout(new Promise<string>(() => undefined), 100, 'sheets-write');
    jest.advanceTimersByTime(100);

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("Operation 'sheets-write' timed out after 100ms");
    expect(getTimeoutStats()).toEqual({ recentCount: 1, windowMinutes: 5, byOperation: { 'sheets-write': 1 } });
  });
});
