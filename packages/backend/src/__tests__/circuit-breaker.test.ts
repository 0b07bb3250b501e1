/**
 * Tests for the circuit breaker guarding Sheets, Claude and Telegram calls
 * Covers: opening on a failure window, trial calls, the process-wide breakers
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import {
  CircuitBreaker,
  CircuitBreakerError,
  breakerFor,
  breakerStats,
  CIRCUIT_BREAKER_CONFIGS,
  type CircuitBreakerOptions,
} from '../utils/circuit-breaker';

const failing = () => Promise.reject(new Error('Sheets unavailable'));

describe('CircuitBreaker', () => {
  let clock: number;

  function createBreaker(overrides: Partial<CircuitBreakerOptions> = {}) {
    return new CircuitBreaker(
      {
        name: 'sheets-test',
        failureThreshold: 3,
        successThreshold: 2,
        resetTimeout: 1_000,
        failureWindow: 10_000,
        ...overrides,
      },
      () => clock
    );
  }

  async function trip(breaker: CircuitBreaker, times: number = 1) {
    for (let i = 0; i < times; i++) {
      await expect(breaker.execute(failing)).rejects.toThrow('Sheets unavailable');
    }
  }

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('passes calls through while closed', async () => {
    const breaker = createBreaker();
    await expect(breaker.execute(() => Promise.resolve('row written'))).resolves.toBe('row written');
    expect(breaker.getStats().state).toBe('closed');
  });

  it('opens once the failure threshold is reached inside the window', async () => {
    const breaker = createBreaker({ failureThreshold: 2 });
    await trip(breaker, 2);
    expect(breaker.getStats().state).toBe('open');
  });

  it('forgets failures that fall out of the window', async () => {
    const breaker = createBreaker({ failureThreshold: 2 });
    await trip(breaker);
    clock += 10_001;
    await trip(breaker);

    expect(breaker.getStats()).toMatchObject({ state: 'closed', failures: 1 });
  });

  it('fails fast while open without calling through', async () => {
    const breaker = createBreaker({ failureThreshold: 1 });
    await trip(breaker);

    const called = jest.fn(() => Promise.resolve('never'));
    await expect(breaker.execute(called)).rejects.toBeInstanceOf(CircuitBreakerError);
    expect(called).not.toHaveBeenCalled();
    expect(breaker.getStats().rejectedRequests).toBe(1);
  });

  it('lets one trial call through after the reset timeout', async () => {
    const breaker = createBreaker({ failureThreshold: 1 });
    await trip(breaker);
    clock += 1_000;

    let finishTrial: (value: string) => void = () => undefined;
    const trial = breaker.execute(
      () =>
        new Promise<string>((resolve) => {
          finishTrial = resolve;
        })
    );

    await expect(breaker.execute(() => Promise.resolve('second'))).rejects.toBeInstanceOf(CircuitBreakerError);
    finishTrial('trial');
    await expect(trial).resolves.toBe('trial');
    expect(breaker.getStats().state).toBe('half-open');
  });

  it('closes after enough successful trials', async () => {
    const breaker = createBreaker({ failureThreshold: 1, successThreshold: 2 });
    await trip(breaker);
    clock += 1_000;

    await breaker.execute(() => Promise.resolve('ok'));
    await breaker.execute(() => Promise.resolve('ok'));
    expect(breaker.getStats()).toMatchObject({ state: 'closed', failures: 0, openedAt: null });
  });

  it('reopens when a trial fails', async () => {
    const breaker = createBreaker({ failureThreshold: 1 });
    await trip(breaker);
    clock += 1_000;

    await trip(breaker);
    expect(breaker.getStats()).toMatchObject({ state: 'open', openedAt: new Date(clock) });
  });

  it('counts requests and failures', async () => {
    const breaker = createBreaker({ failureThreshold: 10 });
    await breaker.execute(() => Promise.resolve('ok'));
    await trip(breaker);
    await trip(breaker);

    expect(breaker.getStats()).toEqual({
      state: 'closed',
      failures: 2,
      totalRequests: 3,
      rejectedRequests: 0,
      lastFailure: new Date(clock),
      openedAt: null,
    });
  });
});

describe('breakerFor', () => {
  it('returns one breaker per external API and reports it', () => {
    const first = breakerFor(CIRCUIT_BREAKER_CONFIGS.TELEGRAM_API);
    const second = breakerFor(CIRCUIT_BREAKER_CONFIGS.TELEGRAM_API);

    expect(second).toBe(first);
    expect(breakerStats()[CIRCUIT_BREAKER_CONFIGS.TELEGRAM_API.name]?.state).toBe('closed');
  });
});
