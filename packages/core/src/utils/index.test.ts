import { vi } from 'vitest';
import {
  sleep,
  minutesToMs,
  secondsToMs,
  isNodeError,
  toError,
  AbortedError,
} from './index.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('Operation aborted');
  });
});

describe('unit conversion', () => {
  it('converts minutes to ms', () => {
    expect(minutesToMs(2)).toBe(120_000);
  });

  it('converts seconds to ms', () => {
    expect(secondsToMs(20)).toBe(20_000);
  });
});

describe('isNodeError', () => {
  it('accepts errors carrying a string code', () => {
    const err = Object.assign(new Error('no such process'), { code: 'ESRCH' });
    expect(isNodeError(err)).toBe(true);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isNodeError(new Error('plain'))).toBe(false);
    expect(isNodeError({ code: 'ESRCH' })).toBe(false);
  });
});

describe('toError', () => {
  it('passes errors through', () => {
    const err = new Error('x');
    expect(toError(err)).toBe(err);
  });

  it('wraps other values', () => {
    expect(toError('boom').message).toBe('boom');
  });
});
