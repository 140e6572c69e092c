import { vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { dispatchShellCommand, runColdStartSequence } from './cold-start.js';

describe('runColdStartSequence', () => {
  it('dispatches every command in order with a sleep after each', async () => {
    const calls: string[] = [];
    const dispatch = vi.fn(async (command: string) => {
      calls.push(`run:${command}`);
    });
    const sleep = vi.fn(async (ms: number) => {
      calls.push(`sleep:${ms}`);
    });

    await runColdStartSequence(['disable gpu', 'enable gpu', 'apply profile'], 16_000, { dispatch, sleep });

    expect(calls).toEqual([
      'run:disable gpu',
      'sleep:16000',
      'run:enable gpu',
      'sleep:16000',
      'run:apply profile',
      'sleep:16000',
    ]);
  });

  it('does nothing for an empty sequence', async () => {
    const dispatch = vi.fn(async () => {});
    const sleep = vi.fn(async () => {});
    await runColdStartSequence([], 1_000, { dispatch, sleep });
    expect(dispatch).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports a failed dispatch and continues with the next command', async () => {
    const dispatch = vi.fn(async (command: string) => {
      if (command === 'missing-tool') throw new Error('spawn ENOENT');
    });
    const onCommand = vi.fn<(command: string, error?: Error) => void>();

    await runColdStartSequence(['missing-tool', 'next'], 0, {
      dispatch,
      sleep: async () => {},
      onCommand,
    });

    expect(dispatch).toHaveBeenCalledTimes(2);
    expect(onCommand.mock.calls[0]?.[0]).toBe('missing-tool');
    expect(onCommand.mock.calls[0]?.[1]?.message).toBe('spawn ENOENT');
    expect(onCommand.mock.calls[1]).toEqual(['next', undefined]);
  });
});

describe.skipIf(process.platform === 'win32')('dispatchShellCommand', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rigkeeper-cold-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('runs the command through the shell', async () => {
    const marker = join(dir, 'marker.txt');
    await dispatchShellCommand(`echo reset > "${marker}"`);

    await vi.waitFor(() => {
      expect(existsSync(marker)).toBe(true);
      expect(readFileSync(marker, 'utf8')).toBe('reset\n');
    });
  });

  it('resolves regardless of the exit status', async () => {
    await expect(dispatchShellCommand('exit 3')).resolves.toBeUndefined();
  });
});
