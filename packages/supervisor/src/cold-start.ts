/**
 * Cold-start sequence -- environment reset commands (device disable/enable,
 * clock profiles and the like) run before a cold launch.
 *
 * Commands are opaque shell strings. Each is dispatched and left to run;
 * its exit status is never checked. The runner waits a fixed interval
 * after every dispatch before moving on.
 */

import { spawn } from 'node:child_process';
import { toError } from '@rigkeeper/core';

export type CommandDispatcher = (command: string) => Promise<void>;

export interface ColdStartDeps {
  sleep: (ms: number) => Promise<void>;
  /** Defaults to dispatchShellCommand. */
  dispatch?: CommandDispatcher;
  /** Reports each command once dispatched, or with the spawn error. */
  onCommand?: (command: string, error?: Error) => void;
}

export type ColdStartRunner = (
  commands: readonly string[],
  intervalMs: number,
  deps: ColdStartDeps,
) => Promise<void>;

/**
 * Start `command` through the system shell. Resolves once the shell is
 * spawned; rejects only if it could not be spawned at all.
 */
export function dispatchShellCommand(command: string): Promise<void> {
  const child = spawn(command, { shell: true, stdio: 'ignore', windowsHide: true });

  return new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      cleanup();
      child.unref();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const cleanup = () => {
      child.off('spawn', onSpawn);
      child.off('error', onError);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

export const runColdStartSequence: ColdStartRunner = async (commands, intervalMs, deps) => {
  const dispatch = deps.dispatch ?? dispatchShellCommand;

  for (const command of commands) {
    let error: Error | undefined;
    try {
      await dispatch(command);
    } catch (err) {
      // A reset step that cannot start is logged; the sequence goes on.
      error = toError(err);
    }
    deps.onCommand?.(command, error);
    await deps.sleep(intervalMs);
  }
};
