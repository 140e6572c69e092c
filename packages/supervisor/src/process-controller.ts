/**
 * ProcessController -- launches the worker as a detached peer process,
 * polls its liveness and kills its whole process tree.
 *
 * The keeper holds a WorkerHandle but does not own the process behind it:
 * the child runs in its own session (its own console on Windows) and is
 * unref'd, so it outlives the keeper if the keeper itself is terminated.
 * That non-ownership is intended; call forceKill to end the worker.
 */

import { spawn } from 'node:child_process';
import { basename, dirname, resolve } from 'node:path';
import { ProcessError, isNodeError } from '@rigkeeper/core';
import type { WorkerSpec } from '@rigkeeper/core';

// ── Types ────────────────────────────────────────────────────────────────

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface WorkerHandle {
  readonly pid: number;
  /** Non-blocking: false once the process has been seen to exit. */
  isAlive(): boolean;
  /** Settles when the process exits. Never rejects. */
  readonly exited: Promise<WorkerExit>;
}

/** What the keeper needs from a process controller. */
export interface WorkerController {
  launch(spec: WorkerSpec): Promise<WorkerHandle>;
  isAlive(handle: WorkerHandle): boolean;
  forceKill(handle: WorkerHandle): void;
}

export interface ProcessControllerOptions {
  /** Selects the tree-kill mechanism. Defaults to process.platform. */
  platform?: NodeJS.Platform;
  /** Kill failures are reported here and otherwise ignored. */
  onKillError?: (error: ProcessError) => void;
}

/**
 * Directory the worker should run from: the executable's own directory,
 * or undefined when the path is a bare file name.
 */
export function workingDirectoryOf(path: string): string | undefined {
  if (basename(path) === path) return undefined;
  return dirname(resolve(path));
}

// ── ProcessController ────────────────────────────────────────────────────

export class ProcessController implements WorkerController {
  private readonly platform: NodeJS.Platform;
  private readonly onKillError?: (error: ProcessError) => void;

  constructor(options: ProcessControllerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.onKillError = options.onKillError;
  }

  /**
   * Spawn the worker with its directory as cwd. Resolves once the OS has
   * created the process; rejects with ProcessError if it could not start.
   */
  async launch(spec: WorkerSpec): Promise<WorkerHandle> {
    const cwd = workingDirectoryOf(spec.path);
    const file = cwd === undefined ? spec.path : resolve(spec.path);

    // Always a group leader, so forceKill can reach every descendant.
    const proc = spawn(file, spec.args ?? [], {
      cwd,
      detached: true,
      stdio: 'ignore',
      windowsHide: !spec.newConsole,
    });

    // Wait for the process to actually spawn before resolving.
    await new Promise<void>((resolveSpawn, reject) => {
      const onSpawn = () => {
        cleanup();
        resolveSpawn();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ProcessError(`Failed to launch "${file}": ${err.message}`, undefined, { path: file }));
      };
      const cleanup = () => {
        proc.off('spawn', onSpawn);
        proc.off('error', onError);
      };
      proc.once('spawn', onSpawn);
      proc.once('error', onError);
    });

    const pid = proc.pid;
    if (pid === undefined) {
      throw new ProcessError(`Launched "${file}" but the OS reported no pid`, undefined, { path: file });
    }

    let exit: WorkerExit | null = null;
    const exited = new Promise<WorkerExit>((resolveExit) => {
      proc.once('exit', (code, signal) => {
        exit = { code, signal };
        resolveExit(exit);
      });
    });

    // Late errors (e.g. a failed kill from Node's side) must not crash the keeper.
    proc.on('error', (err) => {
      this.onKillError?.(new ProcessError(err.message, pid));
    });

    proc.unref();

    return {
      pid,
      isAlive: () => exit === null && proc.exitCode === null && proc.signalCode === null,
      exited,
    };
  }

  isAlive(handle: WorkerHandle): boolean {
    return handle.isAlive();
  }

  /**
   * Kill the worker and every descendant. Fire-and-forget: the caller does
   * not wait for the tree to disappear. A no-op for dead handles.
   */
  forceKill(handle: WorkerHandle): void {
    if (!handle.isAlive()) return;

    if (this.platform === 'win32') {
      const killer = spawn('taskkill', ['/PID', String(handle.pid), '/T', '/F'], {
        stdio: 'ignore',
        windowsHide: true,
      });
      killer.on('error', (err) => {
        this.onKillError?.(new ProcessError(`taskkill failed: ${err.message}`, handle.pid));
      });
      return;
    }

    // The worker leads its own process group; signal the group first.
    if (this.trySignal(-handle.pid) === null) return;
    const failure = this.trySignal(handle.pid);
    if (failure !== null) {
      this.onKillError?.(
        new ProcessError(`kill ${handle.pid} failed: ${failure}`, handle.pid, { code: failure }),
      );
    }
  }

  // ── Internal ─────────────────────────────────────────────────────────

  /** SIGKILL `target`; returns null on success or the errno code for ESRCH / EPERM. */
  private trySignal(target: number): string | null {
    try {
      process.kill(target, 'SIGKILL');
      return null;
    } catch (err) {
      if (isNodeError(err) && (err.code === 'ESRCH' || err.code === 'EPERM')) return err.code;
      throw err;
    }
  }
}
