/**
 * Process spawning seam for the command budget.
 *
 * Every child runs in its own process group so a timeout can kill the
 * whole tree (pipelines under `sh -c` included), not just the shell.
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';

export interface SpawnedProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Fires once the process exited and its output streams closed. */
  onClose(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (err: Error) => void): void;
  killGroup(signal: NodeJS.Signals): void;
}

export type ProcessSpawner = (program: string, args: readonly string[]) => SpawnedProcess;

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

export const spawnProcessGroup: ProcessSpawner = (program, args) => {
  const child = spawn(program, [...args], {
    detached: true,
    stdio: ['ignore', 'pipe', 'pipe'],
    env: process.env,
  });
  const { stdout, stderr } = child;
  if (!stdout || !stderr) {
    child.kill('SIGKILL');
    throw new Error(`spawn of ${program} returned no output pipes`);
  }

  return {
    stdout,
    stderr,
    onClose: (listener) => {
      child.once('close', listener);
    },
    onError: (listener) => {
      child.once('error', listener);
    },
    killGroup: (signal) => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, signal);
      } catch (err) {
        if (!isNoSuchProcess(err)) {
          child.kill(signal);
        }
      }
    },
  };
};
