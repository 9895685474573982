/**
 * Command Budget
 *
 * The only component allowed to start external processes. A global hard
 * ceiling bounds concurrent runs; when it is reached new runs are rejected
 * immediately instead of queueing, so a slow tool can never pile up work.
 * Every run carries a timeout that kills the process group and frees the
 * slot at once.
 *
 * Long-running watch streams are tracked separately and do not count
 * against the run ceiling.
 */

import { createInterface } from 'readline';
import { getErrorMessage, logSnippet } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { COMMAND_TIMEOUTS, SLOW_JITTER_MS, classifyCommand, commandArgv } from './command-line.js';
import type { CommandKind } from './command-line.js';
import { spawnProcessGroup } from './process-spawner.js';
import type { ProcessSpawner, SpawnedProcess } from './process-spawner.js';

// ============================================================
// Types
// ============================================================

/** Output beyond this many characters per stream is dropped. */
export const MAX_OUTPUT_CHARS = 64 * 1024;

export interface CommandSpec {
  command: string;
  /** Exact argv to execute; `command` is then only used for logging and classification. */
  argv?: readonly string[];
  /** Defaults to a guess from the command text. */
  kind?: CommandKind;
  /** Overrides the per-kind timeout. */
  timeoutMs?: number;
}

export type CommandOutcome =
  | {
      status: 'completed';
      stdout: string;
      stderr: string;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      durationMs: number;
    }
  | { status: 'timed-out'; timeoutMs: number }
  | { status: 'rejected' }
  | { status: 'failed'; error: string };

export interface CommandStream {
  stop(): void;
}

export interface CommandBudgetConfig {
  maxConcurrent: number;
  spawner?: ProcessSpawner;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

function collect(stream: SpawnedProcess['stdout'], sink: { text: string }): void {
  stream.setEncoding('utf-8');
  stream.on('data', (chunk: string) => {
    if (sink.text.length < MAX_OUTPUT_CHARS) {
      sink.text += chunk.slice(0, MAX_OUTPUT_CHARS - sink.text.length);
    }
  });
}

// ============================================================
// Budget
// ============================================================

export class CommandBudget {
  private maxConcurrent: number;
  private running = 0;
  private streams = new Set<SpawnedProcess>();
  private spawner: ProcessSpawner;
  private random: () => number;
  private now: () => number;
  private logger: Logger;

  constructor(config: CommandBudgetConfig) {
    this.maxConcurrent = Math.max(1, config.maxConcurrent);
    this.spawner = config.spawner ?? spawnProcessGroup;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get debug() { return this.logger.debug.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  setMaxConcurrent(maxConcurrent: number): void {
    this.maxConcurrent = Math.max(1, maxConcurrent);
  }

  get active(): number {
    return this.running;
  }

  get activeStreams(): number {
    return this.streams.size;
  }

  /** Random delay to add to the next scheduled run of a command. */
  jitterFor(command: string, kind: CommandKind = classifyCommand(command)): number {
    return kind === 'slow' ? Math.floor(this.random() * (SLOW_JITTER_MS + 1)) : 0;
  }

  /**
   * Run a command to completion under the budget.
   * Never rejects: every failure mode is an outcome.
   */
  run(spec: CommandSpec): Promise<CommandOutcome> {
    if (this.running >= this.maxConcurrent) {
      this.debug(`Rejected ${logSnippet(spec.command)}: ${this.running}/${this.maxConcurrent} slots busy`);
      return Promise.resolve({ status: 'rejected' });
    }

    const kind = spec.kind ?? classifyCommand(spec.command);
    const timeoutMs = spec.timeoutMs ?? COMMAND_TIMEOUTS[kind];
    const [program, ...args] = spec.argv ?? commandArgv(spec.command);

    let proc: SpawnedProcess;
    try {
      proc = this.spawner(program, args);
    } catch (err) {
      return Promise.resolve({ status: 'failed', error: getErrorMessage(err) });
    }

    this.running++;
    const startedAt = this.now();

    return new Promise((resolve) => {
      let settled = false;
      const stdout = { text: '' };
      const stderr = { text: '' };

      const settle = (outcome: CommandOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.running--;
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        this.warn(`Timed out after ${timeoutMs}ms: ${logSnippet(spec.command)}`);
        proc.killGroup('SIGKILL');
        settle({ status: 'timed-out', timeoutMs });
      }, timeoutMs);

      collect(proc.stdout, stdout);
      collect(proc.stderr, stderr);

      proc.onError((err) => {
        settle({ status: 'failed', error: getErrorMessage(err) });
      });

      proc.onClose((exitCode, signal) => {
        settle({
          status: 'completed',
          stdout: stdout.text,
          stderr: stderr.text,
          exitCode,
          signal,
          durationMs: this.now() - startedAt,
        });
      });
    });
  }

  /**
   * Start a long-running command and deliver each stdout line.
   * `onExit` fires once when the stream ends for any reason other than stop().
   */
  stream(
    command: string,
    onLine: (line: string) => void,
    onExit: (reason: string) => void,
  ): CommandStream | null {
    const [program, ...args] = commandArgv(command);
    let proc: SpawnedProcess;
    try {
      proc = this.spawner(program, args);
    } catch (err) {
      this.warn(`Cannot start watch stream ${logSnippet(command)}: ${getErrorMessage(err)}`);
      return null;
    }

    this.streams.add(proc);
    let ended = false;
    const end = (reason: string): void => {
      if (ended) return;
      ended = true;
      lines.close();
      this.streams.delete(proc);
      onExit(reason);
    };

    const lines = createInterface({ input: proc.stdout });
    lines.on('line', onLine);
    proc.stderr.resume();
    proc.onError((err) => end(getErrorMessage(err)));
    proc.onClose((code, signal) => end(`exited (${signal ?? code ?? 'unknown'})`));

    return {
      stop: () => {
        if (ended) return;
        ended = true;
        lines.close();
        this.streams.delete(proc);
        proc.killGroup('SIGTERM');
      },
    };
  }

  /** Kill every watch stream. Runs in flight finish or time out on their own. */
  stopStreams(): void {
    for (const proc of this.streams) {
      proc.killGroup('SIGTERM');
    }
    this.streams.clear();
  }
}
