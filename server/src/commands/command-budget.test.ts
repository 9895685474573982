/**
 * Tests for CommandBudget
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { CommandBudget } from './command-budget.js';
import { createFakeSpawner } from '../testing/fake-process.js';
import type { FakeProcess } from '../testing/fake-process.js';

describe('CommandBudget', () => {
  let spawned: FakeProcess[];
  let budget: CommandBudget;

  beforeEach(() => {
    const fake = createFakeSpawner();
    spawned = fake.spawned;
    budget = new CommandBudget({ maxConcurrent: 2, spawner: fake.spawner, random: () => 0.5 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('runs simple commands without a shell', async () => {
    const pending = budget.run({ command: 'cat /sys/class/backlight/x/brightness', kind: 'fast' });
    expect(spawned[0].program).toBe('cat');
    expect(spawned[0].args).toEqual(['/sys/class/backlight/x/brightness']);
    await spawned[0].finish('42\n');
    const outcome = await pending;
    expect(outcome.status).toBe('completed');
    if (outcome.status === 'completed') {
      expect(outcome.stdout).toBe('42\n');
      expect(outcome.exitCode).toBe(0);
    }
    expect(budget.active).toBe(0);
  });

  it('runs shell syntax through sh -c', async () => {
    const pending = budget.run({ command: 'nmcli -t | head -1' });
    expect(spawned[0].program).toBe('sh');
    expect(spawned[0].args).toEqual(['-c', 'nmcli -t | head -1']);
    await spawned[0].finish('');
    await pending;
  });

  it('rejects immediately once the ceiling is reached', async () => {
    const first = budget.run({ command: 'a' });
    const second = budget.run({ command: 'b' });
    await expect(budget.run({ command: 'c' })).resolves.toEqual({ status: 'rejected' });
    expect(spawned).toHaveLength(2);
    await spawned[0].finish('');
    await spawned[1].finish('');
    await Promise.all([first, second]);
    expect(budget.active).toBe(0);
  });

  it('kills the process group on timeout and frees the slot at once', async () => {
    jest.useFakeTimers();
    const pending = budget.run({ command: 'nmcli general', kind: 'slow' });
    expect(budget.active).toBe(1);
    jest.advanceTimersByTime(800);
    await expect(pending).resolves.toEqual({ status: 'timed-out', timeoutMs: 800 });
    expect(spawned[0].kills).toEqual(['SIGKILL']);
    expect(budget.active).toBe(0);
  });

  it('honours an explicit timeout', async () => {
    jest.useFakeTimers();
    const pending = budget.run({ command: 'x', kind: 'fast', timeoutMs: 50 });
    jest.advanceTimersByTime(50);
    await expect(pending).resolves.toEqual({ status: 'timed-out', timeoutMs: 50 });
  });

  it('reports spawn errors as failures', async () => {
    const pending = budget.run({ command: 'missing-tool' });
    spawned[0].fail(new Error('spawn missing-tool ENOENT'));
    await expect(pending).resolves.toEqual({ status: 'failed', error: 'spawn missing-tool ENOENT' });
    expect(budget.active).toBe(0);
  });

  it('adds jitter to slow commands only', () => {
    expect(budget.jitterFor('pactl subscribe')).toBe(100);
    expect(budget.jitterFor('date')).toBe(0);
  });

  describe('stream', () => {
    it('delivers lines and reports unexpected exits', async () => {
      const lines: string[] = [];
      const exits: string[] = [];
      const stream = budget.stream('pactl subscribe', (line) => lines.push(line), (reason) => exits.push(reason));
      expect(stream).not.toBeNull();
      expect(budget.activeStreams).toBe(1);

      spawned[0].emitLine("Event 'change' on sink #0");
      await spawned[0].finish('');
      expect(lines).toEqual(["Event 'change' on sink #0"]);
      expect(exits).toEqual(['exited (0)']);
      expect(budget.activeStreams).toBe(0);
    });

    it('does not count against the run ceiling', async () => {
      budget.stream('pactl subscribe', () => {}, () => {});
      budget.stream('udevadm monitor', () => {}, () => {});
      const pending = budget.run({ command: 'a' });
      expect(spawned).toHaveLength(3);
      await spawned[2].finish('');
      await expect(pending).resolves.toMatchObject({ status: 'completed' });
    });

    it('kills the stream on stop without reporting an exit', async () => {
      const exits: string[] = [];
      const stream = budget.stream('pactl subscribe', () => {}, (reason) => exits.push(reason));
      stream?.stop();
      expect(spawned[0].kills).toEqual(['SIGTERM']);
      await spawned[0].finish('');
      expect(exits).toEqual([]);
    });
  });
});
