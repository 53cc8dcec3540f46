import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { EventEmitter, getEventListeners } from 'events';
import { spawn } from 'child_process';
import { runCommands, CommandFailedError } from '../../src/commands/run.js';
import { DeadlineExceededError } from '../../src/group/errors.js';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));

let nextPid = 4000;

class FakeChild extends EventEmitter {
  pid: number | undefined = nextPid++;
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  stdin = { end: vi.fn() };
  kill = vi.fn(() => {
    setImmediate(() => this.emit('close', null));
    return true;
  });
}

describe('runCommands', () => {
  let children: FakeChild[];

  beforeEach(() => {
    vi.clearAllMocks();
    children = [];
    (spawn as unknown as Mock).mockImplementation(() => {
      const child = new FakeChild();
      children.push(child);
      return child;
    });
    vi.spyOn(process, 'kill').mockImplementation((pid: number) => {
      const child = children.find((c) => c.pid !== undefined && -c.pid === pid);
      if (child) {
        setImmediate(() => child.emit('close', null));
      }
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs every command and collects its output', async () => {
    const pending = runCommands(['echo one', 'echo two']);

    expect(children).toHaveLength(2);
    children[0].stdout.emit('data', Buffer.from('one\n'));
    children[1].stdout.emit('data', Buffer.from('two\n'));
    children[0].emit('close', 0);
    children[1].emit('close', 0);

    const summary = await pending;

    expect(summary.error).toBeUndefined();
    expect(summary.results.map((r) => [r.command, r.exitCode, r.stdout, r.cancelled])).toEqual([
      ['echo one', 0, 'one\n', false],
      ['echo two', 0, 'two\n', false],
    ]);
  });

  it('spawns through the configured shell and directory', async () => {
    const pending = runCommands(['echo hi'], { shell: 'bash', cwd: '/tmp' });
    children[0].emit('close', 0);
    await pending;

    expect(spawn).toHaveBeenCalledWith(
      'bash',
      ['-c', 'echo hi'],
      expect.objectContaining({ cwd: '/tmp', detached: true }),
    );
    expect(children[0].stdin.end).toHaveBeenCalled();
  });

  it('stops the other commands when one fails', async () => {
    const pending = runCommands(['exit 3', 'sleep 60']);

    children[0].stderr.emit('data', Buffer.from('bad\n'));
    children[0].emit('close', 3);

    const summary = await pending;

    expect(summary.error).toBeInstanceOf(CommandFailedError);
    expect(summary.error).toMatchObject({
      command: 'exit 3',
      exitCode: 3,
      message: 'command "exit 3" exited with code 3',
    });
    expect(process.kill).toHaveBeenCalledTimes(1);
    expect(process.kill).toHaveBeenCalledWith(-(children[1].pid ?? 0), 'SIGTERM');
    expect(summary.results[0]).toMatchObject({ exitCode: 3, stderr: 'bad\n', cancelled: false });
    expect(summary.results[1]).toMatchObject({ exitCode: null, cancelled: true });
  });

  it('cancels everything when the timeout elapses', async () => {
    const summary = await runCommands(['sleep 60', 'sleep 60'], { timeoutMs: 5 });

    expect(summary.error).toBeInstanceOf(DeadlineExceededError);
    expect(process.kill).toHaveBeenCalledWith(-(children[0].pid ?? 0), 'SIGTERM');
    expect(process.kill).toHaveBeenCalledWith(-(children[1].pid ?? 0), 'SIGTERM');
    expect(summary.results.every((r) => r.cancelled)).toBe(true);
  });

  it('falls back to killing the shell when it has no pid', async () => {
    const pending = runCommands(['exit 1', 'sleep 60']);
    children[1].pid = undefined;

    children[0].emit('close', 1);
    const summary = await pending;

    expect(process.kill).not.toHaveBeenCalled();
    expect(children[1].kill).toHaveBeenCalledWith('SIGTERM');
    expect(summary.results[1].cancelled).toBe(true);
  });

  it('releases the caller signal once the run is over', async () => {
    const controller = new AbortController();
    const pending = runCommands(['echo hi'], { timeoutMs: 10000, signal: controller.signal });

    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(1);
    children[0].emit('close', 0);
    const summary = await pending;

    expect(summary.error).toBeUndefined();
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('reports spawn errors', async () => {
    const failure = new Error('spawn sh ENOENT');
    const pending = runCommands(['echo hi']);

    children[0].emit('error', failure);

    const summary = await pending;
    expect(summary.error).toBe(failure);
  });

  it('streams output to the callback', async () => {
    const onOutput = vi.fn();
    const pending = runCommands(['make'], { onOutput });

    children[0].stdout.emit('data', Buffer.from('building'));
    children[0].stderr.emit('data', Buffer.from('warning'));
    children[0].emit('close', 0);
    await pending;

    expect(onOutput).toHaveBeenNthCalledWith(1, 'make', 'building', 'stdout');
    expect(onOutput).toHaveBeenNthCalledWith(2, 'make', 'warning', 'stderr');
  });
});
