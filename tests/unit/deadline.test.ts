import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'events';
import { createDeadline, deadline } from '../../src/group/deadline.js';
import { DeadlineExceededError, WaitAbortedError, toWaitError } from '../../src/group/errors.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('deadline', () => {
  it('aborts with a DeadlineExceededError once the time is up', async () => {
    const signal = deadline(5);

    expect(signal.aborted).toBe(false);
    await sleep(20);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(DeadlineExceededError);
    expect(signal.reason.timeoutMs).toBe(5);
    expect(signal.reason.message).toBe('deadline exceeded after 5ms');
  });

  it('follows the parent signal when it aborts first', () => {
    const parent = new AbortController();
    const signal = deadline(10000, parent.signal);

    parent.abort('shutdown');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe('shutdown');
  });

  it('is aborted from the start when the parent already is', () => {
    const parent = new AbortController();
    const reason = new Error('already gone');
    parent.abort(reason);

    const signal = deadline(10000, parent.signal);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
  });
});

describe('createDeadline', () => {
  it('detaches from the parent once disposed', () => {
    const parent = new AbortController();
    const timeout = createDeadline(10000, parent.signal);

    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(1);

    timeout.dispose();
    parent.abort('late');

    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(0);
    expect(timeout.signal.aborted).toBe(false);
  });

  it('never fires after being disposed', async () => {
    const timeout = createDeadline(5);

    timeout.dispose();
    await sleep(20);

    expect(timeout.signal.aborted).toBe(false);
  });

  it('detaches from the parent when it fires', async () => {
    const parent = new AbortController();
    const timeout = createDeadline(5, parent.signal);

    await sleep(20);

    expect(timeout.signal.reason).toBeInstanceOf(DeadlineExceededError);
    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(0);
  });
});

describe('toWaitError', () => {
  it('passes Error reasons through', () => {
    const controller = new AbortController();
    const reason = new Error('boom');
    controller.abort(reason);

    expect(toWaitError(controller.signal)).toBe(reason);
  });

  it('wraps other reasons', () => {
    const controller = new AbortController();
    controller.abort(42);

    const error = toWaitError(controller.signal);

    expect(error).toBeInstanceOf(WaitAbortedError);
    expect(error.message).toBe('wait aborted: 42');
  });
});
