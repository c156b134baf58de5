/**
 * Unit tests for progress-queue.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProgressChannel } from '../progress-channel';
import { ProgressMessageQueue } from '../progress-queue';

describe('ProgressMessageQueue', () => {
  let queue: ProgressMessageQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    queue = new ProgressMessageQueue({ enterMs: 500, holdMs: 1500, exitMs: 500 });
  });

  afterEach(() => {
    queue.dispose();
    vi.useRealTimers();
  });

  it('paces one message through enter, hold and exit', () => {
    queue.enqueue('Gerando documento');
    expect(queue.display).toEqual({ text: 'Gerando documento', phase: 'entering' });

    vi.advanceTimersByTime(500);
    expect(queue.display.phase).toBe('holding');

    vi.advanceTimersByTime(1500);
    expect(queue.display.phase).toBe('exiting');

    vi.advanceTimersByTime(500);
    expect(queue.display).toEqual({ text: 'Gerando documento', phase: 'idle' });
  });

  it('shows buffered messages one at a time, in order', () => {
    queue.enqueue('um');
    queue.enqueue('dois');
    queue.enqueue('tres');

    expect(queue.display.text).toBe('um');
    expect(queue.pending).toBe(2);

    vi.advanceTimersByTime(2499);
    expect(queue.display).toEqual({ text: 'um', phase: 'exiting' });

    vi.advanceTimersByTime(1);
    expect(queue.display).toEqual({ text: 'dois', phase: 'entering' });

    vi.advanceTimersByTime(2500);
    expect(queue.display).toEqual({ text: 'tres', phase: 'entering' });
    expect(queue.history).toEqual(['um', 'dois', 'tres']);
  });

  it('resumes when a message arrives after going idle', () => {
    queue.enqueue('um');
    vi.advanceTimersByTime(2500);
    expect(queue.display.phase).toBe('idle');

    queue.enqueue('dois');
    expect(queue.display).toEqual({ text: 'dois', phase: 'entering' });
  });

  it('drains a channel without ever showing the sentinel', async () => {
    const channel = new ProgressChannel({ sentinel: 'DONE' });
    const drained = queue.drain(channel);

    channel.push('Preenchendo modelo');
    channel.push('Convertendo para PDF');
    channel.push('DONE');
    await drained;

    await vi.advanceTimersByTimeAsync(5000);
    expect(queue.history).toEqual(['Preenchendo modelo', 'Convertendo para PDF']);
    expect(queue.display).toEqual({ text: 'Convertendo para PDF', phase: 'idle' });
  });

  it('reset hides the current message and forgets history', () => {
    queue.enqueue('um');
    queue.enqueue('dois');
    queue.reset();

    expect(queue.display).toEqual({ text: null, phase: 'idle' });
    expect(queue.history).toEqual([]);
    expect(queue.pending).toBe(0);
    vi.advanceTimersByTime(5000);
    expect(queue.display).toEqual({ text: null, phase: 'idle' });
  });
});
