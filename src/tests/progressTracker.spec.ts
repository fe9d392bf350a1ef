import { describe, it, expect } from 'vitest';
import { generateProgressToken, ProgressTracker } from '../services/progressTracker';
import type { ProgressNotificationParams } from '../models/capabilities';
import { ErrorCode } from '../services/errors';
import { thrownBy } from './testUtils';
import { MemoryLogger } from '../services/logger';

describe('ProgressTracker', () => {
  it('tracks updates and forgets the token on completion', async () => {
    const sent: ProgressNotificationParams[] = [];
    let now = 100;
    const tracker = new ProgressTracker({ notifier: u => { sent.push(u); }, now: () => now });
    tracker.start('t1');
    now = 150;
    await tracker.update('t1', 0.5, 10);
    expect(tracker.get('t1')).toEqual({ token: 't1', progress: 0.5, total: 10, startTime: 100, updatedAt: 150 });
    now = 200;
    const done = await tracker.complete('t1');
    expect(done.progress).toBe(1);
    expect(sent).toEqual([
      { progressToken: 't1', progress: 0.5, total: 10 },
      { progressToken: 't1', progress: 1, total: 10 },
    ]);
    expect(thrownBy(() => tracker.get('t1'))).toMatchObject({ code: ErrorCode.InvalidRequest, message: 'progress token not found' });
  });

  it('rejects progress outside 0..1', async () => {
    const tracker = new ProgressTracker();
    tracker.start('t');
    await expect(tracker.update('t', 1.5)).rejects.toMatchObject({ code: ErrorCode.InvalidParams, message: 'progress must be between 0 and 1' });
    await expect(tracker.update('t', Number.NaN)).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(tracker.update('t', 0.2, -1)).rejects.toMatchObject({ message: 'total must be a non-negative number' });
    expect(tracker.get('t').progress).toBe(0);
  });

  it('aborts the scope on cancel without notifying', () => {
    const sent: ProgressNotificationParams[] = [];
    const tracker = new ProgressTracker({ notifier: u => { sent.push(u); } });
    const signal = tracker.start('t');
    tracker.cancel('t', 'stopped');
    expect(signal.aborted).toBe(true);
    expect(tracker.has('t')).toBe(false);
    expect(sent).toEqual([]);
  });

  it('drops the record without notifying when the parent signal aborts', async () => {
    const sent: ProgressNotificationParams[] = [];
    const tracker = new ProgressTracker({ notifier: u => { sent.push(u); } });
    const parent = new AbortController();
    const signal = tracker.start('t', parent.signal);
    parent.abort(new Error('caller gone'));
    expect(signal.aborted).toBe(true);
    expect(tracker.has('t')).toBe(false);
    await expect(tracker.complete('t')).rejects.toMatchObject({ code: ErrorCode.InvalidRequest, message: 'progress token not found' });
    expect(sent).toEqual([]);
  });

  it('does not track a token whose parent already aborted', () => {
    const tracker = new ProgressTracker();
    const parent = new AbortController();
    parent.abort(new Error('gone'));
    expect(tracker.start('t', parent.signal).aborted).toBe(true);
    expect(tracker.has('t')).toBe(false);
  });

  it('leaves a replacement record alone when the replaced call aborts', () => {
    const tracker = new ProgressTracker();
    const parent = new AbortController();
    tracker.start('t', parent.signal);
    const second = tracker.start('t');
    parent.abort();
    expect(second.aborted).toBe(false);
    expect(tracker.has('t')).toBe(true);
  });

  it('replaces a record started twice under one token', () => {
    const tracker = new ProgressTracker();
    const first = tracker.start('t');
    const second = tracker.start('t');
    expect(first.aborted).toBe(true);
    expect(second.aborted).toBe(false);
    expect(tracker.tokens()).toEqual(['t']);
  });

  it('logs a failed notification and keeps the state', async () => {
    const log = new MemoryLogger();
    const tracker = new ProgressTracker({ logger: log, notifier: () => { throw new Error('offline'); } });
    tracker.start('t');
    const snap = await tracker.update('t', 0.25);
    expect(snap.progress).toBe(0.25);
    expect(log.events('warn')).toEqual(['progress_notify_failed']);
  });

  it('cancels everything on cancelAll', () => {
    const tracker = new ProgressTracker();
    const a = tracker.start('a');
    const b = tracker.start('b');
    tracker.cancelAll();
    expect([a.aborted, b.aborted]).toEqual([true, true]);
    expect(tracker.list()).toEqual([]);
  });

  it('generates distinct tokens', () => {
    const t = generateProgressToken();
    expect(t).toMatch(/^progress_[0-9a-f]{16}$/);
    expect(generateProgressToken()).not.toBe(t);
  });

  it('rejects an empty token', () => {
    expect(thrownBy(() => new ProgressTracker().start(''))).toMatchObject({ code: ErrorCode.InvalidParams });
  });
});
