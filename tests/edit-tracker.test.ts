import { afterEach, describe, it, expect, vi } from 'vitest';

import { EditTracker, startPurgeTask } from '../src/core/edit-tracker.js';
import { mergeMessageUpdate } from '../src/core/message.js';
import { OnceCell } from '../src/core/once-cell.js';
import { T0, makeMessage } from './helpers.js';

describe('EditTracker updates', () => {
  it('merges only the fields present on the update', () => {
    const tracker = EditTracker.forTimespan(60_000);
    const trigger = makeMessage({
      content: '!ping',
      pinned: true,
      attachments: [{ id: '1', filename: 'a.png', url: 'https://cdn.invalid/a.png', size: 3 }],
    });
    tracker.record(trigger, makeMessage({ id: '900', content: 'pong' }));

    const merged = tracker.applyUpdate({ id: '500', channelId: '200', content: '!pong', editedTimestamp: T0 + 5 });

    expect(merged.content).toBe('!pong');
    expect(merged.editedTimestamp).toBe(T0 + 5);
    expect(merged.pinned).toBe(true);
    expect(merged.author).toEqual({ id: '300', username: 'alice', bot: false });
    expect(merged.attachments).toHaveLength(1);
    expect(tracker.findResponse('500')?.trigger.content).toBe('!pong');
  });

  it('returns a copy that does not alias the cached trigger', () => {
    const tracker = EditTracker.forTimespan(60_000);
    tracker.record(makeMessage({ content: '!ping' }), makeMessage({ id: '900' }));

    const merged = tracker.applyUpdate({ id: '500', channelId: '200', content: '!pong' });
    merged.content = 'changed';
    merged.author.username = 'mallory';

    const cached = tracker.findResponse('500')?.trigger;
    expect(cached?.content).toBe('!pong');
    expect(cached?.author.username).toBe('alice');
  });

  it('does not alias the recorded messages either', () => {
    const tracker = EditTracker.forTimespan(60_000);
    const trigger = makeMessage({ content: '!ping' });
    tracker.record(trigger, makeMessage({ id: '900' }));
    trigger.content = 'mutated after record';

    expect(tracker.findResponse('500')?.trigger.content).toBe('!ping');
  });

  it('builds a fresh message for untracked updates', () => {
    const tracker = EditTracker.forTimespan(60_000);

    const message = tracker.applyUpdate({ id: '77', channelId: '200', guildId: '10', content: '!help' });

    expect(message).toMatchObject({
      id: '77',
      channelId: '200',
      guildId: '10',
      content: '!help',
      timestamp: 0,
      editedTimestamp: null,
      author: { id: '0', username: '', bot: false },
    });
    expect(tracker.size).toBe(0);
  });

  it('keeps the original embeds when an update carries new ones', () => {
    const message = makeMessage({ embeds: [{ title: 'original' }] });
    mergeMessageUpdate(message, { id: '500', channelId: '200', embeds: [{ title: 'replacement' }] });
    expect(message.embeds).toEqual([{ title: 'original' }]);
  });

  it('always overwrites the guild id, even with undefined', () => {
    const message = makeMessage({ guildId: '10' });
    mergeMessageUpdate(message, { id: '500', channelId: '200' });
    expect(message.guildId).toBeUndefined();
  });
});

describe('EditTracker lookups', () => {
  it('returns the oldest exchange when a trigger was recorded twice', () => {
    const tracker = EditTracker.forTimespan(60_000);
    tracker.record(makeMessage(), makeMessage({ id: '901' }));
    tracker.record(makeMessage(), makeMessage({ id: '902' }));

    expect(tracker.size).toBe(2);
    expect(tracker.findResponse('500')?.response.id).toBe('901');
  });

  it('takeResponse removes the exchange and returns its response', () => {
    const tracker = EditTracker.forTimespan(60_000);
    tracker.record(makeMessage(), makeMessage({ id: '901' }));

    expect(tracker.takeResponse('500')?.id).toBe('901');
    expect(tracker.takeResponse('500')).toBeUndefined();
    expect(tracker.findResponse('500')).toBeUndefined();
    expect(tracker.size).toBe(0);
  });
});

describe('EditTracker purge', () => {
  it('keeps entries younger than the max age and drops the rest', () => {
    const tracker = EditTracker.forTimespan(1000);
    const now = T0 + 10_000;
    tracker.record(makeMessage({ id: 'fresh', timestamp: now - 999 }), makeMessage({ id: 'r1' }));
    tracker.record(makeMessage({ id: 'boundary', timestamp: now - 1000 }), makeMessage({ id: 'r2' }));
    tracker.record(makeMessage({ id: 'stale', timestamp: now - 5000 }), makeMessage({ id: 'r3' }));
    tracker.record(
      makeMessage({ id: 'recently-edited', timestamp: now - 5000, editedTimestamp: now - 10 }),
      makeMessage({ id: 'r4' }),
    );
    tracker.record(makeMessage({ id: 'future', timestamp: now + 5 }), makeMessage({ id: 'r5' }));

    expect(tracker.purge(now)).toBe(3);
    expect(tracker.size).toBe(2);
    expect(tracker.findResponse('fresh')?.response.id).toBe('r1');
    expect(tracker.findResponse('recently-edited')?.response.id).toBe('r4');
    expect(tracker.findResponse('boundary')).toBeUndefined();
    expect(tracker.findResponse('future')).toBeUndefined();
  });

  it('returns 0 on an empty tracker', () => {
    expect(EditTracker.forTimespan(1000).purge(T0)).toBe(0);
  });
});

describe('startPurgeTask', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('purges immediately and then on every interval until stopped', () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);

    const tracker = EditTracker.forTimespan(90_000);
    tracker.record(makeMessage({ id: 'a', timestamp: T0 }), makeMessage({ id: 'r1' }));
    tracker.record(makeMessage({ id: 'old', timestamp: T0 - 90_000 }), makeMessage({ id: 'r2' }));

    const task = startPurgeTask(tracker, 60_000);
    expect(tracker.size).toBe(1);

    vi.advanceTimersByTime(60_000);
    expect(tracker.size).toBe(1);

    vi.advanceTimersByTime(60_000);
    expect(tracker.size).toBe(0);

    task.stop();
    tracker.record(makeMessage({ id: 'b', timestamp: T0 }), makeMessage({ id: 'r3' }));
    vi.advanceTimersByTime(60_000);
    expect(tracker.size).toBe(1);
  });
});

describe('OnceCell', () => {
  it('resolves waiters registered before the value is set', async () => {
    const cell = new OnceCell<string>();
    const waiting = cell.wait();

    expect(cell.isSet).toBe(false);
    expect(cell.get()).toBeUndefined();

    expect(cell.set('first')).toBe(true);
    await expect(waiting).resolves.toBe('first');
  });

  it('keeps the first value', async () => {
    const cell = new OnceCell<number>();
    cell.set(1);

    expect(cell.set(2)).toBe(false);
    expect(cell.get()).toBe(1);
    await expect(cell.wait()).resolves.toBe(1);
  });
});
