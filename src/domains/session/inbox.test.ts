import { describe, it, expect, vi, afterEach } from 'vitest';
import { Inbox } from './inbox';

describe('Inbox', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands lines out in push order and removes them', async () => {
    const inbox = new Inbox();
    inbox.push('a');
    inbox.push('b');

    expect(await inbox.take(10)).toBe('a');
    expect(await inbox.take(10)).toBe('b');
    expect(inbox.size).toBe(0);
  });

  it('drain returns pending lines and empties the inbox', () => {
    const inbox = new Inbox();
    inbox.push('stale 1');
    inbox.push('stale 2');

    expect(inbox.drain()).toEqual(['stale 1', 'stale 2']);
    expect(inbox.drain()).toEqual([]);
  });

  it('wakes a pending take on push', async () => {
    vi.useFakeTimers();
    const inbox = new Inbox();
    const pending = inbox.take(1000);

    inbox.push('GRIPPER_RESULT:0.500');

    await expect(pending).resolves.toBe('GRIPPER_RESULT:0.500');
    expect(inbox.size).toBe(0);
  });

  it('resolves undefined when the timeout elapses', async () => {
    vi.useFakeTimers();
    const inbox = new Inbox();
    const pending = inbox.take(50);

    await vi.advanceTimersByTimeAsync(50);

    await expect(pending).resolves.toBeUndefined();
    // the expired waiter must not swallow the next line
    inbox.push('late');
    expect(inbox.size).toBe(1);
  });

  it('rejects a second concurrent consumer', async () => {
    vi.useFakeTimers();
    const inbox = new Inbox();
    const first = inbox.take(100);

    await expect(inbox.take(100)).rejects.toThrow('pending consumer');

    inbox.push('x');
    await expect(first).resolves.toBe('x');
  });

  it('drops the oldest line when bounded', () => {
    const inbox = new Inbox(2);
    inbox.push('1');
    inbox.push('2');
    inbox.push('3');

    expect(inbox.drain()).toEqual(['2', '3']);
    expect(inbox.dropped).toBe(1);
  });

  it('close wakes the consumer and ignores later pushes', async () => {
    vi.useFakeTimers();
    const inbox = new Inbox();
    const pending = inbox.take(1000);

    inbox.close();
    inbox.push('after close');

    await expect(pending).resolves.toBeUndefined();
    expect(inbox.size).toBe(0);
    await expect(inbox.take(1000)).resolves.toBeUndefined();
  });
});
