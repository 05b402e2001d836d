import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockSerialLink } from '../device/drivers/mock-serial';
import { SendFailedError } from '../device/errors';
import { ConsoleLogger } from '../observability/logger';
import { Correlator } from './correlator';
import { Inbox } from './inbox';
import { LineReader } from './line-reader';

const logger = new ConsoleLogger({ level: 'error', format: 'json' });
const sleep = (ms: number) => new Promise(r => setTimeout(r, ms));

describe('Correlator', () => {
  let link: MockSerialLink;
  let inbox: Inbox;
  let reader: LineReader;
  let correlator: Correlator;

  beforeEach(async () => {
    link = new MockSerialLink('mock_serial_01');
    await link.open({ baudRate: 115200 });
    inbox = new Inbox();
    reader = new LineReader(link, inbox, logger, { pollIntervalMs: 2 });
    reader.start();
    correlator = new Correlator(link, inbox, logger, { writeTimeoutMs: 100 });
  });

  afterEach(async () => {
    await reader.stop(100);
    await link.close();
    vi.restoreAllMocks();
  });

  it('returns as soon as the matching line arrives', async () => {
    link.setScenario([
      { match: 'servo_status', reply: ['I (10) SERVO_CMD: noise', 'Servo 1 状态: 角度=120.00°, 温度=30°C, 电压=6.00V'], delay: 5 },
    ]);

    const started = Date.now();
    const lines = await correlator.sendAndAwait('servo_status 1', l => l.includes('状态:'), 2000);

    expect(Date.now() - started).toBeLessThan(1000);
    expect(lines).toEqual(['I (10) SERVO_CMD: noise', 'Servo 1 状态: 角度=120.00°, 温度=30°C, 电压=6.00V']);
    expect(link.written).toEqual(['servo_status 1']);
  });

  it('stops at the first match and leaves later lines in the inbox', async () => {
    link.setScenario([{ match: 'help', reply: ['Available commands:', '  - help: list'] }]);

    const lines = await correlator.sendAndAwait('help', l => l.includes('Available commands:'), 1000);

    expect(lines).toEqual(['Available commands:']);
    await sleep(20);
    expect(inbox.drain()).toEqual(['- help: list']);
  });

  it('returns within the timeout when nothing matches', async () => {
    link.setScenario([{ match: 'servo_status', reply: ['unrelated 1', 'unrelated 2'] }]);

    const started = Date.now();
    const lines = await correlator.sendAndAwait('servo_status 1', l => l.includes('状态:'), 100);
    const elapsed = Date.now() - started;

    expect(lines).toEqual(['unrelated 1', 'unrelated 2']);
    expect(elapsed).toBeGreaterThanOrEqual(95);
    expect(elapsed).toBeLessThan(400);
  });

  it('returns an empty list when the device stays silent', async () => {
    const lines = await correlator.sendAndAwait('servo_status 1', () => true, 50);
    expect(lines).toEqual([]);
  });

  it('fails fast with SendFailedError when the write fails', async () => {
    link.failWrites(new Error('write EIO'));

    const started = Date.now();
    const attempt = correlator.sendAndAwait('servo_status 1', () => true, 5000);

    await expect(attempt).rejects.toBeInstanceOf(SendFailedError);
    await expect(attempt).rejects.toThrow('Failed to send "servo_status 1": write EIO');
    expect(Date.now() - started).toBeLessThan(1000);
    expect(correlator.busy).toBe(false);
  });

  it('never reports a stale reply from a previous exchange', async () => {
    link.setScenario([
      { match: 'cmd_a', reply: ['RESULT a'] },
      { match: 'cmd_b', reply: ['RESULT b'], delay: 10 },
    ]);

    const first = await correlator.sendAndAwait('cmd_a', l => l.startsWith('RESULT'), 1000);
    expect(first).toEqual(['RESULT a']);

    // a late duplicate reply to A lands in the inbox before B is sent
    link.simulateIncoming('RESULT a (late)\n');
    await sleep(20);
    expect(inbox.size).toBe(1);

    const second = await correlator.sendAndAwait('cmd_b', l => l.startsWith('RESULT'), 1000);
    expect(second).toEqual(['RESULT b']);
  });

  it('serializes concurrent requests', async () => {
    link.setScenario([
      { match: 'slow', reply: ['done slow'], delay: 40 },
      { match: 'fast', reply: ['done fast'], delay: 5 },
    ]);

    const [slow, fast] = await Promise.all([
      correlator.sendAndAwait('slow', l => l.startsWith('done'), 1000),
      correlator.sendAndAwait('fast', l => l.startsWith('done'), 1000),
    ]);

    expect(slow).toEqual(['done slow']);
    expect(fast).toEqual(['done fast']);
    expect(link.written).toEqual(['slow', 'fast']);
  });

  it('is busy while an exchange is queued or running', async () => {
    link.setScenario([{ match: 'slow', reply: ['done'], delay: 20 }]);

    const pending = correlator.sendAndAwait('slow', l => l === 'done', 1000);
    expect(correlator.busy).toBe(true);

    await expect(pending).resolves.toEqual(['done']);
    expect(correlator.busy).toBe(false);
  });

  it('keeps serving queued requests after one fails to send', async () => {
    link.setScenario([{ match: 'second', reply: ['ok'], delay: 5 }]);
    vi.spyOn(link, 'write').mockRejectedValueOnce(new Error('write EIO'));

    const first = correlator.sendAndAwait('first', () => true, 1000);
    const second = correlator.sendAndAwait('second', l => l === 'ok', 1000);

    await expect(first).rejects.toBeInstanceOf(SendFailedError);
    await expect(second).resolves.toEqual(['ok']);
    expect(link.written).toEqual(['second']);
  });

  it('delivers the matching line exactly once under a flood of other lines', async () => {
    link.setScenario([{ match: 'ping', reply: ['PONG'], delay: 25 }]);
    let counter = 0;
    const flood = setInterval(() => {
      link.simulateIncoming(`noise ${counter++}\nnoise ${counter++}\n`);
    }, 1);

    try {
      const lines = await correlator.sendAndAwait('ping', l => l === 'PONG', 2000);

      expect(lines[lines.length - 1]).toBe('PONG');
      expect(lines.filter(l => l === 'PONG')).toHaveLength(1);
      const noise = lines.slice(0, -1).map(l => Number(l.replace('noise ', '')));
      expect(new Set(noise).size).toBe(noise.length);
      expect([...noise].sort((a, b) => a - b)).toEqual(noise);
    } finally {
      clearInterval(flood);
    }

    await sleep(10);
    expect(inbox.drain()).not.toContain('PONG');
  });
});
