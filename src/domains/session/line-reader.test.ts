import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockSerialLink } from '../device/drivers/mock-serial';
import { ConsoleLogger } from '../observability/logger';
import { Inbox } from './inbox';
import { LineReader } from './line-reader';

const logger = new ConsoleLogger({ level: 'error', format: 'json' });

describe('LineReader', () => {
  let link: MockSerialLink;
  let inbox: Inbox;
  let reader: LineReader;

  beforeEach(async () => {
    link = new MockSerialLink('mock_serial_01');
    await link.open({ baudRate: 115200 });
    inbox = new Inbox();
    reader = new LineReader(link, inbox, logger, { pollIntervalMs: 2 });
  });

  afterEach(async () => {
    await reader.stop(100);
    vi.restoreAllMocks();
  });

  it('splits incoming bytes into trimmed lines', async () => {
    reader.start();
    link.simulateIncoming('Servo 1 状');
    link.simulateIncoming('态: ok\r\n\r\nsecond line\n');

    await vi.waitFor(() => expect(inbox.size).toBe(2));
    expect(inbox.drain()).toEqual(['Servo 1 状态: ok', 'second line']);
  });

  it('keeps a partial line until its terminator arrives', async () => {
    reader.start();
    link.simulateIncoming('GRIPPER_RES');

    await new Promise(r => setTimeout(r, 20));
    expect(inbox.size).toBe(0);

    link.simulateIncoming('ULT:0.500\n');
    await vi.waitFor(() => expect(inbox.size).toBe(1));
    expect(inbox.drain()).toEqual(['GRIPPER_RESULT:0.500']);
  });

  it('passes on an overlong run without a newline as a line', async () => {
    reader = new LineReader(link, inbox, logger, { pollIntervalMs: 2, maxLineLength: 8 });
    reader.start();
    link.simulateIncoming('abcdefghij');

    await vi.waitFor(() => expect(inbox.size).toBe(1));
    link.simulateIncoming('xy\n');
    await vi.waitFor(() => expect(inbox.size).toBe(2));

    expect(inbox.drain()).toEqual(['abcdefghij', 'xy']);
  });

  it('decodes multi-byte characters split across reads', async () => {
    reader.start();
    const bytes = Buffer.from('角度=101.00°\n', 'utf-8');
    link.simulateIncoming(bytes.subarray(0, 1));
    await new Promise(r => setTimeout(r, 10));
    link.simulateIncoming(bytes.subarray(1));

    await vi.waitFor(() => expect(inbox.size).toBe(1));
    expect(inbox.drain()).toEqual(['角度=101.00°']);
  });

  it('replaces invalid byte sequences instead of failing', async () => {
    reader.start();
    link.simulateIncoming(Buffer.from([0x66, 0xff, 0x6f, 0x0a]));

    await vi.waitFor(() => expect(inbox.size).toBe(1));
    expect(inbox.drain()).toEqual(['f\uFFFDo']);
    expect(reader.isRunning).toBe(true);
  });

  it('stops on a read error and reports it', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const stopped = new Promise<string>(resolve => {
      reader.events.on('stopped', (event) => resolve(event.reason));
    });
    reader.start();

    link.failReads(new Error('EIO'));

    await expect(stopped).resolves.toBe('error');
    expect(reader.isRunning).toBe(false);
    expect(reader.lastError?.code).toBe('LINK_READ');
    expect(reader.lastError?.message).toBe('Mock link mock_serial_01 failed: EIO');
  });

  it('stops cooperatively and joins', async () => {
    reader.start();
    expect(reader.isRunning).toBe(true);

    await expect(reader.stop(1000)).resolves.toBe(true);
    expect(reader.isRunning).toBe(false);
    expect(reader.lastError).toBeNull();
  });

  it('stop before start is a no-op', async () => {
    await expect(reader.stop(10)).resolves.toBe(true);
  });
});
