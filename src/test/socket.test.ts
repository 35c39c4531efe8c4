import http from 'http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { io as connect, Socket as ClientSocket } from 'socket.io-client';
import { CaptureLog } from '../services/captureLog.service';
import { CaptureCompletedEvent, CaptureEventsService } from '../services/socket.service';
import { portOf, quietLog } from './helpers';

describe('CaptureEventsService', () => {
  let log: CaptureLog;
  let events: CaptureEventsService;
  let client: ClientSocket;

  const startWith = async (previewLastPhoto: boolean) => {
    events = new CaptureEventsService(log, previewLastPhoto);
    const httpServer = http.createServer();
    events.attach(httpServer);
    await new Promise<void>((resolve) => httpServer.listen(0, () => resolve()));

    client = connect(`http://127.0.0.1:${portOf(httpServer.address())}`, {
      transports: ['websocket'],
      reconnection: false,
    });
    await new Promise<void>((resolve) => client.once('connect', () => resolve()));
  };

  beforeEach(() => {
    log = quietLog();
    log.addLine('first');
    log.addLine('second');
  });

  afterEach(async () => {
    client.disconnect();
    await events.close();
  });

  it('replays log lines after a cursor', async () => {
    await startWith(false);

    const lines = await new Promise<string[]>((resolve) => client.emit('log:since', 1, resolve));

    expect(lines).toEqual(log.readSince(1));
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith(' second')).toBe(true);
  });

  it('streams new log lines', async () => {
    await startWith(false);

    const received = new Promise<{ index: number; line: string }>((resolve) => client.once('log:line', resolve));
    log.addLine('third');

    const event = await received;
    expect(event.index).toBe(2);
    expect(event.line.endsWith(' third')).toBe(true);
  });

  it('announces captured photos with a preview link when enabled', async () => {
    await startWith(true);

    const received = new Promise<CaptureCompletedEvent>((resolve) => client.once('capture:completed', resolve));
    events.photoCaptured('/data/photos/cam_2024-01-01_00-00-00_T1.jpg', 10);

    expect(await received).toEqual({
      filePath: '/data/photos/cam_2024-01-01_00-00-00_T1.jpg',
      fileSizeBytes: 10,
      previewUrl: '/get_img?file_name=cam_2024-01-01_00-00-00_T1.jpg',
    });
  });

  it('leaves out the preview link when previews are off', async () => {
    await startWith(false);

    const received = new Promise<CaptureCompletedEvent>((resolve) => client.once('capture:completed', resolve));
    events.photoCaptured('/data/photos/a.jpg', 3);

    expect(await received).toEqual({ filePath: '/data/photos/a.jpg', fileSizeBytes: 3 });
  });

  it('announces failed captures', async () => {
    await startWith(false);

    const received = new Promise<{ message: string }>((resolve) => client.once('capture:failed', resolve));
    events.captureFailed('camera gone');

    expect(await received).toEqual({ message: 'camera gone' });
  });
});
