import { Server as SocketServer, Socket } from 'socket.io';
import { Server as HTTPServer } from 'http';
import * as path from 'path';
import { CaptureLog } from './captureLog.service';

export interface CaptureCompletedEvent {
  filePath: string;
  fileSizeBytes: number;
  previewUrl?: string;
}

export interface CaptureFailedEvent {
  message: string;
}

/** What the control API tells a front-end after each capture. */
export interface CaptureNotifier {
  photoCaptured(filePath: string, fileSizeBytes: number): void;
  captureFailed(message: string): void;
}

/**
 * Pushes capture results and log lines to connected front-ends. A client
 * that connects late asks for `log:since` with the number of lines it has
 * already shown and gets only the missing ones.
 */
export class CaptureEventsService implements CaptureNotifier {
  private io: SocketServer;
  private unsubscribeLog: () => void;

  constructor(
    private readonly log: CaptureLog,
    private readonly previewLastPhoto: boolean
  ) {
    this.io = new SocketServer({
      cors: {
        origin: '*',
        methods: ['GET'],
      },
    });

    this.unsubscribeLog = log.onLine((line, index) => {
      this.io.emit('log:line', { index, line });
    });

    this.initializeSocketHandlers();
  }

  private initializeSocketHandlers(): void {
    this.io.on('connection', (socket: Socket) => {
      console.log(`🔌 Front-end connected: ${socket.id}`);

      socket.on('log:since', (cursor: unknown, ack: unknown) => {
        if (typeof ack !== 'function') {
          return;
        }
        ack(this.log.readSince(typeof cursor === 'number' ? cursor : 0));
      });

      socket.on('disconnect', () => {
        console.log(`🔌 Front-end disconnected: ${socket.id}`);
      });
    });
  }

  // Attach after the Express app so socket.io sees its own requests first
  attach(httpServer: HTTPServer): void {
    this.io.attach(httpServer);
  }

  photoCaptured(filePath: string, fileSizeBytes: number): void {
    const event: CaptureCompletedEvent = { filePath, fileSizeBytes };
    if (this.previewLastPhoto) {
      event.previewUrl = `/get_img?file_name=${encodeURIComponent(path.basename(filePath))}`;
    }
    this.io.emit('capture:completed', event);
  }

  captureFailed(message: string): void {
    const event: CaptureFailedEvent = { message };
    this.io.emit('capture:failed', event);
  }

  close(): Promise<void> {
    this.unsubscribeLog();
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}
