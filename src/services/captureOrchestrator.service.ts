import * as fs from 'fs';
import { CaptureLog } from './captureLog.service';
import { PhotoStorageService } from './photoStorage.service';
import { NativeCaptureDevice } from './devices/types';
import { errorMessage } from '../utils/errors';
import { sleep } from '../utils/time';

export const CAPTURE_SURFACE_UNREACHABLE =
  'Capture surface not reachable: the camera app is not in the foreground';

export type CaptureResult = Readonly<{
  success: boolean;
  filePath: string;
  fileSizeBytes: number;
  errorMessage: string;
}>;

export interface CaptureOrchestratorOptions {
  defaultTimeoutSeconds: number;
  pollIntervalMs: number;
  now?: () => Date;
}

interface CaptureSession {
  id: string;
  timeoutSeconds: number;
  deadline: number;
  targetPath: string;
  outcome: 'pending' | 'success' | 'timeout' | 'failed';
}

/**
 * Turns the fire-and-forget device capture into a bounded wait. The device
 * is never asked to report completion; the orchestrator polls for the target
 * file instead, so it does not care which callback or process writes it.
 *
 * Captures are single-flight: requests queue behind each other in arrival
 * order, but each keeps the deadline it was given when it arrived.
 */
export class CaptureOrchestrator {
  private queue: Promise<unknown> = Promise.resolve();
  private pending = 0;
  private lastCaptured: string | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly device: NativeCaptureDevice,
    private readonly storage: PhotoStorageService,
    private readonly log: CaptureLog,
    private readonly options: CaptureOrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get lastCapturedPath(): string | null {
    return this.lastCaptured;
  }

  get isBusy(): boolean {
    return this.pending > 0;
  }

  captureSync(id: string, timeoutSeconds?: number): Promise<CaptureResult> {
    const timeout =
      timeoutSeconds !== undefined && Number.isFinite(timeoutSeconds) && timeoutSeconds > 0
        ? timeoutSeconds
        : this.options.defaultTimeoutSeconds;
    const deadline = Date.now() + timeout * 1000;

    if (this.pending > 0) {
      this.log.addLine(`Capture for id=${id} waiting for ${this.pending} capture(s) in progress`);
    }
    this.pending++;

    const run = this.queue.then(() => this.runSession(id, timeout, deadline));
    // The queue only orders sessions; runSession already turns faults into results
    this.queue = run.catch(() => undefined);
    return run.finally(() => {
      this.pending--;
    });
  }

  private async runSession(id: string, timeoutSeconds: number, deadline: number): Promise<CaptureResult> {
    const session: CaptureSession = {
      id,
      timeoutSeconds,
      deadline,
      targetPath: this.storage.buildTargetPath(id, this.now()),
      outcome: 'pending',
    };

    const result = await this.attempt(session);
    this.log.addLine(
      `Capture session id=${session.id} finished: ${session.outcome} (timeout ${session.timeoutSeconds}s)`
    );
    return result;
  }

  private async attempt(session: CaptureSession): Promise<CaptureResult> {
    try {
      if (Date.now() >= session.deadline) {
        this.log.addLine(`Capture for id=${session.id} expired while waiting for the camera.`);
        session.outcome = 'timeout';
        return this.timeoutResult(session);
      }

      // A timed-out session may leave the device still working on its photo
      if (!(await this.waitForDeviceIdle(session.deadline))) {
        this.log.addLine(`Camera still busy with an earlier capture; giving up on id=${session.id}.`);
        session.outcome = 'timeout';
        return this.timeoutResult(session);
      }

      this.log.addLine(
        `Starting synchronous capture for ${session.targetPath} with timeout ${session.timeoutSeconds}s`
      );
      await this.removeStaleFile(session.targetPath);
      await this.bringDeviceToForeground(session.deadline);

      this.device.startCapture(session.targetPath);

      const size = await this.waitForFile(session);
      if (size > 0) {
        session.outcome = 'success';
        this.lastCaptured = session.targetPath;
        this.log.addLine(`Capture succeeded: ${session.targetPath} (${size} bytes)`);
        return {
          success: true,
          filePath: session.targetPath,
          fileSizeBytes: size,
          errorMessage: '',
        };
      }

      session.outcome = 'timeout';
      this.log.addLine('Capture timed out waiting for file.');
      return this.timeoutResult(session);
    } catch (error) {
      session.outcome = 'failed';
      this.log.addLine(`Capture failed unexpectedly: ${errorMessage(error)}`);
      return {
        success: false,
        filePath: session.targetPath,
        fileSizeBytes: 0,
        errorMessage: errorMessage(error),
      };
    }
  }

  /**
   * Poll until the file exists with a non-zero size or the deadline passes.
   * The last sleep is cut short at the deadline and one final check runs
   * there. Returns the observed size, 0 on timeout.
   */
  private async waitForFile(session: CaptureSession): Promise<number> {
    for (;;) {
      const size = await fileSize(session.targetPath);
      if (size > 0) {
        return size;
      }

      const remaining = session.deadline - Date.now();
      if (remaining <= 0) {
        return 0;
      }
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private async removeStaleFile(targetPath: string): Promise<void> {
    try {
      await fs.promises.rm(targetPath, { force: true });
    } catch (error) {
      this.log.addLine(`Could not remove existing file ${targetPath}: ${errorMessage(error)}`);
    }
  }

  private async waitForDeviceIdle(deadline: number): Promise<boolean> {
    try {
      return await settlesBefore(this.device.whenIdle(), deadline);
    } catch (error) {
      this.log.addLine(`Device reported a failed earlier capture: ${errorMessage(error)}`);
      return true;
    }
  }

  // Foreground strategies may hang; they never get more than the session's deadline
  private async bringDeviceToForeground(deadline: number): Promise<void> {
    try {
      await settlesBefore(this.device.bringToForeground(), deadline);
    } catch (error) {
      this.log.addLine(`Failed to move app to foreground: ${errorMessage(error)}`);
    }
  }

  private timeoutResult(session: CaptureSession): CaptureResult {
    return {
      success: false,
      filePath: session.targetPath,
      fileSizeBytes: 0,
      errorMessage: CAPTURE_SURFACE_UNREACHABLE,
    };
  }
}

const fileSize = async (filePath: string): Promise<number> => {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
};

/** True when `work` settles before `deadline`, false when the deadline comes first. */
const settlesBefore = async (work: Promise<unknown>, deadline: number): Promise<boolean> => {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), Math.max(0, deadline - Date.now()));
  });

  try {
    return await Promise.race([work.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
};
