import * as fs from 'fs';
import { AddressInfo } from 'net';
import * as os from 'os';
import * as path from 'path';
import { CaptureLog } from '../services/captureLog.service';
import { NativeCaptureDevice } from '../services/devices/types';

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'shutterlink-'));

export const quietLog = (): CaptureLog => new CaptureLog({ console: false });

/** Device that writes `contents` to the target after `delayMs`. */
export class DelayedWriteDevice implements NativeCaptureDevice {
  readonly name = 'delayed-write';
  readonly targets: string[] = [];
  active = 0;
  maxActive = 0;
  private inFlight: Promise<void> = Promise.resolve();

  constructor(
    private readonly delayMs: number,
    private readonly contents: Buffer | string
  ) {}

  startCapture(targetPath: string): void {
    this.targets.push(targetPath);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.inFlight = new Promise<void>((resolve) => {
      setTimeout(() => {
        fs.writeFileSync(targetPath, this.contents);
        this.active--;
        resolve();
      }, this.delayMs);
    });
  }

  async bringToForeground(): Promise<void> {}

  whenIdle(): Promise<void> {
    return this.inFlight;
  }
}

/** Device whose capture never produces a file. */
export class SilentDevice implements NativeCaptureDevice {
  readonly name = 'silent';
  readonly targets: string[] = [];

  startCapture(targetPath: string): void {
    this.targets.push(targetPath);
  }

  async bringToForeground(): Promise<void> {}

  async whenIdle(): Promise<void> {}
}

export const portOf = (address: AddressInfo | string | null): number => {
  if (address === null || typeof address === 'string') {
    throw new Error(`unexpected server address: ${address}`);
  }
  return address.port;
};
