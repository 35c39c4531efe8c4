import * as fs from 'fs';
import sharp from 'sharp';
import { CaptureLog } from '../captureLog.service';
import { sleep } from '../../utils/time';
import { buildInvocation, CommandResult, CommandRunner, spawnCommand } from './commandRunner';
import { ForegroundChain } from './foreground';
import { errorMessage } from '../../utils/errors';
import { writePlaceholderPhoto } from './placeholder';
import { CaptureState, NativeCaptureDevice, StrategyOutcome } from './types';

export interface CommandCaptureDeviceOptions {
  /** e.g. `termux-camera-photo -c 0 {file}` */
  captureCommand: string;
  foregroundCommands: string[];
  placeholderImagePath: string;
  commandTimeoutMs: number;
  retryBackoffMs?: number;
  runner?: CommandRunner;
}

interface CaptureStrategy {
  name: string;
  backoffMs: number;
  attempt(tempPath: string): Promise<StrategyOutcome>;
}

const DEFAULT_RETRY_BACKOFF_MS = 500;

/**
 * Drives an external camera command. A failed run is retried once after a
 * short backoff; permission problems, a missing command or a second failure
 * fall back to the placeholder image so the caller still sees a file appear.
 */
export class CommandCaptureDevice implements NativeCaptureDevice {
  readonly name = 'command';
  private readonly runner: CommandRunner;
  private readonly strategies: CaptureStrategy[];
  private readonly foreground: ForegroundChain;
  // Camera runs are chained so the hardware never sees two at once
  private inFlight: Promise<void> = Promise.resolve();

  constructor(
    private readonly options: CommandCaptureDeviceOptions,
    private readonly log: CaptureLog
  ) {
    this.runner = options.runner ?? spawnCommand;
    const backoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;

    this.strategies = [
      { name: 'camera', backoffMs: 0, attempt: (tempPath) => this.runCamera(tempPath) },
      { name: 'camera-retry', backoffMs, attempt: (tempPath) => this.runCamera(tempPath) },
    ];

    this.foreground = new ForegroundChain(
      options.foregroundCommands.map((commandLine) => ({
        name: commandLine,
        attempt: async () => {
          const { command, args } = buildInvocation(commandLine);
          const result = await this.runner(command, args, options.commandTimeoutMs);
          return result.exitCode === 0;
        },
      })),
      log
    );
  }

  startCapture(targetPath: string): void {
    this.log.addLine(`Scheduling camera capture to "${targetPath}"`);
    this.inFlight = this.inFlight
      .then(() => this.capture(targetPath))
      .then(
        () => undefined,
        (error) => {
          this.log.addLine(`Camera capture crashed: ${errorMessage(error)}`);
        }
      );
  }

  whenIdle(): Promise<void> {
    return this.inFlight;
  }

  async bringToForeground(): Promise<void> {
    await this.foreground.run();
  }

  async capture(targetPath: string): Promise<CaptureState> {
    const tempPath = `${targetPath}.part`;
    let state: CaptureState = { kind: 'attempting', strategyIndex: 0 };

    while (state.kind === 'attempting') {
      const strategy: CaptureStrategy | undefined = this.strategies[state.strategyIndex];
      if (!strategy) {
        state = await this.fallBackToPlaceholder('busy', targetPath);
        break;
      }

      if (strategy.backoffMs > 0) {
        this.log.addLine(`Retrying camera in ${strategy.backoffMs} ms`);
        await sleep(strategy.backoffMs);
      }

      const outcome = await strategy.attempt(tempPath);
      this.log.addLine(`Capture strategy ${strategy.name}: ${outcome}`);

      switch (outcome) {
        case 'captured':
          await this.finalizePhoto(tempPath, targetPath);
          state = { kind: 'succeeded', strategy: strategy.name };
          break;
        case 'denied':
        case 'unavailable':
          state = await this.fallBackToPlaceholder(outcome, targetPath);
          break;
        default:
          state = { kind: 'attempting', strategyIndex: state.strategyIndex + 1 };
      }
    }

    await fs.promises.rm(tempPath, { force: true }).catch((error) => {
      this.log.addLine(`Could not remove ${tempPath}: ${errorMessage(error)}`);
    });
    return state;
  }

  private async runCamera(tempPath: string): Promise<StrategyOutcome> {
    await fs.promises.rm(tempPath, { force: true });
    const { command, args } = buildInvocation(this.options.captureCommand, tempPath);
    this.log.addLine(`Running camera command: ${command} ${args.join(' ')}`);

    const result = await this.runner(command, args, this.options.commandTimeoutMs);
    const size = await fs.promises
      .stat(tempPath)
      .then((stats) => stats.size)
      .catch(() => 0);

    const outcome = classifyCommandResult(result, size);
    if (outcome !== 'captured' && result.output) {
      this.log.addLine(`Camera command output: ${result.output}`);
    }
    return outcome;
  }

  /**
   * Re-encode at full JPEG quality, then rename into place so the target
   * never exists half-written.
   */
  private async finalizePhoto(tempPath: string, targetPath: string): Promise<void> {
    try {
      const encoded = await sharp(tempPath).jpeg({ quality: 100 }).toBuffer();
      await fs.promises.writeFile(tempPath, encoded);
      this.log.addLine(`Photo re-encoded (JPEG 100%): ${targetPath}`);
    } catch (error) {
      this.log.addLine(`JPEG re-encode failed: ${errorMessage(error)}, keeping raw bytes for ${targetPath}`);
    }
    await fs.promises.rename(tempPath, targetPath);
    this.log.addLine(`Photo saved: ${targetPath}`);
  }

  private async fallBackToPlaceholder(
    reason: StrategyOutcome,
    targetPath: string
  ): Promise<CaptureState> {
    this.log.addLine(`Camera ${reason} – falling back to placeholder photo`);
    const written = await writePlaceholderPhoto(
      this.options.placeholderImagePath,
      targetPath,
      this.log
    );
    return written ? { kind: 'fellBackToPlaceholder', reason } : { kind: 'failed' };
  }
}

export const classifyCommandResult = (result: CommandResult, fileSize: number): StrategyOutcome => {
  if (result.spawnErrorCode === 'ENOENT' || result.spawnErrorCode === 'EACCES') {
    return 'unavailable';
  }
  if (/permission|denied/i.test(result.output)) {
    return 'denied';
  }
  if (result.timedOut) {
    return 'busy';
  }
  if (result.spawnErrorCode) {
    return 'failed';
  }
  if (result.exitCode !== 0) {
    return 'busy';
  }
  return fileSize > 0 ? 'captured' : 'busy';
};
