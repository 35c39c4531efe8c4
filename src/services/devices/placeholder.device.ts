import { CaptureLog } from '../captureLog.service';
import { NativeCaptureDevice } from './types';
import { errorMessage } from '../../utils/errors';
import { writePlaceholderPhoto } from './placeholder';

// Used when there is no camera to drive, e.g. on a desktop machine
export class PlaceholderCaptureDevice implements NativeCaptureDevice {
  readonly name = 'placeholder';
  private inFlight: Promise<void> = Promise.resolve();

  constructor(
    private readonly placeholderImagePath: string,
    private readonly log: CaptureLog
  ) {}

  startCapture(targetPath: string): void {
    this.log.addLine(`No camera command configured – creating placeholder photo "${targetPath}"`);
    this.inFlight = this.inFlight
      .then(() => writePlaceholderPhoto(this.placeholderImagePath, targetPath, this.log))
      .then(
        () => undefined,
        (error) => {
          this.log.addLine(`Placeholder capture failed: ${errorMessage(error)}`);
        }
      );
  }

  whenIdle(): Promise<void> {
    return this.inFlight;
  }

  async bringToForeground(): Promise<void> {
    // Nothing to bring forward without a camera app
  }
}
