import { CaptureLog } from '../captureLog.service';
import { errorMessage } from '../../utils/errors';

export interface ForegroundStrategy {
  name: string;
  attempt(): Promise<boolean>;
}

/**
 * Ordered, best-effort attempts to bring the capturing app to the front.
 * Stops at the first strategy that reports success; nothing here is fatal.
 */
export class ForegroundChain {
  constructor(
    private readonly strategies: ForegroundStrategy[],
    private readonly log: CaptureLog
  ) {}

  async run(): Promise<boolean> {
    if (this.strategies.length === 0) {
      return false;
    }

    for (const strategy of this.strategies) {
      try {
        if (await strategy.attempt()) {
          this.log.addLine(`Requested app foreground via ${strategy.name}.`);
          return true;
        }
        this.log.addLine(`Foreground strategy ${strategy.name} did not succeed.`);
      } catch (error) {
        this.log.addLine(`Foreground strategy ${strategy.name} failed: ${errorMessage(error)}`);
      }
    }

    this.log.addLine('Unable to move app to foreground with any strategy.');
    return false;
  }
}
