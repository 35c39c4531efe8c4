/**
 * A capture backend. Completion is never returned to the caller: the device
 * writes the photo (or a placeholder) to `targetPath` and the orchestrator
 * watches for that file. Implementations must not throw from `startCapture`.
 */
export interface NativeCaptureDevice {
  readonly name: string;
  startCapture(targetPath: string): void;
  bringToForeground(): Promise<void>;
  /** Resolves once every capture started so far has finished; never rejects. */
  whenIdle(): Promise<void>;
}

export type StrategyOutcome = 'captured' | 'busy' | 'denied' | 'unavailable' | 'failed';

export type CaptureState =
  | { kind: 'attempting'; strategyIndex: number }
  | { kind: 'succeeded'; strategy: string }
  | { kind: 'fellBackToPlaceholder'; reason: StrategyOutcome }
  | { kind: 'failed' };
