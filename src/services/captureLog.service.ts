import * as fs from 'fs';
import { formatLogTimestamp } from '../utils/time';

export type LogLineListener = (line: string, index: number) => void;

export interface CaptureLogOptions {
  initialLine?: string;
  filePath?: string | null;
  /** Mirror every line to stdout. Defaults to true. */
  console?: boolean;
  now?: () => Date;
}

/**
 * Process-wide, append-only log shared by the API, the orchestrator and the
 * capture devices. Lines are never removed while the process runs, so readers
 * only need to remember how many lines they have already consumed.
 */
export class CaptureLog {
  private lines: string[] = [];
  private listeners: LogLineListener[] = [];
  private readonly filePath: string | null;
  private readonly mirrorToConsole: boolean;
  private readonly now: () => Date;

  constructor(options: CaptureLogOptions = {}) {
    this.filePath = options.filePath ?? null;
    this.mirrorToConsole = options.console ?? true;
    this.now = options.now ?? (() => new Date());

    if (options.initialLine) {
      this.addLine(options.initialLine);
    }
  }

  get lineCount(): number {
    return this.lines.length;
  }

  addLine(text: string): void {
    const timestamp = formatLogTimestamp(this.now());

    // Appends are synchronous: callers on other async paths can't interleave
    for (const segment of text.split(/\r?\n/)) {
      const line = `${timestamp} ${segment}`;
      const index = this.lines.length;
      this.lines.push(line);

      if (this.mirrorToConsole) {
        console.log(line);
      }
      if (this.filePath) {
        try {
          fs.appendFileSync(this.filePath, `${line}\n`);
        } catch (error) {
          console.error(`❌ Failed to write log file ${this.filePath}:`, error);
        }
      }
      this.notify(line, index);
    }
  }

  getBody(): string {
    return this.lines.map((line) => `${line}\n`).join('');
  }

  readSince(cursor: number): string[] {
    const start = Number.isFinite(cursor) && cursor > 0 ? Math.floor(cursor) : 0;
    return this.lines.slice(start);
  }

  onLine(listener: LogLineListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private notify(line: string, index: number): void {
    this.listeners.forEach((listener) => {
      try {
        listener(line, index);
      } catch (error) {
        console.error('❌ Log listener failed:', error);
      }
    });
  }
}
