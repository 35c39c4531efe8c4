import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { CaptureLog } from '../services/captureLog.service';
import { makeTempDir } from './helpers';

const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5);

describe('CaptureLog', () => {
  it('prefixes every line with a local timestamp', () => {
    const log = new CaptureLog({ console: false, now: fixedNow });
    log.addLine('hello');
    log.addLine('world');

    expect(log.getBody()).toBe('2024-01-02 03:04:05 hello\n2024-01-02 03:04:05 world\n');
    expect(log.lineCount).toBe(2);
  });

  it('records the initial line', () => {
    const log = new CaptureLog({ console: false, now: fixedNow, initialLine: 'started' });
    expect(log.readSince(0)).toEqual(['2024-01-02 03:04:05 started']);
  });

  it('gives each line of multi-line text its own entry', () => {
    const log = new CaptureLog({ console: false, now: fixedNow });
    log.addLine('first\nsecond');
    expect(log.readSince(0)).toEqual(['2024-01-02 03:04:05 first', '2024-01-02 03:04:05 second']);
  });

  it('returns only lines after the cursor', () => {
    const log = new CaptureLog({ console: false, now: fixedNow });
    log.addLine('a');
    log.addLine('b');
    log.addLine('c');

    expect(log.readSince(2)).toEqual(['2024-01-02 03:04:05 c']);
    expect(log.readSince(-5)).toHaveLength(3);
    expect(log.readSince(3)).toEqual([]);
    expect(log.readSince(10)).toEqual([]);
  });

  it('appends lines to the log file', () => {
    const filePath = path.join(makeTempDir(), 'app.log');
    const log = new CaptureLog({ console: false, now: fixedNow, filePath });
    log.addLine('one');
    log.addLine('two');

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('2024-01-02 03:04:05 one\n2024-01-02 03:04:05 two\n');
  });

  it('mirrors lines to the console', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const log = new CaptureLog({ now: fixedNow });
    log.addLine('visible');

    expect(spy).toHaveBeenCalledWith('2024-01-02 03:04:05 visible');
    spy.mockRestore();
  });

  it('notifies listeners with the line index until unsubscribed', () => {
    const log = new CaptureLog({ console: false, now: fixedNow });
    log.addLine('before');
    const listener = vi.fn();
    const unsubscribe = log.onLine(listener);

    log.addLine('during');
    unsubscribe();
    log.addLine('after');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('2024-01-02 03:04:05 during', 1);
  });

  it('keeps appending when a listener throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new CaptureLog({ console: false, now: fixedNow });
    log.onLine(() => {
      throw new Error('listener broke');
    });

    log.addLine('still here');

    expect(log.lineCount).toBe(1);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });
});
