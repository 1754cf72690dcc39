import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import type { Clock } from '../utils/clock';
import type { RunLogSink } from '../services/RunLog';

export class FakeClock implements Clock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class MemoryRunLog implements RunLogSink {
  readonly path = '/tmp/fake-run.log';
  text = '';

  line(message: string): void {
    this.write(message, '\n');
  }

  write(message: string, end: string = '\n'): void {
    this.text += message + end;
  }

  get lines(): string[] {
    return this.text.split('\n').slice(0, -1);
  }
}

export class MemoryStream {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

export function createTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'tts-batch-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Left-justify cells in the report's 12/15/20/20/16/16 layout */
export function reportRow(...cells: string[]): string {
  const widths = [12, 15, 20, 20, 16, 16];
  return cells.map((cell, index) => cell.padEnd(widths[index])).join('');
}
