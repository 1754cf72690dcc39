import fs from 'fs';
import path from 'path';
import { LOG_FILE_PREFIX } from '../config/constants';
import { type Clock, formatFileStamp, systemClock } from '../utils/clock';
import { LogFileError } from '../utils/errors';

/**
 * Anything that accepts console text (process.stdout, a test buffer)
 */
export interface ConsoleStream {
  write(text: string): unknown;
}

/**
 * Dual-sink line logger shared by every component of a run
 */
export interface RunLogSink {
  readonly path: string;
  line(message: string): void;
  write(message: string, end?: string): void;
}

export interface RunLogOptions {
  clock?: Clock;
  stream?: ConsoleStream;
}

/**
 * Mirrors every line to the console and to a per-run, append-only log file.
 *
 * The file descriptor is opened once and written synchronously, so lines of
 * completed units are on disk even if the run dies afterwards.
 */
export class RunLog implements RunLogSink {
  private fd: number | null;

  private constructor(
    readonly path: string,
    fd: number,
    private readonly stream: ConsoleStream
  ) {
    this.fd = fd;
  }

  /**
   * Create `tts_log_YYYYMMDD_HHMMSS.txt` in `logDir`
   * @throws LogFileError if the directory or file cannot be created
   */
  static open(logDir: string, options: RunLogOptions = {}): RunLog {
    const clock = options.clock ?? systemClock;
    const logPath = path.join(logDir, `${LOG_FILE_PREFIX}${formatFileStamp(clock.now())}.txt`);

    try {
      fs.mkdirSync(logDir, { recursive: true });
      const fd = fs.openSync(logPath, 'a');
      return new RunLog(logPath, fd, options.stream ?? process.stdout);
    } catch (error) {
      throw new LogFileError(logPath, error);
    }
  }

  line(message: string): void {
    this.write(message, '\n');
  }

  /**
   * Console gets `message + end`; the file gets `end` only when it is a
   * newline.
   */
  write(message: string, end: string = '\n'): void {
    if (this.fd === null) {
      throw new LogFileError(this.path, new Error('run log is closed'));
    }

    this.stream.write(message + end);

    try {
      fs.writeSync(this.fd, end === '\n' ? message + end : message);
    } catch (error) {
      throw new LogFileError(this.path, error);
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}
