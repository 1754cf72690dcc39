import type { ProcessingMode } from '../config/env';
import { secondsBetween } from '../utils/clock';
import type { ProcessingRecord } from './ProcessingRecord';

/**
 * Accumulator for one execution. Records are append-only and kept in
 * processing order.
 */
export class BatchRun {
  private readonly _records: ProcessingRecord[] = [];
  private _totalCharCount = 0;
  private _endTime: Date | undefined;

  constructor(
    readonly mode: ProcessingMode,
    readonly startTime: Date
  ) {}

  get records(): readonly ProcessingRecord[] {
    return this._records;
  }

  get totalCharCount(): number {
    return this._totalCharCount;
  }

  get endTime(): Date | undefined {
    return this._endTime;
  }

  /**
   * Wall-clock seconds of the whole run, 0 until finished
   */
  get totalElapsed(): number {
    return this._endTime ? secondsBetween(this.startTime, this._endTime) : 0;
  }

  get totalAudioDuration(): number {
    return this._records.reduce((sum, record) => sum + record.audioDuration, 0);
  }

  append(record: ProcessingRecord): void {
    if (this._endTime) {
      throw new Error('Cannot append records to a finished run');
    }
    this._records.push(record);
    this._totalCharCount += record.charCount;
  }

  finish(endTime: Date): void {
    this._endTime = endTime;
  }
}
