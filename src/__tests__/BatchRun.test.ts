import { describe, expect, it } from 'vitest';
import { BatchRun } from '../models/BatchRun';
import type { ProcessingRecord } from '../models/ProcessingRecord';

function record(label: number, charCount: number, audioDuration: number): ProcessingRecord {
  return { label, charCount, elapsedTime: 1, audioDuration, outputFile: `${label}.wav`, outputPath: `/out/${label}.wav` };
}

describe('BatchRun', () => {
  it('keeps records in insertion order and sums their characters', () => {
    const run = new BatchRun('line', new Date(2026, 0, 1, 0, 0, 0));
    run.append(record(1, 12, 1.25));
    run.append(record(2, 0, 0));
    run.append(record(3, 8, 0.5));

    expect(run.records.map((r) => r.label)).toEqual([1, 2, 3]);
    expect(run.totalCharCount).toBe(20);
    expect(run.totalAudioDuration).toBe(1.75);
  });

  it('measures wall-clock time once finished', () => {
    const run = new BatchRun('full', new Date(2026, 0, 1, 0, 0, 0));
    expect(run.totalElapsed).toBe(0);

    run.finish(new Date(2026, 0, 1, 0, 1, 30, 500));

    expect(run.totalElapsed).toBe(90.5);
  });

  it('rejects records after the run has finished', () => {
    const run = new BatchRun('line', new Date(2026, 0, 1));
    run.finish(new Date(2026, 0, 1));

    expect(() => run.append(record(1, 1, 1))).toThrow('Cannot append records to a finished run');
  });
});
