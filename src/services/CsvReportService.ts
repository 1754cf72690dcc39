import { writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { CSV_REPORT_PREFIX } from '../config/constants';
import type { BatchRun } from '../models/BatchRun';
import { type Clock, formatFileStamp, systemClock } from '../utils/clock';
import { createLogger } from '../utils/logger';
import { charRatio, timeRatio } from './ReportService';

const logger = createLogger({ service: 'CsvReportService' });

const CSV_COLUMNS = [
  'label',
  'char_count',
  'audio_duration',
  'elapsed_time',
  'char_ratio',
  'time_ratio'
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

function toRow(label: string, charCount: number, audioDuration: number, elapsed: number): CsvRow {
  return {
    label,
    char_count: String(charCount),
    audio_duration: audioDuration.toFixed(2),
    elapsed_time: elapsed.toFixed(2),
    char_ratio: charRatio(elapsed, charCount).toFixed(2),
    time_ratio: timeRatio(elapsed, audioDuration).toFixed(2)
  };
}

/**
 * Machine-readable copy of the report table, written beside the run log
 */
export class CsvReportService {
  constructor(
    private readonly directory: string,
    private readonly clock: Clock = systemClock
  ) {}

  static render(
    run: Pick<BatchRun, 'records' | 'totalCharCount' | 'totalElapsed' | 'totalAudioDuration'>
  ): string {
    const rows = run.records.map((record) =>
      toRow(String(record.label), record.charCount, record.audioDuration, record.elapsedTime)
    );
    rows.push(toRow('total', run.totalCharCount, run.totalAudioDuration, run.totalElapsed));

    return stringify(rows, { header: true, columns: [...CSV_COLUMNS] });
  }

  async write(run: BatchRun): Promise<string> {
    const filePath = path.join(
      this.directory,
      `${CSV_REPORT_PREFIX}${formatFileStamp(this.clock.now())}.csv`
    );
    await writeFile(filePath, CsvReportService.render(run), 'utf-8');
    logger.info({ filePath, recordCount: run.records.length }, 'CSV report written');
    return filePath;
  }
}
