import {
  REPORT_COLUMNS,
  REPORT_TITLE,
  REPORT_WIDTH,
  TOTAL_LABEL
} from '../config/constants';
import type { BatchRun } from '../models/BatchRun';
import { type Clock, formatDateTime, systemClock } from '../utils/clock';
import type { RunLogSink } from './RunLog';

export interface RunHeaderInfo {
  startTime: Date;
  inputPath: string;
  outputDir: string;
  logPath: string;
}

type ReportSource = Pick<BatchRun, 'records' | 'totalCharCount' | 'totalElapsed' | 'totalAudioDuration'>;

/** Seconds of processing per character, 0 for empty text */
export function charRatio(elapsed: number, charCount: number): number {
  return charCount > 0 ? elapsed / charCount : 0;
}

/** Seconds of processing per second of audio, 0 when there is no audio */
export function timeRatio(elapsed: number, audioDuration: number): number {
  return audioDuration > 0 ? elapsed / audioDuration : 0;
}

/**
 * Centre `text` in `width` columns. On an odd margin the extra space goes
 * right, unless `width` itself is odd.
 */
export function center(text: string, width: number): string {
  const margin = width - text.length;
  if (margin <= 0) {
    return text;
  }
  const left = Math.floor(margin / 2) + (margin & width & 1);
  return ' '.repeat(left) + text + ' '.repeat(margin - left);
}

function formatRow(cells: string[]): string {
  return cells.map((cell, index) => cell.padEnd(REPORT_COLUMNS[index].width)).join('');
}

function metricRow(label: string, charCount: number, audioDuration: number, elapsed: number): string {
  // toFixed rounds exact binary ties up: 0.125 -> '0.13'
  return formatRow([
    label,
    String(charCount),
    audioDuration.toFixed(2),
    elapsed.toFixed(2),
    charRatio(elapsed, charCount).toFixed(2),
    timeRatio(elapsed, audioDuration).toFixed(2)
  ]);
}

/**
 * Fixed-width report table, one entry per output line
 */
export function renderReport(run: ReportSource): string[] {
  const lines = [
    '='.repeat(REPORT_WIDTH),
    center(REPORT_TITLE, REPORT_WIDTH),
    '='.repeat(REPORT_WIDTH),
    formatRow(REPORT_COLUMNS.map((column) => column.header)),
    '-'.repeat(REPORT_WIDTH)
  ];

  for (const record of run.records) {
    lines.push(metricRow(String(record.label), record.charCount, record.audioDuration, record.elapsedTime));
  }

  lines.push('-'.repeat(REPORT_WIDTH));
  lines.push(metricRow(TOTAL_LABEL, run.totalCharCount, run.totalAudioDuration, run.totalElapsed));
  lines.push('='.repeat(REPORT_WIDTH));

  return lines;
}

/**
 * `<m> min <s> s`, both parts truncated
 */
export function formatMinutesSeconds(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${minutes} min ${seconds} s`;
}

/**
 * Writes the run banner, report table and closing summary through the run log
 */
export class ReportService {
  constructor(
    private readonly runLog: RunLogSink,
    private readonly clock: Clock = systemClock
  ) {}

  header(info: RunHeaderInfo): void {
    this.runLog.line(`=== TTS batch processing started === Time: ${formatDateTime(info.startTime)}`);
    this.runLog.line(`Input file: ${info.inputPath}`);
    this.runLog.line(`Output directory: ${info.outputDir}`);
    this.runLog.line(`Log file: ${info.logPath}`);
    this.runLog.line('');
  }

  report(run: ReportSource): void {
    for (const line of renderReport(run)) {
      this.runLog.line(line);
    }
  }

  summary(run: Pick<BatchRun, 'totalCharCount' | 'totalElapsed'>): void {
    this.runLog.line('');
    this.runLog.line(
      `All audio files generated! Total characters: ${run.totalCharCount}, ` +
        `total processing time: ${formatMinutesSeconds(run.totalElapsed)}`
    );
    this.runLog.line(`=== TTS batch processing finished === Time: ${formatDateTime(this.clock.now())}`);
    this.runLog.line('');
  }
}
