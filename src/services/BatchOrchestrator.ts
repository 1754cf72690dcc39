import { readFile } from 'fs/promises';
import { FULL_TEXT_LABEL } from '../config/constants';
import type { ProcessingMode } from '../config/env';
import { BatchRun } from '../models/BatchRun';
import { type Clock, systemClock } from '../utils/clock';
import { InputFileError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { splitLines } from '../utils/text';
import type { CsvReportService } from './CsvReportService';
import type { ReportService } from './ReportService';
import type { RunLogSink } from './RunLog';
import type { SynthesisUnitProcessor } from './SynthesisUnitProcessor';

const logger = createLogger({ service: 'BatchOrchestrator' });

export interface BatchOrchestratorOptions {
  inputPath: string;
  outputDir: string;
  mode: ProcessingMode;
  /** First ordinal in line mode */
  startOffset: number;
  processor: SynthesisUnitProcessor;
  reporter: ReportService;
  runLog: RunLogSink;
  csvReport?: CsvReportService;
  clock?: Clock;
}

const MODE_DESCRIPTIONS: Record<ProcessingMode, string> = {
  line: 'Processing mode: per line (one audio file per line)',
  full: 'Processing mode: whole text (one audio file for the full text)'
};

/**
 * Drives one batch: segments the input, synthesizes unit by unit and hands
 * the accumulated run to the reporter.
 *
 * Units run strictly one after another: engines do not accept concurrent
 * calls.
 */
export class BatchOrchestrator {
  private readonly clock: Clock;

  constructor(private readonly options: BatchOrchestratorOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async run(): Promise<BatchRun> {
    const { inputPath, outputDir, mode, reporter, runLog } = this.options;
    const run = new BatchRun(mode, this.clock.now());

    reporter.header({ startTime: run.startTime, inputPath, outputDir, logPath: runLog.path });
    runLog.line(MODE_DESCRIPTIONS[mode]);
    runLog.line('');

    const lines = await this.readLines();
    logger.info({ inputPath, mode, lineCount: lines.length }, 'Batch started');

    if (mode === 'line') {
      await this.processLines(run, lines);
    } else {
      await this.processFullText(run, lines);
    }

    run.finish(this.clock.now());
    logger.info(
      { records: run.records.length, totalCharCount: run.totalCharCount, totalElapsed: run.totalElapsed },
      'Batch finished'
    );

    reporter.report(run);
    reporter.summary(run);

    if (this.options.csvReport) {
      const csvPath = await this.options.csvReport.write(run);
      runLog.line(`CSV report: ${csvPath}`);
    }

    return run;
  }

  /**
   * Blank lines do not consume an ordinal
   */
  private async processLines(run: BatchRun, lines: string[]): Promise<void> {
    let ordinal = this.options.startOffset;

    for (const line of lines) {
      const text = line.trim();
      if (!text) {
        continue;
      }
      run.append(await this.options.processor.process(ordinal, text));
      ordinal += 1;
    }
  }

  private async processFullText(run: BatchRun, lines: string[]): Promise<void> {
    const fullText = lines
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join(' ');

    if (!fullText) {
      this.options.runLog.line('Warning: input file is empty, no audio file generated');
      logger.warn({ inputPath: this.options.inputPath }, 'Empty input');
      return;
    }

    run.append(await this.options.processor.process(FULL_TEXT_LABEL, fullText));
  }

  private async readLines(): Promise<string[]> {
    try {
      return splitLines(await readFile(this.options.inputPath, 'utf-8'));
    } catch (error) {
      throw new InputFileError(this.options.inputPath, error);
    }
  }
}
