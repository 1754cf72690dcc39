import { mkdir } from 'fs/promises';
import type { BatchConfig } from './config/env';
import type { BatchRun } from './models/BatchRun';
import type { ITTSProvider } from './providers/ai/ITTSProvider';
import { BatchOrchestrator } from './services/BatchOrchestrator';
import { CsvReportService } from './services/CsvReportService';
import { DurationProbe } from './services/DurationProbe';
import { ReportService } from './services/ReportService';
import { type ConsoleStream, RunLog } from './services/RunLog';
import { SynthesisUnitProcessor } from './services/SynthesisUnitProcessor';
import { UnitNamer } from './services/UnitNamer';
import { type Clock, systemClock } from './utils/clock';
import { describeError } from './utils/errors';

export interface RunBatchDeps {
  provider: ITTSProvider;
  stream?: ConsoleStream;
  clock?: Clock;
}

/**
 * Wire the components for one run and execute it.
 *
 * The run log is opened first (failure is fatal) and closed on every exit
 * path. A failure is written to the log before it propagates.
 */
export async function runBatch(config: BatchConfig, deps: RunBatchDeps): Promise<BatchRun> {
  const clock = deps.clock ?? systemClock;
  const runLog = RunLog.open(config.logDir, { clock, stream: deps.stream });

  try {
    await mkdir(config.outputDir, { recursive: true });

    const processor = new SynthesisUnitProcessor({
      provider: deps.provider,
      namer: new UnitNamer(config.outputDir, clock),
      probe: new DurationProbe(runLog),
      runLog,
      speakerReference: config.speakerReference,
      clock
    });

    const orchestrator = new BatchOrchestrator({
      inputPath: config.inputPath,
      outputDir: config.outputDir,
      mode: config.mode,
      startOffset: config.startOffset,
      processor,
      reporter: new ReportService(runLog, clock),
      runLog,
      csvReport: config.csvReport ? new CsvReportService(config.logDir, clock) : undefined,
      clock
    });

    return await orchestrator.run();
  } catch (error) {
    runLog.line(`Error: ${describeError(error)}`);
    throw error;
  } finally {
    runLog.close();
  }
}
