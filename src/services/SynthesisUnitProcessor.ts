import { FULL_TEXT_LABEL, PROGRESS_PREVIEW_LENGTH } from '../config/constants';
import type { ProcessingRecord, UnitLabel } from '../models/ProcessingRecord';
import type { ITTSProvider } from '../providers/ai/ITTSProvider';
import { type Clock, secondsBetween, systemClock } from '../utils/clock';
import { SynthesisError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { charLength, takeChars } from '../utils/text';
import type { DurationProbe } from './DurationProbe';
import type { RunLogSink } from './RunLog';
import type { UnitNamer } from './UnitNamer';

const logger = createLogger({ service: 'SynthesisUnitProcessor' });

export interface SynthesisUnitProcessorDeps {
  provider: ITTSProvider;
  namer: UnitNamer;
  probe: DurationProbe;
  runLog: RunLogSink;
  speakerReference: string;
  clock?: Clock;
}

/**
 * Synthesizes a single unit and measures it.
 *
 * Engine failures are not retried: they surface as SynthesisError and end
 * the batch.
 */
export class SynthesisUnitProcessor {
  private readonly clock: Clock;

  constructor(private readonly deps: SynthesisUnitProcessorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async process(label: UnitLabel, text: string): Promise<ProcessingRecord> {
    const { provider, namer, probe, runLog, speakerReference } = this.deps;
    const { filename, fullPath } = namer.name(label, text);
    const charCount = charLength(text);

    const subject = label === FULL_TEXT_LABEL ? 'full text' : `line ${label}`;
    const preview = takeChars(text, PROGRESS_PREVIEW_LENGTH);
    runLog.line(`Processing ${subject}: ${preview}... characters: ${charCount}`);
    runLog.line(`Output file: ${filename}`);

    const startedAt = this.clock.now();
    try {
      await provider.synthesize({ speakerReference, text, outputPath: fullPath });
    } catch (error) {
      logger.error({ label, outputFile: filename, provider: provider.name, error }, 'Synthesis failed');
      throw new SynthesisError(label, filename, error);
    }
    const elapsedTime = secondsBetween(startedAt, this.clock.now());

    const audioDuration = await probe.probe(fullPath);

    runLog.line(`Completed: ${filename} elapsed: ${elapsedTime.toFixed(2)} s`);
    runLog.line('');

    logger.debug({ label, charCount, elapsedTime, audioDuration }, 'Unit processed');

    return {
      label,
      charCount,
      elapsedTime,
      audioDuration,
      outputFile: filename,
      outputPath: fullPath
    };
  }
}
