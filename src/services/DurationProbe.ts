import { readWavFileInfo } from '../utils/AudioUtils';
import { describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { RunLogSink } from './RunLog';

const logger = createLogger({ service: 'DurationProbe' });

/**
 * Reads the playback length of a finished WAV artifact.
 * Failures are reported and yield 0 seconds; they never end the run.
 */
export class DurationProbe {
  constructor(private readonly runLog: RunLogSink) {}

  async probe(audioPath: string): Promise<number> {
    try {
      return (await readWavFileInfo(audioPath)).duration;
    } catch (error) {
      const reason = describeError(error);
      this.runLog.line(`Warning: could not read duration of audio file ${audioPath}: ${reason}`);
      logger.warn({ audioPath, error: reason }, 'Duration probe failed');
      return 0;
    }
  }
}
