import path from 'path';
import { AUDIO_EXTENSION, FILENAME_PREFIX_LENGTH, FULL_TEXT_LABEL } from '../config/constants';
import type { UnitLabel } from '../models/ProcessingRecord';
import { type Clock, formatFileStamp, systemClock } from '../utils/clock';
import { sanitizeFilename } from '../utils/filename';
import { takeChars } from '../utils/text';

export interface UnitName {
  filename: string;
  fullPath: string;
}

/**
 * Derives output file names from the unit label and the first characters
 * of its text:
 * - line mode: `{ordinal}_{prefix}.wav`
 * - full text: `full_text_{YYYYMMDD_HHMMSS}_{prefix}.wav`
 */
export class UnitNamer {
  constructor(
    private readonly outputDir: string,
    private readonly clock: Clock = systemClock
  ) {}

  name(label: UnitLabel, text: string): UnitName {
    const prefix = sanitizeFilename(takeChars(text, FILENAME_PREFIX_LENGTH));

    const filename =
      label === FULL_TEXT_LABEL
        ? `${FULL_TEXT_LABEL}_${formatFileStamp(this.clock.now())}_${prefix}${AUDIO_EXTENSION}`
        : `${label}_${prefix}${AUDIO_EXTENSION}`;

    return { filename, fullPath: path.join(this.outputDir, filename) };
  }
}
