import type { FULL_TEXT_LABEL } from '../config/constants';

/** Ordinal in line mode, sentinel in full-text mode */
export type UnitLabel = number | typeof FULL_TEXT_LABEL;

export interface ProcessingRecord {
  label: UnitLabel;
  charCount: number;
  elapsedTime: number; // seconds
  audioDuration: number; // seconds, 0 when unreadable
  outputFile: string;
  outputPath: string;
}
