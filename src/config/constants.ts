export const FULL_TEXT_LABEL = 'full_text';

export const AUDIO_EXTENSION = '.wav';
export const FILENAME_PREFIX_LENGTH = 10;
export const PROGRESS_PREVIEW_LENGTH = 50;

export const LOG_FILE_PREFIX = 'tts_log_';
export const CSV_REPORT_PREFIX = 'tts_report_';

export const REPORT_TITLE = 'Processing Report';
export const TOTAL_LABEL = 'Total';

// Fixed cell widths, left-justified
export const REPORT_COLUMNS = [
  { header: 'Label', width: 12 },
  { header: 'Chars', width: 15 },
  { header: 'Audio (s)', width: 20 },
  { header: 'Elapsed (s)', width: 20 },
  { header: 'Char ratio', width: 16 },
  { header: 'Time ratio', width: 16 }
] as const;

export const REPORT_WIDTH = REPORT_COLUMNS.reduce((sum, column) => sum + column.width, 0);
