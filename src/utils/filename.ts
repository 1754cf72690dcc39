const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Remove characters that are illegal in file names on common filesystems
 * and trim surrounding whitespace.
 */
export function sanitizeFilename(text: string): string {
  return text.replace(ILLEGAL_FILENAME_CHARS, '').trim();
}
