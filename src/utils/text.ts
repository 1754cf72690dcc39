/**
 * Character helpers counting Unicode code points, so a CJK or emoji
 * character counts once and is never split in half.
 */

export function charLength(text: string): number {
  return Array.from(text).length;
}

export function takeChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

/**
 * Split file content into physical lines, accepting \n, \r\n and \r
 */
export function splitLines(content: string): string[] {
  return content.split(/\r\n|\r|\n/);
}
