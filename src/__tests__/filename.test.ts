import { describe, expect, it } from 'vitest';
import { sanitizeFilename } from '../utils/filename';

describe('sanitizeFilename', () => {
  it('removes every illegal file name character', () => {
    expect(sanitizeFilename('a<b>c:d"e/f\\g|h?i*j')).toBe('abcdefghij');
    expect(sanitizeFilename('<>:"/\\|?*')).toBe('');
  });

  it('trims surrounding whitespace', () => {
    expect(sanitizeFilename('  Hello  ')).toBe('Hello');
    expect(sanitizeFilename('The quick ')).toBe('The quick');
  });

  it('keeps non-latin text untouched', () => {
    expect(sanitizeFilename('你好，世界')).toBe('你好，世界');
  });

  it('is idempotent', () => {
    const samples = ['What? Yes: no', ' <a> ', 'x * y / z', 'plain', '  ', '"quoted" |pipe|'];
    for (const sample of samples) {
      const once = sanitizeFilename(sample);
      expect(sanitizeFilename(once)).toBe(once);
    }
  });
});
