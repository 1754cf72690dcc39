/**
 * Silence TTS Provider
 *
 * Writes a silent 16-bit mono WAV whose length follows the text length.
 * Used for dry runs of a batch without an inference engine.
 */

import { writeFile } from 'fs/promises';
import type { ITTSProvider, SynthesisRequest } from '../ITTSProvider';
import { pcmToWav } from '../../../utils/AudioUtils';
import { charLength } from '../../../utils/text';

export interface SilenceTTSOptions {
  sampleRate?: number;
  secondsPerChar?: number;
}

export class SilenceTTSProvider implements ITTSProvider {
  readonly name = 'silence';
  private readonly sampleRate: number;
  private readonly secondsPerChar: number;

  constructor(options: SilenceTTSOptions = {}) {
    this.sampleRate = options.sampleRate ?? 16000;
    this.secondsPerChar = options.secondsPerChar ?? 0.05;
  }

  async synthesize({ text, outputPath }: SynthesisRequest): Promise<void> {
    const samples = Math.round(charLength(text) * this.secondsPerChar * this.sampleRate);
    const pcm = Buffer.alloc(samples * 2); // 16-bit zeros
    await writeFile(outputPath, pcmToWav(pcm, this.sampleRate));
  }
}
