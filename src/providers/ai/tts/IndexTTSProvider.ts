/**
 * IndexTTS Provider
 *
 * Talks to a local IndexTTS inference server. The engine flags are passed
 * through untouched; their meaning is up to the server.
 *
 * API: POST /infer with a JSON body, responds with WAV audio. The server is
 * also told the output path; the adapter writes the returned bytes there.
 */

import { writeFile } from 'fs/promises';
import type { ITTSProvider, SynthesisRequest } from '../ITTSProvider';
import type { EngineFlags } from '../../../config/env';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'IndexTTSProvider' });

export interface IndexTTSOptions extends EngineFlags {
  baseUrl: string;
}

export class IndexTTSProvider implements ITTSProvider {
  readonly name = 'indextts';
  private baseUrl: string;

  constructor(private readonly options: IndexTTSOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async synthesize({ speakerReference, text, outputPath }: SynthesisRequest): Promise<void> {
    logger.debug({ outputPath, chars: text.length }, 'Requesting synthesis');

    const response = await fetch(`${this.baseUrl}/infer`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        spk_audio_prompt: speakerReference,
        text,
        output_path: outputPath,
        use_fp16: this.options.useFp16,
        use_cuda_kernel: this.options.useCudaKernel,
        use_deepspeed: this.options.useDeepspeed,
        verbose: true
      })
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error({ status: response.status, errorText }, 'IndexTTS request failed');
      throw new Error(`IndexTTS API error: ${response.status} ${response.statusText} - ${errorText}`);
    }

    const audio = Buffer.from(await response.arrayBuffer());
    await writeFile(outputPath, audio);
  }
}
