import { OpenAI } from 'openai';
import { writeFile } from 'fs/promises';
import type { ITTSProvider, SynthesisRequest } from '../ITTSProvider';
import type { Env } from '../../../config/env';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'OpenAITTSProvider' });

export type OpenAIVoice = Env['TTS_OPENAI_VOICE'];

/**
 * OpenAI Text-to-Speech Provider
 *
 * Voice cloning is not available, the configured preset voice is used and
 * the speaker reference is ignored.
 */
export class OpenAITTSProvider implements ITTSProvider {
  readonly name = 'openai';
  private openai: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = 'tts-1',
    private readonly voice: OpenAIVoice = 'alloy'
  ) {
    this.openai = new OpenAI({ apiKey });
  }

  async synthesize({ speakerReference, text, outputPath }: SynthesisRequest): Promise<void> {
    logger.debug({ speakerReference, voice: this.voice }, 'Speaker reference ignored, using preset voice');

    try {
      const response = await this.openai.audio.speech.create({
        model: this.model,
        voice: this.voice,
        input: text,
        response_format: 'wav'
      });

      await writeFile(outputPath, Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      logger.error({ error }, 'OpenAI TTS synthesis failed');
      throw error;
    }
  }
}
