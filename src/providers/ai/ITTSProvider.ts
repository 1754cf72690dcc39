/**
 * Text-to-Speech Provider Interface
 *
 * Abstraction for synthesis engines (IndexTTS server, OpenAI TTS, ...).
 * An engine writes a playable WAV file to `outputPath` and resolves once the
 * file is complete; it rejects on failure.
 */

export interface SynthesisRequest {
  /** Path of the speaker reference sample (voice prompt) */
  speakerReference: string;
  text: string;
  outputPath: string;
}

export interface ITTSProvider {
  /**
   * Provider name for logging/debugging
   */
  readonly name: string;

  synthesize(request: SynthesisRequest): Promise<void>;
}
