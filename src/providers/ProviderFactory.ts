/**
 * Provider Factory
 *
 * Creates synthesis engine instances based on environment configuration.
 */

import { type Env, toEngineFlags } from '../config/env';
import type { ITTSProvider } from './ai/ITTSProvider';
import { ProviderRegistry } from './ProviderRegistry';
import { IndexTTSProvider } from './ai/tts/IndexTTSProvider';
import { OpenAITTSProvider } from './ai/tts/OpenAITTSProvider';
import { SilenceTTSProvider } from './ai/tts/SilenceTTSProvider';

/**
 * Create Provider Registry with all configured engines
 */
export function createProviderRegistry(env: Env): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.registerTTS('silence', new SilenceTTSProvider());

  if (env.TTS_INDEXTTS_URL) {
    registry.registerTTS('indextts', new IndexTTSProvider({
      baseUrl: env.TTS_INDEXTTS_URL,
      ...toEngineFlags(env)
    }));
  }

  if (env.OPENAI_API_KEY) {
    registry.registerTTS('openai', new OpenAITTSProvider(
      env.OPENAI_API_KEY,
      env.TTS_OPENAI_MODEL,
      env.TTS_OPENAI_VOICE
    ));
  }

  return registry;
}

/**
 * Resolve the engine named by TTS_PROVIDER
 * @throws ProviderNotFoundError if it is not configured
 */
export function createTTSProvider(env: Env): ITTSProvider {
  return createProviderRegistry(env).getTTS(env.TTS_PROVIDER);
}
