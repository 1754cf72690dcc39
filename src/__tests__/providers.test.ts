import { readFileSync } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseEnv } from '../config/env';
import { createProviderRegistry, createTTSProvider } from '../providers/ProviderFactory';
import { ProviderNotFoundError, ProviderRegistry } from '../providers/ProviderRegistry';
import { IndexTTSProvider } from '../providers/ai/tts/IndexTTSProvider';
import { SilenceTTSProvider } from '../providers/ai/tts/SilenceTTSProvider';
import { pcmToWav, readWavInfo } from '../utils/AudioUtils';
import { createTempDir, removeTempDir } from './helpers';

describe('ProviderRegistry', () => {
  it('lists the available providers when a name is unknown', () => {
    const registry = new ProviderRegistry();
    registry.registerTTS('silence', new SilenceTTSProvider());

    expect(registry.hasTTS('silence')).toBe(true);
    expect(() => registry.getTTS('missing')).toThrow(
      "TTS provider 'missing' not found. Available providers: silence"
    );
  });
});

describe('createProviderRegistry', () => {
  it('registers the silence and IndexTTS engines by default', () => {
    expect(createProviderRegistry(parseEnv({})).getAvailableTTSProviders()).toEqual(['silence', 'indextts']);
  });

  it('registers OpenAI only when a key is configured', () => {
    const registry = createProviderRegistry(parseEnv({ OPENAI_API_KEY: 'test-key' }));

    expect(registry.getAvailableTTSProviders()).toEqual(['silence', 'indextts', 'openai']);
    expect(registry.getTTS('openai').name).toBe('openai');
  });

  it('resolves the configured engine', () => {
    expect(createTTSProvider(parseEnv({ TTS_PROVIDER: 'silence' })).name).toBe('silence');
    expect(() => createTTSProvider(parseEnv({ TTS_PROVIDER: 'openai' }))).toThrow(ProviderNotFoundError);
  });
});

describe('engines', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    removeTempDir(dir);
  });

  it('silence engine writes audio proportional to the text length', async () => {
    const outputPath = path.join(dir, 'silence.wav');

    await new SilenceTTSProvider().synthesize({
      speakerReference: '/voices/reference.wav',
      text: 'Hello world.',
      outputPath
    });

    const info = readWavInfo(readFileSync(outputPath));
    expect(info.sampleRate).toBe(16000);
    expect(info.duration).toBe(0.6);
  });

  it('IndexTTS engine posts the unit and writes the returned audio', async () => {
    const wav = pcmToWav(Buffer.alloc(3200), 16000);
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(new Uint8Array(wav), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);
    const outputPath = path.join(dir, '1_Hello.wav');

    await new IndexTTSProvider({
      baseUrl: 'http://engine.local:9880/',
      useFp16: true,
      useCudaKernel: false,
      useDeepspeed: false
    }).synthesize({ speakerReference: '/voices/reference.wav', text: 'Hello', outputPath });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://engine.local:9880/infer');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      spk_audio_prompt: '/voices/reference.wav',
      text: 'Hello',
      output_path: outputPath,
      use_fp16: true,
      use_cuda_kernel: false,
      use_deepspeed: false,
      verbose: true
    });
    expect(readFileSync(outputPath).equals(wav)).toBe(true);
  });

  it('IndexTTS engine built from the environment forwards the engine flags', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(new Uint8Array(pcmToWav(Buffer.alloc(32), 16000)), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);
    const provider = createTTSProvider(
      parseEnv({ TTS_INDEXTTS_URL: 'http://engine.local:9880', TTS_USE_CUDA_KERNEL: 'true', TTS_USE_DEEPSPEED: 'true' })
    );

    await provider.synthesize({ speakerReference: '/voices/reference.wav', text: 'Hi', outputPath: path.join(dir, 'hi.wav') });

    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toMatchObject({
      use_fp16: false,
      use_cuda_kernel: true,
      use_deepspeed: true
    });
  });

  it('IndexTTS engine rejects on an error status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('model not loaded', { status: 503, statusText: 'Service Unavailable' }))
    );

    await expect(
      new IndexTTSProvider({
        baseUrl: 'http://engine.local:9880',
        useFp16: false,
        useCudaKernel: false,
        useDeepspeed: false
      }).synthesize({ speakerReference: '/voices/reference.wav', text: 'Hello', outputPath: path.join(dir, 'x.wav') })
    ).rejects.toThrow('IndexTTS API error: 503 Service Unavailable - model not loaded');
  });
});
