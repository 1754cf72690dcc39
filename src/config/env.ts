/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables.
 * CLI flags are merged on top of the environment before validation.
 */

import path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export const envSchema = z.object({
  // ===== Input / Output =====
  TTS_INPUT_FILE: z.string().min(1).default('input.txt'),
  TTS_OUTPUT_DIR: z.string().min(1).default('outputs'),
  TTS_LOG_DIR: z.string().min(1).default('logs'),

  // ===== Batch Mode =====
  TTS_MODE: z.enum(['line', 'full']).default('line'),
  TTS_START_LINE: z.coerce.number().int().nonnegative().default(1), // Only used in line mode
  TTS_CSV_REPORT: booleanFlag.default(false),

  // ===== Synthesis Engine =====
  TTS_PROVIDER: z.string().min(1).default('indextts'),
  TTS_SPEAKER_PROMPT: z.string().min(1).default('examples/voice_01.wav'),
  TTS_INDEXTTS_URL: z.string().url().optional().default('http://127.0.0.1:9880'),
  TTS_USE_FP16: booleanFlag.default(false),
  TTS_USE_CUDA_KERNEL: booleanFlag.default(false),
  TTS_USE_DEEPSPEED: booleanFlag.default(false),

  // OpenAI (only registered when a key is present)
  OPENAI_API_KEY: z.string().optional(),
  TTS_OPENAI_MODEL: z.string().default('tts-1'),
  TTS_OPENAI_VOICE: z.enum(OPENAI_VOICES).default('alloy'),

  // ===== Runtime =====
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional()
});

export type Env = z.infer<typeof envSchema>;

export type ProcessingMode = Env['TTS_MODE'];

export interface EngineFlags {
  useFp16: boolean;
  useCudaKernel: boolean;
  useDeepspeed: boolean;
}

/**
 * Resolved settings for a single batch run. Paths are absolute.
 */
export interface BatchConfig {
  inputPath: string;
  outputDir: string;
  logDir: string;
  speakerReference: string;
  mode: ProcessingMode;
  startOffset: number;
  csvReport: boolean;
}

/**
 * Validate a raw key/value source (process.env, optionally with CLI overrides)
 * @throws ConfigError listing every failed field
 */
export function parseEnv(source: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}

export interface LoadEnvOptions {
  /** Defaults to `.env` in the working directory */
  envFile?: string;
}

/**
 * Load `.env`, apply overrides and validate.
 * Module loggers are created before `.env` is read, so the level is applied here.
 */
export function loadEnv(
  overrides: Record<string, string | boolean> = {},
  options: LoadEnvOptions = {}
): Env {
  dotenv.config({ path: options.envFile });
  const env = parseEnv({ ...process.env, ...overrides });

  if (env.LOG_LEVEL) {
    setLogLevel(env.LOG_LEVEL);
  }

  return env;
}

export function toEngineFlags(env: Env): EngineFlags {
  return {
    useFp16: env.TTS_USE_FP16,
    useCudaKernel: env.TTS_USE_CUDA_KERNEL,
    useDeepspeed: env.TTS_USE_DEEPSPEED
  };
}

export function toBatchConfig(env: Env, cwd: string = process.cwd()): BatchConfig {
  return {
    inputPath: path.resolve(cwd, env.TTS_INPUT_FILE),
    outputDir: path.resolve(cwd, env.TTS_OUTPUT_DIR),
    logDir: path.resolve(cwd, env.TTS_LOG_DIR),
    speakerReference: path.resolve(cwd, env.TTS_SPEAKER_PROMPT),
    mode: env.TTS_MODE,
    startOffset: env.TTS_START_LINE,
    csvReport: env.TTS_CSV_REPORT
  };
}
