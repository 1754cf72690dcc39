import { Command, Option } from 'commander';

export interface CliOptions {
  input?: string;
  outputDir?: string;
  logDir?: string;
  speaker?: string;
  mode?: string;
  start?: string;
  provider?: string;
  engineUrl?: string;
  fp16?: boolean;
  cudaKernel?: boolean;
  deepspeed?: boolean;
  csv?: boolean;
}

const OPTION_ENV_KEYS: Array<[keyof CliOptions, string]> = [
  ['input', 'TTS_INPUT_FILE'],
  ['outputDir', 'TTS_OUTPUT_DIR'],
  ['logDir', 'TTS_LOG_DIR'],
  ['speaker', 'TTS_SPEAKER_PROMPT'],
  ['mode', 'TTS_MODE'],
  ['start', 'TTS_START_LINE'],
  ['provider', 'TTS_PROVIDER'],
  ['engineUrl', 'TTS_INDEXTTS_URL'],
  ['fp16', 'TTS_USE_FP16'],
  ['cudaKernel', 'TTS_USE_CUDA_KERNEL'],
  ['deepspeed', 'TTS_USE_DEEPSPEED'],
  ['csv', 'TTS_CSV_REPORT']
];

/**
 * Map the flags that were given to the environment keys they override
 */
export function cliOverrides(options: CliOptions): Record<string, string | boolean> {
  const overrides: Record<string, string | boolean> = {};

  for (const [option, envKey] of OPTION_ENV_KEYS) {
    const value = options[option];
    if (value !== undefined) {
      overrides[envKey] = value;
    }
  }

  return overrides;
}

export function createProgram(): Command {
  return new Command()
    .name('tts-batch')
    .description('Synthesize a text file line by line (or as a whole) and report timing per unit')
    .version('1.0.0')
    .option('-i, --input <path>', 'input text file (TTS_INPUT_FILE)')
    .option('-o, --output-dir <dir>', 'directory for generated audio (TTS_OUTPUT_DIR)')
    .option('-l, --log-dir <dir>', 'directory for run logs (TTS_LOG_DIR)')
    .option('-s, --speaker <path>', 'speaker reference sample (TTS_SPEAKER_PROMPT)')
    .addOption(new Option('-m, --mode <mode>', 'one file per line or one for the whole text (TTS_MODE)').choices(['line', 'full']))
    .option('--start <n>', 'first ordinal in line mode (TTS_START_LINE)')
    .option('-p, --provider <name>', 'synthesis engine: indextts, openai or silence (TTS_PROVIDER)')
    .option('--engine-url <url>', 'IndexTTS server URL (TTS_INDEXTTS_URL)')
    .option('--fp16', 'ask the engine for half precision (TTS_USE_FP16)')
    .option('--cuda-kernel', 'ask the engine for its CUDA kernels (TTS_USE_CUDA_KERNEL)')
    .option('--deepspeed', 'ask the engine for the DeepSpeed backend (TTS_USE_DEEPSPEED)')
    .option('--csv', 'also write the report as CSV next to the log (TTS_CSV_REPORT)');
}
