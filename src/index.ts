#!/usr/bin/env node
import { loadEnv, toBatchConfig } from './config/env';
import { cliOverrides, createProgram, type CliOptions } from './cli/options';
import { createTTSProvider } from './providers/ProviderFactory';
import { runBatch } from './runner';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

const program = createProgram().action(async () => {
  const env = loadEnv(cliOverrides(program.opts<CliOptions>()));
  const provider = createTTSProvider(env);

  logger.info({ provider: provider.name, mode: env.TTS_MODE }, 'Starting TTS batch');
  await runBatch(toBatchConfig(env), { provider });
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ error }, 'TTS batch failed');
  console.error(`❌ ${describeError(error)}`);
  process.exitCode = 1;
});
