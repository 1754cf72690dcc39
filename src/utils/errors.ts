export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export class InputFileError extends Error {
  constructor(readonly inputPath: string, cause: unknown) {
    super(`Cannot read input file ${inputPath}: ${describeError(cause)}`, { cause });
    this.name = 'InputFileError';
  }
}

export class LogFileError extends Error {
  constructor(readonly logPath: string, cause: unknown) {
    super(`Cannot write log file ${logPath}: ${describeError(cause)}`, { cause });
    this.name = 'LogFileError';
  }
}

/**
 * Raised when the synthesis engine fails for a unit. Ends the run.
 */
export class SynthesisError extends Error {
  constructor(readonly label: string | number, readonly outputFile: string, cause: unknown) {
    super(`Synthesis failed for ${label} (${outputFile}): ${describeError(cause)}`, { cause });
    this.name = 'SynthesisError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
