import { RELEASE_CHANNELS, type ReleaseChannel } from '@shared/contracts';
import { errorReason, isPipelineError } from '@main/services/errors/PipelineError';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function processIO(): CliIO {
  return {
    out: (line) => {
      process.stdout.write(`${line}\n`);
    },
    err: (line) => {
      process.stderr.write(`${line}\n`);
    },
    env: process.env
  };
}

export class UsageError extends Error {}

export function parseChannel(value: string | undefined, fallback: ReleaseChannel): ReleaseChannel {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (!normalized) {
    return fallback;
  }
  const match = RELEASE_CHANNELS.find((channel) => channel === normalized);
  if (!match) {
    throw new UsageError(`Canal invalido: ${value}. Use ${RELEASE_CHANNELS.join(', ')}.`);
  }
  return match;
}

/** Converte qualquer falha em mensagem + codigo de saida. */
export function reportFailure(io: CliIO, error: unknown, usage: string): number {
  if (error instanceof UsageError) {
    io.err(error.message);
    io.err(usage);
    return EXIT_USAGE;
  }
  if (isPipelineError(error)) {
    io.err(`erro [${error.code}]: ${error.message}`);
    return EXIT_FAILURE;
  }
  if (error instanceof TypeError && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS')) {
    io.err(error.message);
    io.err(usage);
    return EXIT_USAGE;
  }
  io.err(`erro inesperado: ${errorReason(error)}`);
  return EXIT_FAILURE;
}

export function runMain(run: (argv: string[], io: CliIO) => Promise<number>): void {
  run(process.argv.slice(2), processIO()).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${errorReason(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}
