import fs from 'node:fs';
import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { ReleaseBuildConfig } from '@main/services/config/ReleaseConfigStore';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import { buildCommandEnvironment } from '@main/services/environment/command-resolution';
import type { LogSink } from '@main/services/logging/Logger';

/** Parte de `ChildProcess` que o runner usa. */
export interface BuildProcess {
  stderr: Readable | null;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type BuildSpawnFn = (command: string, args: string[], options: SpawnOptions) => BuildProcess;

interface CommandBuildRunnerOptions {
  logger: LogSink;
  spawnFn?: BuildSpawnFn;
  existsSync?: (filePath: string) => boolean;
}

interface ExitResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderrTail: string;
}

const STDERR_TAIL_BYTES = 4096;

/** Roda o build opaco da aplicacao e devolve o caminho do binario produzido. */
export class CommandBuildRunner {
  private readonly logger: LogSink;
  private readonly spawnFn: BuildSpawnFn;
  private readonly existsSync: (filePath: string) => boolean;

  constructor(options: CommandBuildRunnerOptions) {
    this.logger = options.logger;
    this.spawnFn = options.spawnFn ?? spawn;
    this.existsSync = options.existsSync ?? fs.existsSync;
  }

  async run(build: ReleaseBuildConfig, fallbackCwd: string): Promise<string> {
    if (!build.command) {
      throw new PipelineError('build_failure', 'Nenhum comando de build configurado e nenhum binario informado.');
    }
    if (!build.outputPath) {
      throw new PipelineError('build_failure', 'build.outputPath nao configurado.');
    }

    const cwd = build.cwd ?? fallbackCwd;
    this.logger.info('release.build.start', {
      command: build.command,
      args: build.args,
      cwd
    });

    let result: ExitResult;
    try {
      result = await this.execute(build.command, build.args, cwd, build.timeoutMs);
    } catch (error) {
      this.logger.error('release.build.error', {
        code: 'build_failure',
        reason: errorReason(error)
      });
      throw new PipelineError('build_failure', `Falha ao iniciar build: ${errorReason(error)}`, { cause: error });
    }

    if (result.code !== 0) {
      const detail = result.signal ? `sinal ${result.signal}` : `codigo ${result.code ?? 'desconhecido'}`;
      this.logger.error('release.build.error', {
        code: 'build_failure',
        reason: detail,
        stderr: result.stderrTail
      });
      throw new PipelineError('build_failure', `Build terminou com ${detail}.`);
    }

    if (!this.existsSync(build.outputPath)) {
      this.logger.error('release.build.error', {
        code: 'build_failure',
        reason: 'output_missing',
        outputPath: build.outputPath
      });
      throw new PipelineError('build_failure', `Build nao produziu ${build.outputPath}.`);
    }

    this.logger.info('release.build.finish', {
      outputPath: build.outputPath
    });
    return build.outputPath;
  }

  private execute(command: string, args: string[], cwd: string, timeoutMs: number): Promise<ExitResult> {
    return new Promise((resolve, reject) => {
      const child = this.spawnFn(command, args, {
        cwd,
        env: buildCommandEnvironment(),
        stdio: ['ignore', 'ignore', 'pipe'],
        timeout: timeoutMs
      });

      let stderrTail = '';
      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = `${stderrTail}${chunk.toString('utf-8')}`.slice(-STDERR_TAIL_BYTES);
      });
      child.once('error', reject);
      child.once('close', (code, signal) => {
        resolve({ code, signal, stderrTail: stderrTail.trim() });
      });
    });
  }
}
