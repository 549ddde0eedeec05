import { execFile } from 'node:child_process';
import { extractVersion } from '@shared/version';
import { buildCommandEnvironment } from '@main/services/environment/command-resolution';

/** Pergunta ao binario instalado qual versao ele reporta. */
export interface VersionProbe {
  probe(binaryPath: string): Promise<string | null>;
}

type ExecFileFn = (
  file: string,
  args: string[],
  options: { timeout: number; env: NodeJS.ProcessEnv },
  callback: (error: Error | null, stdout: string, stderr: string) => void
) => unknown;

interface ExecVersionProbeOptions {
  args?: string[];
  timeoutMs?: number;
  execFileFn?: ExecFileFn;
}

export class ExecVersionProbe implements VersionProbe {
  private readonly args: string[];
  private readonly timeoutMs: number;
  private readonly execFileFn: ExecFileFn;

  constructor(options?: ExecVersionProbeOptions) {
    this.args = options?.args ?? ['--version'];
    this.timeoutMs = Math.max(100, Math.trunc(options?.timeoutMs ?? 10_000));
    this.execFileFn = options?.execFileFn ?? defaultExecFile;
  }

  probe(binaryPath: string): Promise<string | null> {
    return new Promise((resolve) => {
      this.execFileFn(binaryPath, this.args, { timeout: this.timeoutMs, env: buildCommandEnvironment() }, (error, stdout, stderr) => {
        if (error) {
          resolve(null);
          return;
        }
        resolve(extractVersion(stdout) ?? extractVersion(stderr));
      });
    });
  }
}

function defaultExecFile(
  file: string,
  args: string[],
  options: { timeout: number; env: NodeJS.ProcessEnv },
  callback: (error: Error | null, stdout: string, stderr: string) => void
): unknown {
  return execFile(file, args, { ...options, encoding: 'utf-8' }, (error, stdout, stderr) => callback(error, stdout, stderr));
}
