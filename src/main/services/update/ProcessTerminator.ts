import fs from 'node:fs';
import { spawnSync } from 'node:child_process';
import { isErrnoCode } from '@main/services/errors/PipelineError';
import type { LogSink } from '@main/services/logging/Logger';

export interface TerminationReport {
  pids: number[];
  /** Processos que ignoraram SIGTERM dentro da carencia e levaram SIGKILL. */
  killed: number[];
}

export interface ProcessTerminator {
  terminate(binaryPath: string, signal?: AbortSignal): Promise<TerminationReport>;
}

interface SignalProcessTerminatorOptions {
  logger: LogSink;
  graceMs?: number;
  pollMs?: number;
  pidFile?: string | null;
  listPids?: (binaryPath: string) => number[];
  kill?: (pid: number, signal: NodeJS.Signals | 0) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** SIGTERM, espera limitada, depois SIGKILL nos que sobraram. */
export class SignalProcessTerminator implements ProcessTerminator {
  private readonly logger: LogSink;
  private readonly graceMs: number;
  private readonly pollMs: number;
  private readonly pidFile: string | null;
  private readonly listPids: (binaryPath: string) => number[];
  private readonly kill: (pid: number, signal: NodeJS.Signals | 0) => void;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SignalProcessTerminatorOptions) {
    this.logger = options.logger;
    this.graceMs = Math.max(0, Math.trunc(options.graceMs ?? 2000));
    this.pollMs = Math.max(10, Math.trunc(options.pollMs ?? 100));
    this.pidFile = options.pidFile ?? null;
    this.listPids = options.listPids ?? ((binaryPath) => this.discoverPids(binaryPath));
    this.kill = options.kill ?? ((pid, signal) => process.kill(pid, signal));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async terminate(binaryPath: string, signal?: AbortSignal): Promise<TerminationReport> {
    const pids = this.listPids(binaryPath).filter((pid) => pid !== process.pid);
    if (pids.length === 0) {
      return { pids: [], killed: [] };
    }

    this.logger.info('update.terminate.start', { binaryPath, pids });
    for (const pid of pids) {
      this.send(pid, 'SIGTERM');
    }

    let waitedMs = 0;
    let alive = pids.filter((pid) => this.isAlive(pid));
    while (alive.length > 0 && waitedMs < this.graceMs && !signal?.aborted) {
      await this.sleep(this.pollMs);
      waitedMs += this.pollMs;
      alive = alive.filter((pid) => this.isAlive(pid));
    }

    for (const pid of alive) {
      this.send(pid, 'SIGKILL');
    }

    this.logger.info('update.terminate.finish', {
      binaryPath,
      pids,
      killed: alive
    });
    return { pids, killed: alive };
  }

  private send(pid: number, signalName: NodeJS.Signals): void {
    try {
      this.kill(pid, signalName);
    } catch (error) {
      if (!isErrnoCode(error, 'ESRCH')) {
        throw error;
      }
    }
  }

  private isAlive(pid: number): boolean {
    try {
      this.kill(pid, 0);
      return true;
    } catch (error) {
      return isErrnoCode(error, 'EPERM');
    }
  }

  private discoverPids(binaryPath: string): number[] {
    if (this.pidFile && fs.existsSync(this.pidFile)) {
      return parsePids(fs.readFileSync(this.pidFile, 'utf-8'));
    }

    const result = spawnSync('pgrep', ['-f', binaryPath], { encoding: 'utf-8', timeout: 5000 });
    if (result.error) {
      this.logger.warn('update.terminate.discovery_unavailable', {
        binaryPath,
        reason: result.error.message
      });
      return [];
    }
    return result.status === 0 ? parsePids(result.stdout) : [];
  }
}

export function parsePids(text: string): number[] {
  return Array.from(
    new Set(
      text
        .split(/\s+/)
        .map((item) => Number(item.trim()))
        .filter((pid) => Number.isInteger(pid) && pid > 0)
    )
  );
}
