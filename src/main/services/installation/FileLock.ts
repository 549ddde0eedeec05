import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { PipelineError, isErrnoCode } from '@main/services/errors/PipelineError';

export interface LockHandle {
  readonly path: string;
  readonly owner: string;
  release(): void;
}

interface FileLockOptions {
  isProcessAlive?: (pid: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const lockFileSchema = z.object({
  pid: z.number().int(),
  owner: z.string(),
  token: z.string(),
  acquiredAt: z.string()
});

type LockFileContent = z.infer<typeof lockFileSchema>;

const UNREADABLE_LOCK_GRACE_MS = 5000;
const RECLAIM_GUARD_STALE_MS = 30_000;

/**
 * Lock por criacao exclusiva de arquivo (`wx`). Um lock cujo pid ja morreu e
 * considerado abandonado e recuperado; um lock vivo nunca e roubado.
 */
export class FileLock {
  private readonly lockPath: string;
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(lockPath: string, options?: FileLockOptions) {
    this.lockPath = lockPath;
    this.isProcessAlive = options?.isProcessAlive ?? defaultIsProcessAlive;
    this.sleep = options?.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  get path(): string {
    return this.lockPath;
  }

  /** Nao bloqueia: retorna `null` quando outro dono vivo segura o lock. */
  tryAcquire(owner: string): LockHandle | null {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt += 1) {
      const content: LockFileContent = {
        pid: process.pid,
        owner,
        token: crypto.randomUUID(),
        acquiredAt: new Date().toISOString()
      };

      try {
        fs.writeFileSync(this.lockPath, JSON.stringify(content), { encoding: 'utf-8', flag: 'wx' });
        return this.createHandle(content);
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error;
        }
      }

      if (!this.reclaimIfStale()) {
        return null;
      }
    }

    return null;
  }

  async acquire(owner: string, options: { timeoutMs: number; pollMs?: number }): Promise<LockHandle> {
    const deadline = Date.now() + options.timeoutMs;
    const pollMs = Math.max(10, options.pollMs ?? 100);

    for (;;) {
      const handle = this.tryAcquire(owner);
      if (handle) {
        return handle;
      }
      if (Date.now() >= deadline) {
        const holder = this.readHolder();
        throw new PipelineError(
          'lock_contention',
          `Lock ${this.lockPath} ocupado por ${holder ? `${holder.owner} (pid ${holder.pid})` : 'outro processo'}.`
        );
      }
      await this.sleep(pollMs);
    }
  }

  readHolder(): LockFileContent | null {
    try {
      const parsed = lockFileSchema.safeParse(JSON.parse(fs.readFileSync(this.lockPath, 'utf-8')));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private createHandle(content: LockFileContent): LockHandle {
    let released = false;
    return {
      path: this.lockPath,
      owner: content.owner,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        const holder = this.readHolder();
        if (holder?.token === content.token) {
          fs.rmSync(this.lockPath, { force: true });
        }
      }
    };
  }

  /**
   * Remove um lock abandonado sob um arquivo de guarda exclusivo. Dentro da
   * guarda o dono e relido: so e removido o mesmo arquivo julgado abandonado.
   */
  private reclaimIfStale(): boolean {
    const holder = this.readHolder();
    let judged: { token: string } | { mtimeMs: number };
    if (holder) {
      if (this.isProcessAlive(holder.pid)) {
        return false;
      }
      judged = { token: holder.token };
    } else {
      // arquivo ainda sendo escrito por quem acabou de criar, ou corrompido
      const mtimeMs = fileMtimeMs(this.lockPath);
      if (mtimeMs === null) {
        return true;
      }
      if (Date.now() - mtimeMs < UNREADABLE_LOCK_GRACE_MS) {
        return false;
      }
      judged = { mtimeMs };
    }

    if (!this.acquireReclaimGuard()) {
      return false;
    }
    try {
      const current = this.readHolder();
      const unchanged =
        'token' in judged
          ? current?.token === judged.token
          : current === null && fileMtimeMs(this.lockPath) === judged.mtimeMs;
      if (!unchanged) {
        return !fs.existsSync(this.lockPath);
      }
      fs.rmSync(this.lockPath, { force: true });
      return true;
    } finally {
      fs.rmSync(this.reclaimGuardPath, { force: true });
    }
  }

  private get reclaimGuardPath(): string {
    return `${this.lockPath}.reclaim`;
  }

  private acquireReclaimGuard(): boolean {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        fs.writeFileSync(this.reclaimGuardPath, String(process.pid), { encoding: 'utf-8', flag: 'wx' });
        return true;
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error;
        }
      }

      // guarda esquecida por um processo que morreu no meio da recuperacao
      const mtimeMs = fileMtimeMs(this.reclaimGuardPath);
      if (mtimeMs !== null && Date.now() - mtimeMs < RECLAIM_GUARD_STALE_MS) {
        return false;
      }
      fs.rmSync(this.reclaimGuardPath, { force: true });
    }

    return false;
  }
}

function defaultIsProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }

  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoCode(error, 'EPERM');
  }
}

function fileMtimeMs(filePath: string): number | null {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return null;
  }
}
