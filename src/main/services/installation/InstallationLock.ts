import type { InstallationContext } from '@shared/contracts';
import { FileLock, type LockHandle } from '@main/services/installation/FileLock';

interface InstallationLockOptions {
  isProcessAlive?: (pid: number) => boolean;
}

/** Uma sessao de update por instalacao; nunca espera por outro dono. */
export class InstallationLock {
  private readonly lock: FileLock;

  constructor(context: InstallationContext, options?: InstallationLockOptions) {
    this.lock = new FileLock(context.lockPath, { isProcessAlive: options?.isProcessAlive });
  }

  get path(): string {
    return this.lock.path;
  }

  tryAcquire(owner: string): LockHandle | null {
    return this.lock.tryAcquire(owner);
  }

  holder(): { pid: number; owner: string } | null {
    const current = this.lock.readHolder();
    return current ? { pid: current.pid, owner: current.owner } : null;
  }
}
