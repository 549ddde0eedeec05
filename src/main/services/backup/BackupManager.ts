import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { BackupRecord } from '@shared/contracts';
import { PipelineError, errorReason, isErrnoCode } from '@main/services/errors/PipelineError';
import type { LogSink } from '@main/services/logging/Logger';
import { digestBuffer } from '@main/services/signing/digest';

interface BackupManagerOptions {
  backupsDir: string;
  executableName: string;
  logger: LogSink;
  maxBackups?: number;
  now?: () => Date;
}

export interface RollbackSource {
  record: BackupRecord;
  bytes: Buffer;
}

const RECORD_FILE = 'record.json';

const backupRecordSchema = z.object({
  id: z.string().min(1),
  capturedAt: z.string().datetime(),
  versionTag: z.string().min(1),
  binaryPath: z.string().min(1),
  sha256: z.string().regex(/^[a-f0-9]{64}$/),
  sizeBytes: z.number().int().nonnegative()
});

export class BackupManager {
  private readonly backupsDir: string;
  private readonly executableName: string;
  private readonly logger: LogSink;
  private readonly maxBackups: number;
  private readonly now: () => Date;

  constructor(options: BackupManagerOptions) {
    this.backupsDir = options.backupsDir;
    this.executableName = options.executableName;
    this.logger = options.logger;
    this.maxBackups = normalizeMaxBackups(options.maxBackups);
    this.now = options.now ?? (() => new Date());
  }

  backup(binaryPath: string, versionTag: string | null): BackupRecord {
    const bytes = fs.readFileSync(binaryPath);
    const capturedAt = this.now();
    const tag = normalizeVersionTag(versionTag);
    const { id, dir } = this.reserveDirectory(`${formatTimestamp(capturedAt)}_${sanitizeSegment(tag)}`);

    const copyPath = path.join(dir, this.executableName);
    fs.writeFileSync(copyPath, bytes, { mode: 0o755 });
    const record: BackupRecord = {
      id,
      capturedAt: capturedAt.toISOString(),
      versionTag: tag,
      binaryPath: copyPath,
      sha256: digestBuffer(bytes, 'sha256'),
      sizeBytes: bytes.length
    };
    fs.writeFileSync(path.join(dir, RECORD_FILE), `${JSON.stringify(record, null, 2)}\n`, 'utf-8');

    this.logger.info('backup.create.finish', {
      id,
      versionTag: tag,
      sizeBytes: record.sizeBytes
    });
    this.prune(id);
    return record;
  }

  /** Mais recente primeiro. Diretorios sem `record.json` valido sao ignorados. */
  list(): BackupRecord[] {
    if (!fs.existsSync(this.backupsDir)) {
      return [];
    }

    const records: BackupRecord[] = [];
    for (const entry of fs.readdirSync(this.backupsDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) {
        continue;
      }
      const record = this.readRecord(path.join(this.backupsDir, entry.name));
      if (record) {
        records.push(record);
      }
    }

    return records.sort((left, right) => {
      const byTime = Date.parse(right.capturedAt) - Date.parse(left.capturedAt);
      if (byTime !== 0) {
        return byTime;
      }
      const bySequence = collisionSequence(right) - collisionSequence(left);
      return bySequence !== 0 ? bySequence : right.id.localeCompare(left.id);
    });
  }

  latest(): BackupRecord | null {
    return this.list()[0] ?? null;
  }

  rollback(): RollbackSource {
    const record = this.latest();
    if (!record) {
      throw new PipelineError('no_backup_available', `Nenhum backup disponivel em ${this.backupsDir}.`);
    }

    const bytes = fs.readFileSync(record.binaryPath);
    if (digestBuffer(bytes, 'sha256') !== record.sha256) {
      throw new PipelineError('apply_failure', `Backup ${record.id} corrompido: checksum nao confere.`);
    }
    return { record, bytes };
  }

  /** Substitui `targetPath` atomicamente pelos bytes do backup; retorna o sha256 gravado. */
  restore(record: BackupRecord, targetPath: string): string {
    const bytes = fs.readFileSync(record.binaryPath);
    if (digestBuffer(bytes, 'sha256') !== record.sha256) {
      throw new PipelineError('apply_failure', `Backup ${record.id} corrompido: checksum nao confere.`);
    }

    const pending = path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.restore-${process.pid}`);
    try {
      fs.writeFileSync(pending, bytes, { mode: 0o755 });
      fs.chmodSync(pending, 0o755);
      fs.renameSync(pending, targetPath);
    } catch (error) {
      fs.rmSync(pending, { force: true });
      throw new PipelineError('apply_failure', `Falha ao restaurar backup ${record.id}: ${errorReason(error)}`, {
        cause: error
      });
    }

    const written = digestBuffer(fs.readFileSync(targetPath), 'sha256');
    this.logger.info('backup.restore.finish', {
      id: record.id,
      targetPath,
      sha256: written
    });
    return written;
  }

  private reserveDirectory(baseId: string): { id: string; dir: string } {
    fs.mkdirSync(this.backupsDir, { recursive: true });
    for (let attempt = 1; ; attempt += 1) {
      const id = attempt === 1 ? baseId : `${baseId}-${attempt}`;
      const dir = path.join(this.backupsDir, id);
      try {
        fs.mkdirSync(dir);
        return { id, dir };
      } catch (error) {
        if (!isErrnoCode(error, 'EEXIST')) {
          throw error;
        }
      }
    }
  }

  private prune(keepId: string): void {
    const records = this.list();
    if (records.length <= this.maxBackups) {
      return;
    }

    const removable = records
      .slice()
      .reverse()
      .filter((record) => record.id !== keepId)
      .slice(0, records.length - this.maxBackups);

    for (const record of removable) {
      fs.rmSync(path.join(this.backupsDir, record.id), { recursive: true, force: true });
      this.logger.info('backup.prune', {
        id: record.id,
        versionTag: record.versionTag
      });
    }
  }

  private readRecord(dir: string): BackupRecord | null {
    const recordPath = path.join(dir, RECORD_FILE);
    if (!fs.existsSync(recordPath)) {
      return null;
    }

    try {
      const parsed = backupRecordSchema.safeParse(JSON.parse(fs.readFileSync(recordPath, 'utf-8')));
      if (parsed.success && fs.existsSync(parsed.data.binaryPath)) {
        return parsed.data;
      }
    } catch (error) {
      this.logger.warn('backup.record.invalid', {
        dir,
        reason: errorReason(error)
      });
    }
    return null;
  }
}

function normalizeMaxBackups(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 5;
  }
  return Math.max(1, Math.trunc(value));
}

function normalizeVersionTag(value: string | null): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized || 'unknown';
}

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

function formatTimestamp(date: Date): string {
  const pad = (value: number, size = 2) => String(value).padStart(size, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    `${pad(date.getUTCMilliseconds(), 3)}`
  );
}

/** Posicao do registro entre backups do mesmo instante: `<base>` e 1, `<base>-N` e N. */
function collisionSequence(record: BackupRecord): number {
  const base = `${formatTimestamp(new Date(record.capturedAt))}_${sanitizeSegment(record.versionTag)}`;
  if (record.id === base) {
    return 1;
  }
  const match = record.id.startsWith(`${base}-`) ? /^\d+$/.exec(record.id.slice(base.length + 1)) : null;
  return match ? Number(match[0]) : 0;
}
