import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { errorReason } from '@main/services/errors/PipelineError';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

/** Superficie minima que os servicos recebem; permite fakes com `vi.fn()` nos testes. */
export interface LogSink {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

const logLineSchema = z.object({
  ts: z.string().optional(),
  level: z.unknown(),
  message: z.string().optional(),
  meta: z.unknown()
});

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Saida humana adicional (stderr na CLI) para eventos a partir de `minLevel`. */
export interface LogEcho {
  minLevel: LogLevel;
  write(line: string): void;
}

interface LoggerOptions {
  fileName?: string;
  mirrorFilePath?: string | null;
  maxBytes?: number;
  echo?: LogEcho | null;
}

export class Logger implements LogSink {
  private readonly filePath: string;
  private mirrorFilePath: string | null;
  private readonly maxBytes: number;
  private readonly echo: LogEcho | null;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, normalizeFileName(options?.fileName));
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.maxBytes = normalizeMaxBytes(options?.maxBytes);
    this.echo = options?.echo ?? null;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  get path(): string {
    return this.filePath;
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  entries(limit?: number): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const text = fs.readFileSync(file, 'utf-8');
      for (const raw of text.split('\n')) {
        const line = raw.trim();
        if (!line) {
          continue;
        }

        entries.push(parseLogLine(line));
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      this.appendMirror(line);
    }
    if (this.echo && LEVEL_ORDER[level] >= LEVEL_ORDER[this.echo.minLevel]) {
      this.echo.write(formatEcho(level, message, meta));
    }
  }

  /** Espelho e opcional: na primeira falha ele e desligado e a falha fica registrada no arquivo principal. */
  private appendMirror(line: string): void {
    const mirror = this.mirrorFilePath;
    if (!mirror) {
      return;
    }
    try {
      fs.appendFileSync(mirror, `${line}\n`);
    } catch (error) {
      this.mirrorFilePath = null;
      this.warn('logger.mirror.disabled', {
        mirrorFilePath: mirror,
        reason: errorReason(error)
      });
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed = logLineSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      return { ts: new Date().toISOString(), level: 'info', message: line };
    }

    return {
      ts: parsed.data.ts ?? new Date().toISOString(),
      level: isLogLevel(parsed.data.level) ? parsed.data.level : 'info',
      message: parsed.data.message ?? line,
      meta: parsed.data.meta
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

function formatEcho(level: LogLevel, message: string, meta: unknown): string {
  if (meta && typeof meta === 'object' && 'reason' in meta && typeof meta.reason === 'string') {
    return `[${level}] ${message}: ${meta.reason}`;
  }
  return `[${level}] ${message}`;
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function normalizeFileName(value: string | undefined): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return normalized ? path.basename(normalized) : 'fleet.log';
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}

function normalizeMaxBytes(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 2 * 1024 * 1024;
  }
  return Math.max(1024, Math.trunc(value));
}
