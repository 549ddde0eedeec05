import fs from 'node:fs';
import path from 'node:path';
import { extract as extractTar } from 'tar';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import type { LogSink } from '@main/services/logging/Logger';

interface BinaryInstallerOptions {
  executableName: string;
  logger: LogSink;
}

const ARCHIVE_SUFFIXES = ['.tar.gz', '.tgz'];

export class BinaryInstaller {
  private readonly executableName: string;
  private readonly logger: LogSink;

  constructor(options: BinaryInstallerOptions) {
    this.executableName = options.executableName;
    this.logger = options.logger;
  }

  /** Extrai `bin/<executavel>` de um `.tar.gz`; qualquer outro arquivo e tratado como o proprio binario. */
  async extract(artifactPath: string, scratchDir: string): Promise<string> {
    if (!isArchive(artifactPath)) {
      return artifactPath;
    }

    fs.rmSync(scratchDir, { recursive: true, force: true });
    fs.mkdirSync(scratchDir, { recursive: true });
    try {
      await extractTar({
        file: artifactPath,
        cwd: scratchDir,
        strict: true,
        filter: (entryPath) => isBinaryEntry(entryPath, this.executableName)
      });
    } catch (error) {
      throw new PipelineError('apply_failure', `Falha ao extrair ${artifactPath}: ${errorReason(error)}`, { cause: error });
    }

    const found = findBinary(scratchDir, this.executableName);
    if (!found) {
      throw new PipelineError('apply_failure', `Pacote ${path.basename(artifactPath)} nao contem bin/${this.executableName}.`);
    }
    return found;
  }

  /** Grava ao lado do destino, aplica 0755 e troca por rename atomico. */
  install(sourcePath: string, targetPath: string): void {
    const pending = path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.incoming-${process.pid}`);
    try {
      fs.mkdirSync(path.dirname(targetPath), { recursive: true });
      fs.copyFileSync(sourcePath, pending);
      fs.chmodSync(pending, 0o755);
      fs.renameSync(pending, targetPath);
    } catch (error) {
      fs.rmSync(pending, { force: true });
      throw new PipelineError('apply_failure', `Falha ao instalar ${targetPath}: ${errorReason(error)}`, { cause: error });
    }

    this.logger.info('update.apply.swapped', { targetPath });
  }

  remove(targetPath: string): void {
    fs.rmSync(targetPath, { force: true });
    this.logger.warn('update.apply.removed', { targetPath });
  }
}

function isArchive(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return ARCHIVE_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

function isBinaryEntry(entryPath: string, executableName: string): boolean {
  const segments = entryPath.split('/').filter(Boolean);
  return segments.length >= 2 && segments[segments.length - 1] === executableName && segments[segments.length - 2] === 'bin';
}

function findBinary(dir: string, executableName: string): string | null {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = findBinary(fullPath, executableName);
      if (nested) {
        return nested;
      }
    } else if (entry.isFile() && entry.name === executableName && path.basename(dir) === 'bin') {
      return fullPath;
    }
  }
  return null;
}
