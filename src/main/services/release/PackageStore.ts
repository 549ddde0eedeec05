import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PackageMetadata, ReleasePackage } from '@shared/contracts';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import { digestFile, type DigestAlgorithm } from '@main/services/signing/digest';

export const ARCHIVE_EXTENSION = '.tar.gz';
export const SIGNATURE_EXTENSION = '.sig';

const CHECKSUM_LISTINGS: Array<{ algorithm: DigestAlgorithm; file: string }> = [
  { algorithm: 'sha256', file: 'checksums.sha256' },
  { algorithm: 'md5', file: 'checksums.md5' }
];

const SUMMARY_FILE = 'RELEASE_SUMMARY.md';

const packageMetadataSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  fullVersion: z.string().min(1),
  gitCommit: z.string().min(1),
  buildDate: z.string().min(1),
  targetPlatform: z.string().min(1),
  packageFile: z.string().min(1),
  signatureFile: z.string().min(1),
  checksum: z.string().regex(/^[a-fA-F0-9]{64}$/),
  size: z.number().int().nonnegative(),
  createdAt: z.string().datetime()
});

export interface PackageCommitInput {
  stagedArchivePath: string;
  signatureBase64: string;
  metadata: PackageMetadata;
}

export interface CommittedPackage {
  artifactPath: string;
  signaturePath: string;
  metadataPath: string;
}

/**
 * Diretorio de pacotes publicados localmente. Um arquivo ja existente nunca e
 * sobrescrito: cada `<name>-<fullVersion>` entra uma unica vez.
 */
export class PackageStore {
  constructor(private readonly rootDir: string) {}

  get dir(): string {
    return this.rootDir;
  }

  archivePath(baseName: string): string {
    return path.join(this.rootDir, `${baseName}${ARCHIVE_EXTENSION}`);
  }

  has(baseName: string): boolean {
    return fs.existsSync(this.archivePath(baseName));
  }

  commit(input: PackageCommitInput): CommittedPackage {
    const baseName = baseNameOf(input.metadata.packageFile);
    const artifactPath = this.archivePath(baseName);
    const signaturePath = `${artifactPath}${SIGNATURE_EXTENSION}`;
    const metadataPath = path.join(this.rootDir, `${baseName}.json`);

    if (fs.existsSync(artifactPath)) {
      throw new PipelineError('package_exists', `Pacote ja existe: ${artifactPath}`);
    }

    fs.mkdirSync(this.rootDir, { recursive: true });
    const pendingSignature = `${signaturePath}.tmp-${process.pid}`;
    const pendingMetadata = `${metadataPath}.tmp-${process.pid}`;

    try {
      fs.writeFileSync(pendingSignature, `${input.signatureBase64}\n`, 'utf-8');
      fs.writeFileSync(pendingMetadata, `${JSON.stringify(input.metadata, null, 2)}\n`, 'utf-8');
      fs.renameSync(input.stagedArchivePath, artifactPath);
      fs.renameSync(pendingSignature, signaturePath);
      fs.renameSync(pendingMetadata, metadataPath);
    } catch (error) {
      fs.rmSync(pendingSignature, { force: true });
      fs.rmSync(pendingMetadata, { force: true });
      throw new PipelineError('build_failure', `Falha ao gravar pacote em ${this.rootDir}: ${errorReason(error)}`, {
        cause: error
      });
    }

    return { artifactPath, signaturePath, metadataPath };
  }

  /** Regrava `checksums.sha256` e `checksums.md5` cobrindo todos os arquivos do pacote. */
  async refreshChecksums(): Promise<void> {
    const files = this.listPackageFiles();
    for (const listing of CHECKSUM_LISTINGS) {
      const lines: string[] = [];
      for (const file of files) {
        lines.push(`${await digestFile(path.join(this.rootDir, file), listing.algorithm)}  ${file}`);
      }
      writeAtomic(path.join(this.rootDir, listing.file), lines.length > 0 ? `${lines.join('\n')}\n` : '');
    }
  }

  writeSummary(metadata: PackageMetadata, signatureSubject: string | null): void {
    const lines = [
      `# ${metadata.name} ${metadata.version}`,
      '',
      `- Versao completa: \`${metadata.fullVersion}\``,
      `- Commit: \`${metadata.gitCommit}\``,
      `- Data de build: ${metadata.buildDate}`,
      `- Plataforma: \`${metadata.targetPlatform}\``,
      `- Pacote: \`${metadata.packageFile}\` (${metadata.size} bytes)`,
      `- SHA256: \`${metadata.checksum}\``,
      `- Assinatura: \`${metadata.signatureFile}\`${signatureSubject ? ` (${signatureSubject})` : ''}`,
      `- Criado em: ${metadata.createdAt}`,
      ''
    ];
    writeAtomic(path.join(this.rootDir, SUMMARY_FILE), lines.join('\n'));
  }

  readMetadata(archivePath: string): PackageMetadata {
    const metadataPath = metadataPathFor(archivePath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(metadataPath, 'utf-8'));
    } catch (error) {
      throw new PipelineError('manifest_invalid', `Metadados ilegiveis em ${metadataPath}: ${errorReason(error)}`, {
        cause: error
      });
    }

    const parsed = packageMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError('manifest_invalid', `Metadados invalidos em ${metadataPath}.`);
    }
    return parsed.data;
  }

  readSignature(archivePath: string): string | null {
    const signaturePath = `${archivePath}${SIGNATURE_EXTENSION}`;
    if (!fs.existsSync(signaturePath)) {
      return null;
    }
    const text = fs.readFileSync(signaturePath, 'utf-8').trim();
    return text || null;
  }

  /** Reconstroi o pacote a partir dos arquivos irmaos `.json` e `.sig`. */
  loadPackage(archivePath: string, certificatePem: string): ReleasePackage {
    const artifactPath = path.resolve(archivePath);
    const metadata = this.readMetadata(artifactPath);
    const signatureBase64 = this.readSignature(artifactPath);
    if (!signatureBase64) {
      throw new PipelineError('signature_missing', `Assinatura ausente para ${artifactPath}.`);
    }

    return {
      name: metadata.name,
      identity: {
        semanticVersion: metadata.version,
        sourceRevision: metadata.gitCommit,
        buildDate: metadata.buildDate,
        targetPlatform: metadata.targetPlatform,
        fullVersion: metadata.fullVersion
      },
      artifactPath,
      signaturePath: `${artifactPath}${SIGNATURE_EXTENSION}`,
      metadataPath: metadataPathFor(artifactPath),
      sizeBytes: metadata.size,
      sha256: metadata.checksum.toLowerCase(),
      signatureBase64,
      certificatePem,
      createdAt: metadata.createdAt
    };
  }

  private listPackageFiles(): string[] {
    if (!fs.existsSync(this.rootDir)) {
      return [];
    }

    return fs
      .readdirSync(this.rootDir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => name.endsWith(ARCHIVE_EXTENSION) || name.endsWith(SIGNATURE_EXTENSION) || isMetadataFile(name))
      .sort();
  }
}

export function metadataPathFor(archivePath: string): string {
  if (archivePath.endsWith('.json')) {
    return archivePath;
  }
  return path.join(path.dirname(archivePath), `${baseNameOf(path.basename(archivePath))}.json`);
}

function baseNameOf(fileName: string): string {
  return fileName.endsWith(ARCHIVE_EXTENSION) ? fileName.slice(0, -ARCHIVE_EXTENSION.length) : fileName;
}

function isMetadataFile(name: string): boolean {
  return name.endsWith('.json') && !name.includes('.tmp-');
}

function writeAtomic(filePath: string, content: string): void {
  const pending = `${filePath}.tmp-${process.pid}`;
  fs.writeFileSync(pending, content, 'utf-8');
  fs.renameSync(pending, filePath);
}
