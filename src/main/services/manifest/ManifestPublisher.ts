import fs from 'node:fs';
import path from 'node:path';
import { CHANNEL_PATH_SEGMENTS, type ManifestEntry, type ReleaseChannel, type ReleaseManifest, type ReleasePackage } from '@shared/contracts';
import { isSameVersion, maxVersion, sortVersionsDescending } from '@shared/version';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import type { LogSink } from '@main/services/logging/Logger';
import { ManifestValidator } from '@main/services/manifest/ManifestValidator';
import { digestFile } from '@main/services/signing/digest';

interface ManifestPublisherOptions {
  publishDir: string;
  baseUrl: string;
  /** Vai para `currentVersion`; clientes nao usam este campo para decidir. */
  publisherVersion: string;
  logger: LogSink;
  validator?: ManifestValidator;
  now?: () => Date;
}

export interface ManifestEntryOptions {
  changelog?: string[];
  minSystemVersion?: string | null;
  critical?: boolean;
  rollbackAllowed?: boolean;
}

export class ManifestPublisher {
  private readonly publishDir: string;
  private readonly baseUrl: string;
  private readonly publisherVersion: string;
  private readonly logger: LogSink;
  private readonly validator: ManifestValidator;
  private readonly now: () => Date;

  constructor(options: ManifestPublisherOptions) {
    this.publishDir = options.publishDir;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.publisherVersion = options.publisherVersion;
    this.logger = options.logger;
    this.validator = options.validator ?? new ManifestValidator();
    this.now = options.now ?? (() => new Date());
  }

  channelDir(channel: ReleaseChannel): string {
    return path.join(this.publishDir, CHANNEL_PATH_SEGMENTS[channel]);
  }

  manifestPath(channel: ReleaseChannel): string {
    return path.join(this.channelDir(channel), 'manifest.json');
  }

  read(channel: ReleaseChannel): ReleaseManifest | null {
    const filePath = this.manifestPath(channel);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new PipelineError('manifest_invalid', `Manifesto ilegivel em ${filePath}: ${errorReason(error)}`, { cause: error });
    }

    const validated = this.validator.validateText(text);
    if (!validated.ok) {
      throw new PipelineError('manifest_invalid', `Manifesto invalido em ${filePath}: ${validated.error}`);
    }
    if (validated.manifest.channel !== channel) {
      throw new PipelineError(
        'manifest_invalid',
        `Manifesto em ${filePath} declara canal ${validated.manifest.channel}, esperado ${channel}.`
      );
    }
    return validated.manifest;
  }

  publish(channel: ReleaseChannel, entry: ManifestEntry): ReleaseManifest {
    let existing: ReleaseManifest | null;
    try {
      existing = this.read(channel);
    } catch (error) {
      this.logger.error('manifest.publish.error', {
        channel,
        code: 'manifest_invalid',
        reason: errorReason(error)
      });
      throw error;
    }

    const others = (existing?.releases ?? []).filter((item) => !isSameVersion(item.version, entry.version));
    const releases = sortVersionsDescending([...others, entry], (item) => item.version);
    const manifest: ReleaseManifest = {
      channel,
      currentVersion: this.publisherVersion,
      latestVersion: maxVersion(releases.map((item) => item.version)) ?? entry.version,
      lastCheck: this.now().toISOString(),
      releases
    };

    const validated = this.validator.validate(manifest);
    if (!validated.ok) {
      this.logger.error('manifest.publish.error', {
        channel,
        code: 'manifest_invalid',
        reason: validated.error
      });
      throw new PipelineError('manifest_invalid', `Manifesto resultante invalido: ${validated.error}`);
    }

    writeJsonAtomic(this.manifestPath(channel), manifest);
    this.logger.info('manifest.publish.finish', {
      channel,
      version: entry.version,
      latestVersion: manifest.latestVersion,
      releases: manifest.releases.length,
      replaced: others.length !== (existing?.releases.length ?? 0)
    });
    return manifest;
  }

  entryFromPackage(pkg: ReleasePackage, channel: ReleaseChannel, options?: ManifestEntryOptions): ManifestEntry {
    return {
      version: pkg.identity.semanticVersion,
      releaseDate: pkg.createdAt,
      changelog: normalizeChangelog(options?.changelog),
      downloadUrl: `${this.baseUrl}/${CHANNEL_PATH_SEGMENTS[channel]}/${encodeURIComponent(path.basename(pkg.artifactPath))}`,
      checksum: pkg.sha256,
      signature: pkg.signatureBase64,
      sizeBytes: pkg.sizeBytes,
      minSystemVersion: options?.minSystemVersion ?? null,
      critical: options?.critical ?? false,
      rollbackAllowed: options?.rollbackAllowed ?? true
    };
  }

  /** Copia arquivo e `.sig` para o diretorio do canal e publica a entrada. */
  async publishPackage(channel: ReleaseChannel, pkg: ReleasePackage, options?: ManifestEntryOptions): Promise<ReleaseManifest> {
    const targetDir = this.channelDir(channel);
    fs.mkdirSync(targetDir, { recursive: true });

    const artifactTarget = path.join(targetDir, path.basename(pkg.artifactPath));
    if (fs.existsSync(artifactTarget)) {
      const published = await digestFile(artifactTarget, 'sha256');
      if (published !== pkg.sha256.toLowerCase()) {
        const error = new PipelineError('package_exists', `Arquivo diferente ja publicado em ${artifactTarget}.`);
        this.logger.error('manifest.publish.error', {
          channel,
          code: error.code,
          reason: error.message
        });
        throw error;
      }
    } else {
      copyAtomic(pkg.artifactPath, artifactTarget);
    }
    copyAtomic(pkg.signaturePath, path.join(targetDir, path.basename(pkg.signaturePath)));

    return this.publish(channel, this.entryFromPackage(pkg, channel, options));
  }
}

function normalizeChangelog(value: string[] | undefined): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((item) => item.trim()).filter(Boolean);
}

function writeJsonAtomic(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const pending = `${filePath}.tmp-${process.pid}`;
  fs.writeFileSync(pending, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
  fs.renameSync(pending, filePath);
}

function copyAtomic(source: string, target: string): void {
  const pending = `${target}.tmp-${process.pid}`;
  fs.copyFileSync(source, pending);
  fs.renameSync(pending, target);
}
