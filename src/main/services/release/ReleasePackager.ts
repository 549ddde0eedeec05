import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { create as createTar } from 'tar';
import type { PackageMetadata, ReleasePackage, VerificationResult } from '@shared/contracts';
import type { ReleaseConfig } from '@main/services/config/ReleaseConfigStore';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import { assertCommandsAvailable, type CommandResolver } from '@main/services/environment/command-resolution';
import type { LogSink } from '@main/services/logging/Logger';
import { ArtifactTreeBuilder } from '@main/services/release/ArtifactTreeBuilder';
import { CommandBuildRunner } from '@main/services/release/CommandBuildRunner';
import { ARCHIVE_EXTENSION, PackageStore, SIGNATURE_EXTENSION, type CommittedPackage } from '@main/services/release/PackageStore';
import { ReleaseIdentityResolver } from '@main/services/release/ReleaseIdentityResolver';
import { KeyManager } from '@main/services/signing/KeyManager';
import { signArtifact, verifyArtifactSignature } from '@main/services/signing/PackageSigner';
import { SignatureVerifier } from '@main/services/signing/SignatureVerifier';
import { digestBuffer } from '@main/services/signing/digest';

interface ReleasePackagerOptions {
  config: ReleaseConfig;
  logger: LogSink;
  keyManager?: KeyManager;
  identityResolver?: ReleaseIdentityResolver;
  buildRunner?: CommandBuildRunner;
  treeBuilder?: ArtifactTreeBuilder;
  store?: PackageStore;
  verifier?: SignatureVerifier;
  commandResolver?: CommandResolver;
  signFn?: (bytes: Buffer, privateKeyPem: string) => string;
  now?: () => Date;
}

export interface CleanResult {
  removed: string[];
}

export class ReleasePackager {
  private readonly config: ReleaseConfig;
  private readonly logger: LogSink;
  private readonly keyManager: KeyManager;
  private readonly identityResolver: ReleaseIdentityResolver;
  private readonly buildRunner: CommandBuildRunner;
  private readonly treeBuilder: ArtifactTreeBuilder;
  private readonly store: PackageStore;
  private readonly verifier: SignatureVerifier;
  private readonly commandResolver: CommandResolver | undefined;
  private readonly signFn: (bytes: Buffer, privateKeyPem: string) => string;
  private readonly now: () => Date;

  constructor(options: ReleasePackagerOptions) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.keyManager =
      options.keyManager ??
      new KeyManager({
        keysDir: config.signing.keysDir,
        identity: config.signing.identity,
        keyBits: config.signing.keyBits,
        validityDays: config.signing.validityDays,
        subject: config.signing.subject,
        lockTimeoutMs: config.signing.lockTimeoutMs,
        logger
      });
    this.identityResolver =
      options.identityResolver ??
      new ReleaseIdentityResolver({
        version: config.version,
        versionFile: config.versionFile,
        sourceDir: config.sourceDir
      });
    this.buildRunner = options.buildRunner ?? new CommandBuildRunner({ logger });
    this.treeBuilder = options.treeBuilder ?? new ArtifactTreeBuilder(config.templatesDir);
    this.store = options.store ?? new PackageStore(path.join(config.workspaceDir, 'packages'));
    this.verifier = options.verifier ?? new SignatureVerifier(logger);
    this.commandResolver = options.commandResolver;
    this.signFn = options.signFn ?? signArtifact;
    this.now = options.now ?? (() => new Date());
  }

  get packagesDir(): string {
    return this.store.dir;
  }

  private get buildDir(): string {
    return path.join(this.config.workspaceDir, 'build');
  }

  private get stagingDir(): string {
    return path.join(this.config.workspaceDir, 'staging');
  }

  /** Verifica ferramentas externas antes de qualquer escrita em disco. */
  preflight(sourceArtifact?: string): void {
    const tools = [...this.config.requiredTools];
    if (!sourceArtifact && this.config.build.command) {
      tools.push(this.config.build.command);
    }
    assertCommandsAvailable(tools, this.commandResolver);

    if (sourceArtifact && !fs.existsSync(sourceArtifact)) {
      throw new PipelineError('build_failure', `Binario informado nao existe: ${sourceArtifact}`);
    }
  }

  async buildRelease(sourceArtifact?: string): Promise<ReleasePackage> {
    try {
      this.preflight(sourceArtifact);
    } catch (error) {
      this.logFailure('release.preflight.error', error);
      throw error;
    }

    const identity = this.identityResolver.resolve();
    const baseName = `${this.config.name}-${identity.fullVersion}`;
    this.logger.info('release.create.start', {
      name: this.config.name,
      fullVersion: identity.fullVersion,
      targetPlatform: identity.targetPlatform
    });

    if (this.store.has(baseName)) {
      const error = new PipelineError('package_exists', `Pacote ja existe: ${this.store.archivePath(baseName)}`);
      this.logFailure('release.create.error', error);
      throw error;
    }

    const binaryPath = sourceArtifact ? path.resolve(sourceArtifact) : await this.buildRunner.run(this.config.build, this.config.sourceDir);

    const treeDir = this.treeBuilder.build(this.buildDir, {
      name: this.config.name,
      executableName: this.config.executableName,
      identity,
      binaryPath,
      install: this.config.install
    });

    fs.mkdirSync(this.stagingDir, { recursive: true });
    const archiveFile = `${baseName}${ARCHIVE_EXTENSION}`;
    const stagedArchivePath = path.join(this.stagingDir, archiveFile);
    fs.rmSync(stagedArchivePath, { force: true });

    try {
      await createTar({ gzip: true, portable: true, file: stagedArchivePath, cwd: this.buildDir }, [path.basename(treeDir)]);
    } catch (error) {
      fs.rmSync(stagedArchivePath, { force: true });
      const wrapped = new PipelineError('build_failure', `Falha ao criar arquivo ${archiveFile}: ${errorReason(error)}`, {
        cause: error
      });
      this.logFailure('release.archive.error', wrapped);
      throw wrapped;
    } finally {
      fs.rmSync(treeDir, { recursive: true, force: true });
    }

    const signed = await this.signStaged(stagedArchivePath);
    const createdAt = this.now().toISOString();
    const metadata: PackageMetadata = {
      name: this.config.name,
      version: identity.semanticVersion,
      fullVersion: identity.fullVersion,
      gitCommit: identity.sourceRevision,
      buildDate: identity.buildDate,
      targetPlatform: identity.targetPlatform,
      packageFile: archiveFile,
      signatureFile: `${archiveFile}${SIGNATURE_EXTENSION}`,
      checksum: signed.sha256,
      size: signed.sizeBytes,
      createdAt
    };

    let committed: CommittedPackage;
    try {
      committed = this.store.commit({
        stagedArchivePath,
        signatureBase64: signed.signatureBase64,
        metadata
      });
    } catch (error) {
      fs.rmSync(stagedArchivePath, { force: true });
      this.logFailure('release.commit.error', error);
      throw error;
    }

    await this.store.refreshChecksums();
    this.store.writeSummary(metadata, signed.certificateSubject);

    this.logger.info('release.create.finish', {
      artifactPath: committed.artifactPath,
      sha256: signed.sha256,
      sizeBytes: signed.sizeBytes
    });

    return {
      name: this.config.name,
      identity,
      artifactPath: committed.artifactPath,
      signaturePath: committed.signaturePath,
      metadataPath: committed.metadataPath,
      sizeBytes: signed.sizeBytes,
      sha256: signed.sha256,
      signatureBase64: signed.signatureBase64,
      certificatePem: signed.certificatePem,
      createdAt
    };
  }

  /** Remove diretorios de trabalho; chaves nunca sao tocadas. */
  clean(options?: { packages?: boolean }): CleanResult {
    const targets = [this.buildDir, this.stagingDir];
    if (options?.packages) {
      targets.push(this.packagesDir);
    }

    const removed: string[] = [];
    for (const target of targets) {
      if (!fs.existsSync(target)) {
        continue;
      }
      fs.rmSync(target, { recursive: true, force: true });
      removed.push(target);
    }

    this.logger.info('release.clean.finish', { removed });
    return { removed };
  }

  /** Aceita o `.tar.gz` ou o `.json` de metadados ao lado dele. */
  loadPackage(packagePath: string): ReleasePackage {
    const resolved = path.resolve(packagePath);
    const archivePath = resolved.endsWith('.json')
      ? path.join(path.dirname(resolved), this.store.readMetadata(resolved).packageFile)
      : resolved;
    return this.store.loadPackage(archivePath, this.keyManager.readCertificate());
  }

  async verifyPackage(archivePath: string): Promise<VerificationResult> {
    const resolved = path.resolve(archivePath);
    const metadata = this.store.readMetadata(resolved);
    const result = await this.verifier.verify({
      artifactPath: resolved,
      expectedChecksum: metadata.checksum,
      signatureBase64: this.store.readSignature(resolved),
      certificates: [this.keyManager.readCertificate()]
    });

    const meta = {
      artifactPath: resolved,
      checksumOk: result.checksumOk,
      signatureOk: result.signatureOk
    };
    if (result.checksumOk && result.signatureOk) {
      this.logger.info('release.verify.finish', meta);
    } else {
      this.logger.warn('release.verify.failed', meta);
    }
    return result;
  }

  private async signStaged(stagedArchivePath: string): Promise<{
    signatureBase64: string;
    certificatePem: string;
    certificateSubject: string | null;
    sha256: string;
    sizeBytes: number;
  }> {
    this.logger.info('release.sign.start', { artifactPath: stagedArchivePath });

    try {
      const material = await this.keyManager.ensureKeyMaterial();
      const bytes = fs.readFileSync(stagedArchivePath);
      const signatureBase64 = this.signFn(bytes, material.privateKeyPem);
      if (!verifyArtifactSignature(bytes, signatureBase64, material.certificatePem)) {
        throw new Error('assinatura gerada nao confere com o certificado');
      }

      const sha256 = digestBuffer(bytes, 'sha256');
      this.logger.info('release.sign.finish', {
        artifactPath: stagedArchivePath,
        sha256,
        certificatePath: material.paths.certificatePath
      });
      return {
        signatureBase64,
        certificatePem: material.certificatePem,
        certificateSubject: certificateSubjectOf(material.certificatePem),
        sha256,
        sizeBytes: bytes.length
      };
    } catch (error) {
      fs.rmSync(stagedArchivePath, { force: true });
      const wrapped = new PipelineError('signing_failure', `Falha ao assinar pacote: ${errorReason(error)}`, { cause: error });
      this.logFailure('release.sign.error', wrapped);
      throw wrapped;
    }
  }

  private logFailure(event: string, error: unknown): void {
    this.logger.error(event, {
      code: error instanceof PipelineError ? error.code : 'unknown',
      reason: errorReason(error)
    });
  }
}

function certificateSubjectOf(pem: string): string | null {
  try {
    return new crypto.X509Certificate(pem).subject.replace(/\n/g, ', ');
  } catch {
    return null;
  }
}
