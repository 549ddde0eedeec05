import fs from 'node:fs';
import path from 'node:path';
import type {
  BackupRecord,
  InstallationContext,
  ManifestEntry,
  ReleaseChannel,
  ReleaseManifest,
  RollbackResult,
  SignaturePolicy,
  UpdateCheckReport,
  UpdateOutcome,
  UpdatePhase,
  UpdateSession,
  VerificationResult
} from '@shared/contracts';
import { compareVersions, isNewerVersion, isSameVersion, isValidVersion, sortVersionsDescending } from '@shared/version';
import { BackupManager } from '@main/services/backup/BackupManager';
import { PipelineError, errorReason, isPipelineError } from '@main/services/errors/PipelineError';
import { InstallationLock } from '@main/services/installation/InstallationLock';
import type { LogSink } from '@main/services/logging/Logger';
import { SignatureVerifier } from '@main/services/signing/SignatureVerifier';
import { BinaryInstaller } from '@main/services/update/BinaryInstaller';
import { InstalledVersionStore } from '@main/services/update/InstalledVersionStore';
import type { ProcessTerminator } from '@main/services/update/ProcessTerminator';
import { ReleaseFeedClient, fileNameFromUrl } from '@main/services/update/ReleaseFeedClient';
import type { VersionProbe } from '@main/services/update/VersionProbe';

interface UpdateClientOptions {
  context: InstallationContext;
  feed: ReleaseFeedClient;
  logger: LogSink;
  versionProbe: VersionProbe;
  terminator: ProcessTerminator;
  /** PEMs aceitos; o primeiro que validar a assinatura vence. */
  trustedCertificates: string[];
  signaturePolicy?: SignaturePolicy;
  systemVersion?: string | null;
  sessionTimeoutMs?: number;
  maxBackups?: number;
  verifier?: SignatureVerifier;
  backups?: BackupManager;
  installer?: BinaryInstaller;
  versionStore?: InstalledVersionStore;
  lock?: InstallationLock;
}

type AbortCause = 'timeout' | 'cancelled';

interface SessionResult {
  outcome: UpdateOutcome;
  message: string;
}

interface SessionWorkspace {
  scratchDir: string | null;
}

class SessionHalt extends Error {
  constructor(
    readonly outcome: UpdateOutcome,
    message: string
  ) {
    super(message);
  }
}

export class UpdateClient {
  private readonly context: InstallationContext;
  private readonly feed: ReleaseFeedClient;
  private readonly logger: LogSink;
  private readonly versionProbe: VersionProbe;
  private readonly terminator: ProcessTerminator;
  private readonly trustedCertificates: string[];
  private readonly signaturePolicy: SignaturePolicy;
  private readonly systemVersion: string | null;
  private readonly sessionTimeoutMs: number;
  private readonly verifier: SignatureVerifier;
  private readonly backups: BackupManager;
  private readonly installer: BinaryInstaller;
  private readonly versionStore: InstalledVersionStore;
  private readonly lock: InstallationLock;
  private activeController: AbortController | null = null;

  constructor(options: UpdateClientOptions) {
    const { context, logger } = options;
    this.context = context;
    this.feed = options.feed;
    this.logger = logger;
    this.versionProbe = options.versionProbe;
    this.terminator = options.terminator;
    this.trustedCertificates = options.trustedCertificates.filter((pem) => pem.trim().length > 0);
    this.signaturePolicy = options.signaturePolicy ?? 'required';
    this.systemVersion = options.systemVersion ?? null;
    this.sessionTimeoutMs = Math.max(1, Math.trunc(options.sessionTimeoutMs ?? 5 * 60 * 1000));
    this.verifier = options.verifier ?? new SignatureVerifier(logger);
    this.backups =
      options.backups ??
      new BackupManager({
        backupsDir: context.backupsDir,
        executableName: context.executableName,
        maxBackups: options.maxBackups,
        logger
      });
    this.installer = options.installer ?? new BinaryInstaller({ executableName: context.executableName, logger });
    this.versionStore = options.versionStore ?? new InstalledVersionStore(context.versionFilePath);
    this.lock = options.lock ?? new InstallationLock(context);
  }

  /** Consulta sem efeitos colaterais: nada e baixado nem gravado. */
  async check(channel: ReleaseChannel): Promise<UpdateCheckReport> {
    this.logger.info('update.check.start', { channel, feed: this.feed.manifestUrl(channel) });

    let manifest: ReleaseManifest;
    try {
      manifest = await this.feed.fetchManifest(channel);
    } catch (error) {
      this.logger.error('update.check.error', {
        channel,
        code: isPipelineError(error) ? error.code : 'network_failure',
        reason: errorReason(error)
      });
      throw isPipelineError(error) ? error : new PipelineError('network_failure', errorReason(error), { cause: error });
    }

    const installedVersion = await this.resolveInstalledVersion();
    const available = installedVersion === null || isNewerVersion(manifest.latestVersion, installedVersion);
    const entry = selectCandidate(manifest);
    this.logger.info('update.check.finish', {
      channel,
      installedVersion,
      latestVersion: manifest.latestVersion,
      available
    });

    return {
      channel,
      installedVersion,
      latestVersion: manifest.latestVersion,
      available,
      entry: available ? entry : null
    };
  }

  async update(channel: ReleaseChannel): Promise<UpdateSession> {
    const session: UpdateSession = {
      channel,
      installedVersion: null,
      candidateEntry: null,
      downloadedPath: null,
      verified: false,
      backup: null,
      outcome: 'up_to_date',
      transitions: [],
      message: ''
    };

    const handle = this.lock.tryAcquire(`update:${channel}`);
    if (!handle) {
      const holder = this.lock.holder();
      return this.finish(
        session,
        'lock_contention',
        `Outra sessao de update esta ativa${holder ? ` (pid ${holder.pid})` : ''}.`
      );
    }

    const controller = new AbortController();
    this.activeController = controller;
    const timer = setTimeout(() => controller.abort('timeout' satisfies AbortCause), this.sessionTimeoutMs);
    timer.unref();
    this.logger.info('update.session.start', { channel, binaryPath: this.context.binaryPath });

    const workspace: SessionWorkspace = { scratchDir: null };
    try {
      const result = await this.runSession(session, workspace, controller.signal);
      return this.finish(session, result.outcome, result.message);
    } catch (error) {
      if (error instanceof SessionHalt) {
        return this.finish(session, error.outcome, error.message);
      }
      const outcome = unexpectedFailureOutcome(session.transitions);
      this.logger.error('update.session.error', {
        channel,
        phase: session.transitions[session.transitions.length - 1] ?? null,
        code: outcome,
        reason: errorReason(error)
      });
      return this.finish(session, outcome, errorReason(error));
    } finally {
      clearTimeout(timer);
      this.activeController = null;
      if (workspace.scratchDir) {
        fs.rmSync(workspace.scratchDir, { recursive: true, force: true });
      }
      handle.release();
    }
  }

  /** Restaura o backup mais recente sob o lock da instalacao. */
  async rollback(): Promise<RollbackResult> {
    const handle = this.lock.tryAcquire('rollback');
    if (!handle) {
      throw new PipelineError('lock_contention', `Outra sessao de update esta ativa em ${this.lock.path}.`);
    }

    try {
      const { record } = this.backups.rollback();
      await this.terminator.terminate(this.context.binaryPath);
      this.backups.restore(record, this.context.binaryPath);
      const restoredVersion = await this.versionProbe.probe(this.context.binaryPath);
      if (isValidVersion(record.versionTag)) {
        this.versionStore.set(record.versionTag, this.versionStore.get()?.version ?? null);
      }

      this.logger.info('update.rollback.finish', {
        id: record.id,
        versionTag: record.versionTag,
        restoredVersion
      });
      return { record, restoredVersion };
    } catch (error) {
      this.logger.error('update.rollback.error', {
        code: isPipelineError(error) ? error.code : 'apply_failure',
        reason: errorReason(error)
      });
      throw error;
    } finally {
      handle.release();
    }
  }

  /** Sinaliza a sessao ativa; retorna `false` se nao houver nenhuma. */
  cancel(): boolean {
    if (!this.activeController) {
      return false;
    }
    this.activeController.abort('cancelled' satisfies AbortCause);
    return true;
  }

  private async runSession(session: UpdateSession, workspace: SessionWorkspace, signal: AbortSignal): Promise<SessionResult> {
    this.enter(session, 'checking');
    let manifest: ReleaseManifest;
    try {
      manifest = await this.feed.fetchManifest(session.channel, signal);
    } catch (error) {
      this.logger.error('update.check.error', {
        channel: session.channel,
        code: 'network_failure',
        reason: errorReason(error)
      });
      throw this.haltFor(signal, 'network_failure', `Falha ao obter manifesto: ${errorReason(error)}`);
    }

    session.installedVersion = await this.resolveInstalledVersion();
    if (session.installedVersion !== null && !isNewerVersion(manifest.latestVersion, session.installedVersion)) {
      throw new SessionHalt('up_to_date', `Versao ${session.installedVersion} ja e a mais recente.`);
    }

    const entry = selectCandidate(manifest);
    if (!entry) {
      throw new SessionHalt('network_failure', `Manifesto do canal ${session.channel} nao contem releases.`);
    }
    session.candidateEntry = entry;
    this.enter(session, 'update-available');

    if (entry.minSystemVersion && this.systemVersion && (compareVersions(entry.minSystemVersion, this.systemVersion) ?? 0) > 0) {
      this.logger.warn('update.check.incompatible', {
        version: entry.version,
        minSystemVersion: entry.minSystemVersion,
        systemVersion: this.systemVersion
      });
      throw new SessionHalt(
        'incompatible_system',
        `Versao ${entry.version} exige sistema ${entry.minSystemVersion}; atual ${this.systemVersion}.`
      );
    }
    this.assertNotAborted(signal);

    const scratchDir = path.join(this.context.downloadsDir, sanitizeSegment(entry.version));
    workspace.scratchDir = scratchDir;
    await this.download(session, entry, scratchDir, signal);
    await this.verify(session, entry, scratchDir);
    this.assertNotAborted(signal);

    this.enter(session, 'backing-up');
    session.backup = this.captureBackup(session.installedVersion);

    return this.apply(session, entry, scratchDir, signal);
  }

  private async download(session: UpdateSession, entry: ManifestEntry, scratchDir: string, signal: AbortSignal): Promise<void> {
    this.enter(session, 'downloading');
    const target = path.join(scratchDir, fileNameFromUrl(entry.downloadUrl));
    this.logger.info('update.download.start', { version: entry.version, url: entry.downloadUrl });

    try {
      const result = await this.feed.download(entry.downloadUrl, target, signal);
      session.downloadedPath = result.path;
      this.logger.info('update.download.finish', { version: entry.version, sizeBytes: result.sizeBytes });
    } catch (error) {
      fs.rmSync(scratchDir, { recursive: true, force: true });
      this.logger.error('update.download.error', {
        version: entry.version,
        code: 'network_failure',
        reason: errorReason(error)
      });
      throw this.haltFor(signal, 'network_failure', `Falha no download de ${entry.version}: ${errorReason(error)}`);
    }
  }

  private async verify(session: UpdateSession, entry: ManifestEntry, scratchDir: string): Promise<void> {
    this.enter(session, 'verifying');
    const downloadedPath = session.downloadedPath ?? '';
    const reject = (outcome: UpdateOutcome, message: string): SessionHalt => {
      fs.rmSync(scratchDir, { recursive: true, force: true });
      session.downloadedPath = null;
      this.logger.error('update.verify.error', {
        version: entry.version,
        code: outcome,
        reason: message
      });
      return new SessionHalt(outcome, message);
    };

    let result: VerificationResult;
    try {
      result = await this.verifier.verify({
        artifactPath: downloadedPath,
        expectedChecksum: entry.checksum,
        signatureBase64: entry.signature,
        certificates: this.trustedCertificates
      });
    } catch (error) {
      throw reject('signature_invalid', `Nao foi possivel verificar ${entry.version}: ${errorReason(error)}`);
    }

    if (!result.checksumOk) {
      throw reject('checksum_mismatch', `Checksum de ${entry.version} nao confere (obtido ${result.actualChecksum}).`);
    }

    if (!result.signaturePresent || !result.signatureOk) {
      const outcome: UpdateOutcome = result.signaturePresent ? 'signature_invalid' : 'signature_missing';
      const message = result.signaturePresent
        ? `Assinatura de ${entry.version} nao confere com nenhum certificado confiavel.`
        : `Release ${entry.version} nao possui assinatura.`;
      if (this.signaturePolicy === 'required') {
        throw reject(outcome, message);
      }
      this.logger.warn('update.verify.signature_advisory', {
        version: entry.version,
        code: outcome,
        reason: message
      });
    }

    session.verified = true;
    this.logger.info('update.verify.finish', {
      version: entry.version,
      signatureOk: result.signatureOk,
      certificateSubject: result.certificateSubject
    });
  }

  private captureBackup(installedVersion: string | null): BackupRecord | null {
    if (!fs.existsSync(this.context.binaryPath)) {
      this.logger.warn('update.backup.skipped', {
        binaryPath: this.context.binaryPath,
        reason: 'no_backup_available'
      });
      return null;
    }

    try {
      return this.backups.backup(this.context.binaryPath, installedVersion);
    } catch (error) {
      this.logger.error('update.backup.error', {
        code: 'apply_failed',
        reason: errorReason(error)
      });
      throw new SessionHalt('apply_failed', `Falha ao criar backup: ${errorReason(error)}`);
    }
  }

  private async apply(
    session: UpdateSession,
    entry: ManifestEntry,
    scratchDir: string,
    signal: AbortSignal
  ): Promise<SessionResult> {
    this.enter(session, 'applying');
    const downloadedPath = session.downloadedPath ?? '';
    this.logger.info('update.apply.start', { version: entry.version, binaryPath: this.context.binaryPath });

    let failure: string;
    try {
      const extracted = await this.installer.extract(downloadedPath, path.join(scratchDir, 'extract'));
      this.assertNotAborted(signal);
      await this.terminator.terminate(this.context.binaryPath, signal);
      this.assertNotAborted(signal);
      this.installer.install(extracted, this.context.binaryPath);

      const reported = await this.versionProbe.probe(this.context.binaryPath);
      this.assertNotAborted(signal);
      if (reported !== null && isSameVersion(reported, entry.version)) {
        this.versionStore.set(entry.version, session.installedVersion);
        this.enter(session, 'verified');
        this.logger.info('update.apply.finish', { version: entry.version, reported });
        return { outcome: 'verified', message: `Versao ${entry.version} instalada e verificada.` };
      }
      failure = `binario reportou ${reported ?? 'nenhuma versao'}, esperado ${entry.version}`;
    } catch (error) {
      failure = errorReason(error);
    }

    this.logger.error('update.apply.error', {
      version: entry.version,
      code: 'apply_failure',
      reason: failure
    });
    return this.recover(session, failure);
  }

  /** Volta ao ultimo estado bom: backup restaurado, ou binario removido numa primeira instalacao. */
  private async recover(session: UpdateSession, failure: string): Promise<SessionResult> {
    const backup = session.backup;
    if (!backup) {
      this.installer.remove(this.context.binaryPath);
      return {
        outcome: 'apply_failed',
        message: `Falha ao aplicar (${failure}); sem backup, binario removido.`
      };
    }

    let written: string;
    let reported: string | null;
    try {
      written = this.backups.restore(backup, this.context.binaryPath);
      reported = await this.versionProbe.probe(this.context.binaryPath);
    } catch (error) {
      this.logger.error('update.rollback.error', {
        id: backup.id,
        code: 'rollback_failed',
        reason: errorReason(error)
      });
      return { outcome: 'rollback_failed', message: `Rollback falhou: ${errorReason(error)}` };
    }

    const versionOk = !isValidVersion(backup.versionTag) || (reported !== null && isSameVersion(reported, backup.versionTag));
    if (written !== backup.sha256 || !versionOk) {
      this.logger.error('update.rollback.error', {
        id: backup.id,
        code: 'rollback_failed',
        reason: `versao restaurada reportou ${reported ?? 'nada'}`
      });
      return { outcome: 'rollback_failed', message: `Rollback para ${backup.versionTag} nao confirmou a versao.` };
    }

    this.enter(session, 'rolled-back');
    this.logger.warn('update.rollback.finish', {
      id: backup.id,
      versionTag: backup.versionTag,
      reported
    });
    return {
      outcome: 'rolled_back',
      message: `Falha ao aplicar (${failure}); restaurado ${backup.versionTag}.`
    };
  }

  private async resolveInstalledVersion(): Promise<string | null> {
    if (!fs.existsSync(this.context.binaryPath)) {
      return null;
    }

    const reported = await this.versionProbe.probe(this.context.binaryPath);
    if (reported) {
      return reported;
    }
    return this.versionStore.get()?.version ?? null;
  }

  private enter(session: UpdateSession, phase: UpdatePhase): void {
    session.transitions.push(phase);
    this.logger.debug('update.phase', { channel: session.channel, phase });
  }

  private finish(session: UpdateSession, outcome: UpdateOutcome, message: string): UpdateSession {
    session.outcome = outcome;
    session.message = message;
    session.transitions.push('idle');
    this.logger.info('update.session.finish', {
      channel: session.channel,
      outcome,
      installedVersion: session.installedVersion,
      candidateVersion: session.candidateEntry?.version ?? null,
      transitions: session.transitions
    });
    return session;
  }

  private assertNotAborted(signal: AbortSignal): void {
    if (signal.aborted) {
      throw this.haltFor(signal, 'network_failure', 'Sessao interrompida.');
    }
  }

  private haltFor(signal: AbortSignal, fallback: UpdateOutcome, message: string): SessionHalt {
    if (!signal.aborted) {
      return new SessionHalt(fallback, message);
    }
    return signal.reason === 'cancelled'
      ? new SessionHalt('cancelled', 'Sessao cancelada.')
      : new SessionHalt('network_failure', `Sessao excedeu ${this.sessionTimeoutMs}ms.`);
  }
}

/** Release cuja versao e `latestVersion`; na falta dela, a maior versao semantica. */
export function selectCandidate(manifest: ReleaseManifest): ManifestEntry | null {
  const exact = manifest.releases.find((item) => isSameVersion(item.version, manifest.latestVersion));
  if (exact) {
    return exact;
  }
  return sortVersionsDescending(manifest.releases, (item) => item.version)[0] ?? null;
}

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

/** Falha inesperada: o resultado acompanha a etapa em que a sessao estava. */
function unexpectedFailureOutcome(transitions: UpdatePhase[]): UpdateOutcome {
  switch (transitions[transitions.length - 1]) {
    case 'checking':
    case 'update-available':
    case 'downloading':
      return 'network_failure';
    case 'verifying':
      return 'signature_invalid';
    default:
      return 'apply_failed';
  }
}
