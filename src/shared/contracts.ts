export type ReleaseChannel = 'stable' | 'beta' | 'alpha' | 'development';

export const RELEASE_CHANNELS = ['stable', 'beta', 'alpha', 'development'] as const satisfies readonly ReleaseChannel[];

/** Diretorio do canal no feed e no publishDir; o campo `channel` do manifesto mantem o nome completo. */
export const CHANNEL_PATH_SEGMENTS: Record<ReleaseChannel, string> = {
  stable: 'stable',
  beta: 'beta',
  alpha: 'alpha',
  development: 'dev'
};

export interface ReleaseIdentity {
  semanticVersion: string;
  sourceRevision: string;
  buildDate: string;
  targetPlatform: string;
  /** `semanticVersion-sourceRevision-buildDate`; rastreabilidade apenas, nunca usado para ordenar. */
  fullVersion: string;
}

export interface KeyMaterialPaths {
  privateKeyPath: string;
  publicKeyPath: string;
  certificatePath: string;
}

export interface KeyMaterial {
  privateKeyPem: string;
  publicKeyPem: string;
  certificatePem: string;
  paths: KeyMaterialPaths;
  created: boolean;
}

export interface ReleasePackage {
  name: string;
  identity: ReleaseIdentity;
  artifactPath: string;
  signaturePath: string;
  metadataPath: string;
  sizeBytes: number;
  sha256: string;
  signatureBase64: string;
  certificatePem: string;
  createdAt: string;
}

export interface PackageMetadata {
  name: string;
  version: string;
  fullVersion: string;
  gitCommit: string;
  buildDate: string;
  targetPlatform: string;
  packageFile: string;
  signatureFile: string;
  checksum: string;
  size: number;
  createdAt: string;
}

export interface ManifestEntry {
  version: string;
  releaseDate: string;
  changelog: string[];
  downloadUrl: string;
  checksum: string;
  signature: string | null;
  sizeBytes: number;
  minSystemVersion: string | null;
  critical: boolean;
  rollbackAllowed: boolean;
}

export interface ReleaseManifest {
  channel: ReleaseChannel;
  /** Versao do publicador; informativo, clientes comparam contra `latestVersion`. */
  currentVersion: string;
  latestVersion: string;
  lastCheck: string;
  releases: ManifestEntry[];
}

export interface BackupRecord {
  id: string;
  capturedAt: string;
  versionTag: string;
  binaryPath: string;
  sha256: string;
  sizeBytes: number;
}

export type SignaturePolicy = 'required' | 'advisory';

export interface VerificationResult {
  checksumOk: boolean;
  actualChecksum: string;
  signaturePresent: boolean;
  signatureOk: boolean;
  certificateSubject: string | null;
}

export interface InstallationContext {
  binaryPath: string;
  installDir: string;
  executableName: string;
  dataDir: string;
  backupsDir: string;
  downloadsDir: string;
  lockPath: string;
  versionFilePath: string;
}

export type UpdatePhase =
  | 'idle'
  | 'checking'
  | 'update-available'
  | 'downloading'
  | 'verifying'
  | 'backing-up'
  | 'applying'
  | 'verified'
  | 'rolled-back';

export type UpdateOutcome =
  | 'verified'
  | 'rolled_back'
  | 'up_to_date'
  | 'network_failure'
  | 'checksum_mismatch'
  | 'signature_missing'
  | 'signature_invalid'
  | 'incompatible_system'
  | 'lock_contention'
  | 'apply_failed'
  | 'rollback_failed'
  | 'cancelled';

export interface UpdateSession {
  channel: ReleaseChannel;
  installedVersion: string | null;
  candidateEntry: ManifestEntry | null;
  downloadedPath: string | null;
  verified: boolean;
  backup: BackupRecord | null;
  outcome: UpdateOutcome;
  transitions: UpdatePhase[];
  message: string;
}

export interface UpdateCheckReport {
  channel: ReleaseChannel;
  installedVersion: string | null;
  latestVersion: string;
  available: boolean;
  entry: ManifestEntry | null;
}

export interface RollbackResult {
  record: BackupRecord;
  restoredVersion: string | null;
}
