export type PipelineErrorCode =
  | 'missing_dependency'
  | 'build_failure'
  | 'signing_failure'
  | 'network_failure'
  | 'checksum_mismatch'
  | 'signature_invalid'
  | 'signature_missing'
  | 'apply_failure'
  | 'no_backup_available'
  | 'lock_contention'
  | 'manifest_invalid'
  | 'config_invalid'
  | 'key_material_unavailable'
  | 'package_exists';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export function isPipelineError(error: unknown, code?: PipelineErrorCode): error is PipelineError {
  return error instanceof PipelineError && (code === undefined || error.code === code);
}

export function errorReason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
