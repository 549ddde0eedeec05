import { z } from 'zod';
import { RELEASE_CHANNELS, type ReleaseManifest } from '@shared/contracts';
import { isValidVersion } from '@shared/version';

const semver = z.string().refine(isValidVersion, 'deve ser uma versao semver');

const manifestEntrySchema = z.object({
  version: semver,
  releaseDate: z.string().datetime(),
  changelog: z.array(z.string()),
  downloadUrl: z.string().url(),
  checksum: z.string().regex(/^[a-fA-F0-9]{64}$/, 'checksum deve ser um SHA256 hex de 64 caracteres'),
  signature: z.string().min(1).nullable(),
  sizeBytes: z.number().int().nonnegative(),
  minSystemVersion: semver.nullable(),
  critical: z.boolean(),
  rollbackAllowed: z.boolean()
});

const manifestSchema = z.object({
  channel: z.enum(RELEASE_CHANNELS),
  currentVersion: semver,
  latestVersion: semver,
  lastCheck: z.string().datetime(),
  releases: z.array(manifestEntrySchema)
});

export type ManifestValidation = { ok: true; manifest: ReleaseManifest } | { ok: false; error: string };

export class ManifestValidator {
  validate(input: unknown): ManifestValidation {
    const parsed = manifestSchema.safeParse(input);
    if (!parsed.success) {
      return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      };
    }

    return {
      ok: true,
      manifest: parsed.data
    };
  }

  /** Aceita texto cru vindo de disco ou da rede. */
  validateText(text: string): ManifestValidation {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return {
        ok: false,
        error: `JSON invalido: ${error instanceof Error ? error.message : String(error)}`
      };
    }
    return this.validate(raw);
  }
}
