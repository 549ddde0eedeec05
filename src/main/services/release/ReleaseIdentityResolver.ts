import fs from 'node:fs';
import { z } from 'zod';
import type { ReleaseIdentity } from '@shared/contracts';
import { isValidVersion } from '@shared/version';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import { readCommandOutput } from '@main/services/environment/command-resolution';

interface ReleaseIdentityResolverOptions {
  version: string | null;
  versionFile: string | null;
  sourceDir: string;
  now?: () => Date;
  platform?: NodeJS.Platform;
  arch?: string;
  readRevision?: (sourceDir: string) => string | null;
}

const versionFileSchema = z.object({
  version: z.string().refine(isValidVersion, 'version deve ser semver')
});

const ARCH_NAMES: Partial<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i686',
  arm: 'armv7'
};

const PLATFORM_SUFFIXES: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'unknown-linux-gnu',
  darwin: 'apple-darwin',
  win32: 'pc-windows-msvc',
  freebsd: 'unknown-freebsd'
};

export class ReleaseIdentityResolver {
  private readonly version: string | null;
  private readonly versionFile: string | null;
  private readonly sourceDir: string;
  private readonly now: () => Date;
  private readonly platform: NodeJS.Platform;
  private readonly arch: string;
  private readonly readRevision: (sourceDir: string) => string | null;

  constructor(options: ReleaseIdentityResolverOptions) {
    this.version = options.version;
    this.versionFile = options.versionFile;
    this.sourceDir = options.sourceDir;
    this.now = options.now ?? (() => new Date());
    this.platform = options.platform ?? process.platform;
    this.arch = options.arch ?? process.arch;
    this.readRevision = options.readRevision ?? readGitRevision;
  }

  resolve(): ReleaseIdentity {
    const semanticVersion = this.resolveSemanticVersion();
    const sourceRevision = normalizeRevision(this.readRevision(this.sourceDir));
    const buildDate = this.now().toISOString().slice(0, 10);

    return {
      semanticVersion,
      sourceRevision,
      buildDate,
      targetPlatform: hostTriple(this.platform, this.arch),
      fullVersion: `${semanticVersion}-${sourceRevision}-${buildDate}`
    };
  }

  private resolveSemanticVersion(): string {
    if (this.version) {
      return stripPrefix(this.version);
    }

    if (!this.versionFile) {
      throw new PipelineError('config_invalid', 'Nenhuma versao declarada: defina version ou versionFile.');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.versionFile, 'utf-8'));
    } catch (error) {
      throw new PipelineError('config_invalid', `Arquivo de versao ilegivel ${this.versionFile}: ${errorReason(error)}`, {
        cause: error
      });
    }

    const parsed = versionFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError('config_invalid', `Arquivo de versao sem semver valido: ${this.versionFile}`);
    }

    return stripPrefix(parsed.data.version);
  }
}

export function hostTriple(platform: NodeJS.Platform, arch: string): string {
  const cpu = ARCH_NAMES[arch] ?? arch;
  const suffix = PLATFORM_SUFFIXES[platform] ?? `unknown-${platform}`;
  return `${cpu}-${suffix}`;
}

function readGitRevision(sourceDir: string): string | null {
  return readCommandOutput('git', ['rev-parse', '--short', 'HEAD'], sourceDir);
}

function normalizeRevision(value: string | null): string {
  const normalized = typeof value === 'string' ? value.trim() : '';
  return /^[0-9a-f]{4,40}$/i.test(normalized) ? normalized.toLowerCase() : 'unknown';
}

function stripPrefix(version: string): string {
  return version.trim().replace(/^v/i, '');
}
