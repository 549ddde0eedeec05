import path from 'node:path';
import { z } from 'zod';
import { isValidVersion } from '@shared/version';
import { loadJsonConfig, resolveFrom } from '@main/services/config/config-file';

const MIN_KEY_BITS = 4096;

const buildSchema = z.object({
  command: z.string().min(1).nullable().default(null),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).nullable().default(null),
  outputPath: z.string().min(1).nullable().default(null),
  timeoutMs: z.number().int().positive().default(30 * 60 * 1000)
});

const releaseConfigSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'name deve ser um identificador de pacote'),
  executableName: z.string().regex(/^[A-Za-z0-9._-]+$/, 'executableName invalido'),
  version: z
    .string()
    .refine(isValidVersion, 'version deve ser semver')
    .nullable()
    .default(null),
  versionFile: z.string().min(1).nullable().default(null),
  sourceDir: z.string().min(1).default('.'),
  workspaceDir: z.string().min(1),
  templatesDir: z.string().min(1).nullable().default(null),
  requiredTools: z.array(z.string().min(1)).default([]),
  build: buildSchema.default({}),
  install: z
    .object({
      installDir: z.string().min(1).default('/opt/fleet-agent'),
      binDir: z.string().min(1).default('/usr/local/bin'),
      configDir: z.string().min(1).default('/etc/fleet-agent')
    })
    .default({}),
  signing: z
    .object({
      keysDir: z.string().min(1).nullable().default(null),
      identity: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/).default('fleet'),
      keyBits: z.number().int().min(MIN_KEY_BITS, `keyBits minimo e ${MIN_KEY_BITS}`).default(MIN_KEY_BITS),
      validityDays: z.number().int().positive().default(3650),
      lockTimeoutMs: z.number().int().positive().default(120_000),
      subject: z
        .object({
          country: z.string().length(2).default('US'),
          state: z.string().min(1).default('State'),
          locality: z.string().min(1).default('City'),
          organization: z.string().min(1).default('Fleet Updater'),
          commonName: z.string().min(1).default('Fleet Update Package')
        })
        .default({})
    })
    .default({}),
  publish: z
    .object({
      baseUrl: z.string().url().default('https://updates.example.invalid'),
      publishDir: z.string().min(1).nullable().default(null),
      minSystemVersion: z.string().refine(isValidVersion, 'minSystemVersion deve ser semver').nullable().default('1.0.0')
    })
    .default({})
});

export type ReleaseBuildConfig = z.output<typeof buildSchema>;
type ParsedReleaseConfig = z.output<typeof releaseConfigSchema>;

/** Configuracao com todos os caminhos ja absolutos. */
export interface ReleaseConfig extends Omit<ParsedReleaseConfig, 'signing' | 'publish'> {
  signing: ParsedReleaseConfig['signing'] & { keysDir: string };
  publish: ParsedReleaseConfig['publish'] & { publishDir: string };
}

export const DEFAULT_RELEASE_CONFIG: z.input<typeof releaseConfigSchema> = {
  name: 'fleet-agent',
  executableName: 'fleet-agent',
  version: null,
  versionFile: 'package.json',
  sourceDir: '.',
  workspaceDir: '.fleet/releases',
  requiredTools: ['git'],
  build: {
    command: null,
    args: [],
    outputPath: null
  },
  publish: {
    baseUrl: 'https://updates.example.invalid',
    publishDir: null
  }
};

export class ReleaseConfigStore {
  private readonly filePath: string;
  private readonly cache: ReleaseConfig;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.cache = resolveReleasePaths(
      loadJsonConfig(this.filePath, releaseConfigSchema, DEFAULT_RELEASE_CONFIG),
      path.dirname(this.filePath)
    );
  }

  get(): ReleaseConfig {
    return this.cache;
  }
}

export function parseReleaseConfig(input: z.input<typeof releaseConfigSchema>, baseDir: string): ReleaseConfig {
  return resolveReleasePaths(releaseConfigSchema.parse(input), baseDir);
}

function resolveReleasePaths(config: ParsedReleaseConfig, baseDir: string): ReleaseConfig {
  const workspaceDir = resolveFrom(baseDir, config.workspaceDir);
  return {
    ...config,
    versionFile: config.versionFile ? resolveFrom(baseDir, config.versionFile) : null,
    sourceDir: resolveFrom(baseDir, config.sourceDir),
    workspaceDir,
    templatesDir: config.templatesDir ? resolveFrom(baseDir, config.templatesDir) : null,
    build: {
      ...config.build,
      cwd: config.build.cwd ? resolveFrom(baseDir, config.build.cwd) : null,
      outputPath: config.build.outputPath ? resolveFrom(baseDir, config.build.outputPath) : null
    },
    signing: {
      ...config.signing,
      keysDir: config.signing.keysDir ? resolveFrom(baseDir, config.signing.keysDir) : path.join(workspaceDir, 'keys')
    },
    publish: {
      ...config.publish,
      publishDir: config.publish.publishDir
        ? resolveFrom(baseDir, config.publish.publishDir)
        : path.join(workspaceDir, 'publish')
    }
  };
}
