import path from 'node:path';
import { z } from 'zod';
import { RELEASE_CHANNELS } from '@shared/contracts';
import { isValidVersion } from '@shared/version';
import { loadJsonConfig, resolveFrom } from '@main/services/config/config-file';

const updateClientConfigSchema = z.object({
  channel: z.enum(RELEASE_CHANNELS).default('stable'),
  feedUrl: z.string().url(),
  binaryPath: z.string().min(1),
  dataDir: z.string().min(1),
  trustedCertificates: z.array(z.string().min(1)).default([]),
  signaturePolicy: z.enum(['required', 'advisory']).default('required'),
  sessionTimeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  terminateGraceMs: z.number().int().nonnegative().default(2000),
  maxBackups: z.number().int().min(1).default(5),
  systemVersion: z.string().refine(isValidVersion, 'systemVersion deve ser semver').nullable().default(null),
  pidFile: z.string().min(1).nullable().default(null),
  versionArgs: z.array(z.string()).default(['--version']),
  versionProbeTimeoutMs: z.number().int().positive().default(10_000),
  build: z
    .object({
      command: z.string().min(1).nullable().default(null),
      args: z.array(z.string()).default([]),
      cwd: z.string().min(1).nullable().default(null),
      outputPath: z.string().min(1).nullable().default(null),
      timeoutMs: z.number().int().positive().default(30 * 60 * 1000)
    })
    .default({})
});

export type UpdateClientConfig = z.output<typeof updateClientConfigSchema>;

export const DEFAULT_UPDATE_CLIENT_CONFIG: z.input<typeof updateClientConfigSchema> = {
  channel: 'stable',
  feedUrl: 'https://updates.example.invalid',
  binaryPath: '/opt/fleet-agent/fleet-agent',
  dataDir: '.fleet/client',
  trustedCertificates: [],
  signaturePolicy: 'required'
};

export class UpdateClientConfigStore {
  private readonly filePath: string;
  private readonly cache: UpdateClientConfig;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.cache = resolveClientPaths(
      loadJsonConfig(this.filePath, updateClientConfigSchema, DEFAULT_UPDATE_CLIENT_CONFIG),
      path.dirname(this.filePath)
    );
  }

  get(): UpdateClientConfig {
    return this.cache;
  }
}

export function parseUpdateClientConfig(
  input: z.input<typeof updateClientConfigSchema>,
  baseDir: string
): UpdateClientConfig {
  return resolveClientPaths(updateClientConfigSchema.parse(input), baseDir);
}

function resolveClientPaths(config: UpdateClientConfig, baseDir: string): UpdateClientConfig {
  return {
    ...config,
    binaryPath: resolveFrom(baseDir, config.binaryPath),
    dataDir: resolveFrom(baseDir, config.dataDir),
    trustedCertificates: config.trustedCertificates.map((item) => resolveFrom(baseDir, item)),
    pidFile: config.pidFile ? resolveFrom(baseDir, config.pidFile) : null,
    build: {
      ...config.build,
      cwd: config.build.cwd ? resolveFrom(baseDir, config.build.cwd) : null,
      outputPath: config.build.outputPath ? resolveFrom(baseDir, config.build.outputPath) : null
    }
  };
}
