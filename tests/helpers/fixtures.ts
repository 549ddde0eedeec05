import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { vi } from 'vitest';
import type { LogSink } from '@main/services/logging/Logger';
import { parseReleaseConfig } from '@main/services/config/ReleaseConfigStore';
import { ReleasePackager } from '@main/services/release/ReleasePackager';
import { ReleaseIdentityResolver } from '@main/services/release/ReleaseIdentityResolver';
import { KeyManager, type GeneratedKeyPair } from '@main/services/signing/KeyManager';
import type { ProcessTerminator, TerminationReport } from '@main/services/update/ProcessTerminator';
import type { VersionProbe } from '@main/services/update/VersionProbe';
import { extractVersion } from '@shared/version';

const keyPairs = new Map<string, GeneratedKeyPair>();

/** Par RSA gerado uma vez por arquivo de teste e reutilizado; `slot` distingue pares do mesmo tamanho. */
export function testKeyPair(bits = 2048, slot = 'primary'): GeneratedKeyPair {
  const key = `${bits}:${slot}`;
  const cached = keyPairs.get(key);
  if (cached) {
    return cached;
  }

  const { privateKey, publicKey } = crypto.generateKeyPairSync('rsa', {
    modulusLength: bits,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  });
  const pair = { privateKeyPem: privateKey, publicKeyPem: publicKey };
  keyPairs.set(key, pair);
  return pair;
}

export function makeTempDir(tempDirs: string[], prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `fleet-${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies LogSink;
}

export function createTestKeyManager(keysDir: string, logger: LogSink, pair: GeneratedKeyPair = testKeyPair()): KeyManager {
  return new KeyManager({
    keysDir,
    identity: 'fleet',
    keyBits: 4096,
    validityDays: 30,
    subject: {
      country: 'BR',
      state: 'SP',
      locality: 'Campinas',
      organization: 'Fleet Tests',
      commonName: 'Fleet Test Signing'
    },
    logger,
    generateKeyPair: async () => pair
  });
}

/** Binario falso: um script cuja saida contem a versao. */
export function fakeBinaryContent(version: string): string {
  return `#!/bin/sh\necho "fleet-agent ${version}"\n`;
}

export function writeFakeBinary(filePath: string, version: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, fakeBinaryContent(version), { mode: 0o755 });
}

/** Le a versao do proprio conteudo do arquivo em vez de executa-lo. */
export class FileContentVersionProbe implements VersionProbe {
  readonly calls: string[] = [];

  async probe(binaryPath: string): Promise<string | null> {
    this.calls.push(binaryPath);
    if (!fs.existsSync(binaryPath)) {
      return null;
    }
    return extractVersion(fs.readFileSync(binaryPath, 'utf-8'));
  }
}

export class RecordingTerminator implements ProcessTerminator {
  readonly calls: string[] = [];

  async terminate(binaryPath: string): Promise<TerminationReport> {
    this.calls.push(binaryPath);
    return { pids: [], killed: [] };
  }
}

export interface ReleaseWorkspace {
  rootDir: string;
  workspaceDir: string;
  publishDir: string;
  baseUrl: string;
  keyManager: KeyManager;
  logger: LogSink;
}

export function createReleaseWorkspace(rootDir: string): ReleaseWorkspace {
  const workspaceDir = path.join(rootDir, 'releases');
  const publishDir = path.join(rootDir, 'publish');
  const logger = mockLogger();
  return {
    rootDir,
    workspaceDir,
    publishDir,
    baseUrl: pathToFileURL(publishDir).href,
    keyManager: createTestKeyManager(path.join(workspaceDir, 'keys'), logger),
    logger
  };
}

type ReleaseConfigInput = Parameters<typeof parseReleaseConfig>[0];
type ReleasePackagerOptions = ConstructorParameters<typeof ReleasePackager>[0];

export interface TestPackagerOverrides {
  config?: Partial<ReleaseConfigInput>;
  packager?: Partial<ReleasePackagerOptions>;
}

export function createTestPackager(
  workspace: ReleaseWorkspace,
  version: string,
  overrides: TestPackagerOverrides = {}
): ReleasePackager {
  const config = parseReleaseConfig(
    {
      name: 'fleet-agent',
      executableName: 'fleet-agent',
      version,
      workspaceDir: workspace.workspaceDir,
      requiredTools: [],
      publish: { baseUrl: workspace.baseUrl, publishDir: workspace.publishDir },
      ...overrides.config
    },
    workspace.rootDir
  );

  return new ReleasePackager({
    config,
    logger: workspace.logger,
    keyManager: workspace.keyManager,
    identityResolver: new ReleaseIdentityResolver({
      version,
      versionFile: null,
      sourceDir: workspace.rootDir,
      now: () => new Date('2026-03-14T10:00:00.000Z'),
      platform: 'linux',
      arch: 'x64',
      readRevision: () => 'abc1234'
    }),
    now: () => new Date('2026-03-14T10:00:00.000Z'),
    ...overrides.packager
  });
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('nenhum erro lancado');
}
