import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { extract } from 'tar';
import { afterEach, describe, expect, it } from 'vitest';
import type { ReleaseBuildConfig } from '@main/services/config/ReleaseConfigStore';
import { CommandBuildRunner } from '@main/services/release/CommandBuildRunner';
import { SignatureVerifier } from '@main/services/signing/SignatureVerifier';
import {
  createReleaseWorkspace,
  createTestPackager,
  makeTempDir,
  mockLogger,
  writeFakeBinary,
  type ReleaseWorkspace
} from './helpers/fixtures';

const tempDirs: string[] = [];
const BASE_NAME = 'fleet-agent-1.1.0-abc1234-2026-03-14';

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ReleasePackager', () => {
  it('gera pacote assinado com metadados, checksums e resumo', async () => {
    const workspace = setup();
    const source = sourceBinary(workspace, '1.1.0');

    const pkg = await createTestPackager(workspace, '1.1.0').buildRelease(source);

    const packagesDir = path.join(workspace.workspaceDir, 'packages');
    expect(pkg.artifactPath).toBe(path.join(packagesDir, `${BASE_NAME}.tar.gz`));
    expect(pkg.signaturePath).toBe(path.join(packagesDir, `${BASE_NAME}.tar.gz.sig`));
    expect(pkg.metadataPath).toBe(path.join(packagesDir, `${BASE_NAME}.json`));
    expect(pkg.identity).toEqual({
      semanticVersion: '1.1.0',
      sourceRevision: 'abc1234',
      buildDate: '2026-03-14',
      targetPlatform: 'x86_64-unknown-linux-gnu',
      fullVersion: '1.1.0-abc1234-2026-03-14'
    });

    const archive = fs.readFileSync(pkg.artifactPath);
    expect(pkg.sha256).toBe(sha256(archive));
    expect(pkg.sizeBytes).toBe(archive.length);
    expect(fs.readFileSync(pkg.signaturePath, 'utf-8')).toBe(`${pkg.signatureBase64}\n`);
    expect(JSON.parse(fs.readFileSync(pkg.metadataPath, 'utf-8'))).toEqual({
      name: 'fleet-agent',
      version: '1.1.0',
      fullVersion: '1.1.0-abc1234-2026-03-14',
      gitCommit: 'abc1234',
      buildDate: '2026-03-14',
      targetPlatform: 'x86_64-unknown-linux-gnu',
      packageFile: `${BASE_NAME}.tar.gz`,
      signatureFile: `${BASE_NAME}.tar.gz.sig`,
      checksum: pkg.sha256,
      size: archive.length,
      createdAt: '2026-03-14T10:00:00.000Z'
    });

    const files = [`${BASE_NAME}.json`, `${BASE_NAME}.tar.gz`, `${BASE_NAME}.tar.gz.sig`];
    expect(fs.readFileSync(path.join(packagesDir, 'checksums.sha256'), 'utf-8')).toBe(
      files.map((file) => `${sha256(fs.readFileSync(path.join(packagesDir, file)))}  ${file}`).join('\n') + '\n'
    );
    expect(fs.readFileSync(path.join(packagesDir, 'checksums.md5'), 'utf-8').split('\n')[1]).toBe(
      `${crypto.createHash('md5').update(archive).digest('hex')}  ${BASE_NAME}.tar.gz`
    );

    const summary = fs.readFileSync(path.join(packagesDir, 'RELEASE_SUMMARY.md'), 'utf-8').split('\n');
    expect(summary[0]).toBe('# fleet-agent 1.1.0');
    expect(summary).toContain(`- SHA256: \`${pkg.sha256}\``);
    expect(summary).toContain(
      `- Assinatura: \`${BASE_NAME}.tar.gz.sig\` (C=BR, ST=SP, L=Campinas, O=Fleet Tests, CN=Fleet Test Signing)`
    );

    expect(fs.readdirSync(path.join(workspace.workspaceDir, 'staging'))).toEqual([]);
    expect(fs.readdirSync(path.join(workspace.workspaceDir, 'build'))).toEqual([]);
  });

  it('arquivo contem binario, config, scripts e docs renderizados', async () => {
    const workspace = setup();
    const pkg = await createTestPackager(workspace, '1.1.0').buildRelease(sourceBinary(workspace, '1.1.0'));
    const target = makeTempDir(tempDirs, 'release-extract');

    await extract({ file: pkg.artifactPath, cwd: target });

    const root = path.join(target, BASE_NAME);
    expect(fs.readFileSync(path.join(root, 'bin', 'fleet-agent'), 'utf-8')).toContain('fleet-agent 1.1.0');
    expect(fs.statSync(path.join(root, 'bin', 'fleet-agent')).mode & 0o111).not.toBe(0);
    expect(fs.statSync(path.join(root, 'scripts', 'install.sh')).mode & 0o111).not.toBe(0);
    expect(fs.existsSync(path.join(root, 'scripts', 'uninstall.sh'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'docs', 'README.md'))).toBe(true);

    const toml = fs.readFileSync(path.join(root, 'config', 'default.toml'), 'utf-8');
    expect(toml.split('\n')[0]).toBe('# fleet-agent 1.1.0-abc1234-2026-03-14');
    expect(toml).toContain('version = "1.1.0"');
    expect(toml).not.toContain('{{');
  });

  it('assinatura confere com o certificado do key manager', async () => {
    const workspace = setup();
    const pkg = await createTestPackager(workspace, '1.1.0').buildRelease(sourceBinary(workspace, '1.1.0'));

    const result = await new SignatureVerifier().verify({
      artifactPath: pkg.artifactPath,
      expectedChecksum: pkg.sha256,
      signatureBase64: pkg.signatureBase64,
      certificates: [workspace.keyManager.readCertificate()]
    });

    expect(result.checksumOk).toBe(true);
    expect(result.signatureOk).toBe(true);
    expect(pkg.certificatePem).toBe(workspace.keyManager.readCertificate());
  });

  it('recusa gerar de novo o mesmo pacote', async () => {
    const workspace = setup();
    const source = sourceBinary(workspace, '1.1.0');
    const first = await createTestPackager(workspace, '1.1.0').buildRelease(source);

    await expect(createTestPackager(workspace, '1.1.0').buildRelease(source)).rejects.toMatchObject({
      code: 'package_exists'
    });
    expect(sha256(fs.readFileSync(first.artifactPath))).toBe(first.sha256);
  });

  it('aborta no preflight quando falta ferramenta, sem escrever nada', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0', {
      config: { requiredTools: ['git'] },
      packager: { commandResolver: () => ({ found: false, path: null }) }
    });

    await expect(packager.buildRelease(sourceBinary(workspace, '1.1.0'))).rejects.toMatchObject({
      code: 'missing_dependency',
      message: 'Dependencia ausente: git'
    });
    expect(fs.existsSync(workspace.workspaceDir)).toBe(false);
  });

  it('falha com build_failure quando o binario informado nao existe', async () => {
    const workspace = setup();

    await expect(
      createTestPackager(workspace, '1.1.0').buildRelease(path.join(workspace.rootDir, 'inexistente'))
    ).rejects.toMatchObject({ code: 'build_failure' });
  });

  it('usa o comando de build quando nenhum binario e informado', async () => {
    const workspace = setup();
    const built = sourceBinary(workspace, '1.1.0');
    const runner = new StubBuildRunner(built);
    const packager = createTestPackager(workspace, '1.1.0', {
      config: { build: { command: 'make', args: ['release'], outputPath: built } },
      packager: {
        buildRunner: runner,
        commandResolver: () => ({ found: true, path: '/usr/bin/make' })
      }
    });

    const pkg = await packager.buildRelease();

    expect(runner.calls).toEqual([{ command: 'make', args: ['release'] }]);
    expect(fs.existsSync(pkg.artifactPath)).toBe(true);
  });

  it('falha de assinatura nao deixa arquivo parcial', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0', {
      packager: {
        signFn: () => {
          throw new Error('token de assinatura indisponivel');
        }
      }
    });

    await expect(packager.buildRelease(sourceBinary(workspace, '1.1.0'))).rejects.toMatchObject({
      code: 'signing_failure'
    });
    expect(fs.readdirSync(path.join(workspace.workspaceDir, 'staging'))).toEqual([]);
    expect(fs.existsSync(path.join(workspace.workspaceDir, 'packages', `${BASE_NAME}.tar.gz`))).toBe(false);
    expect(workspace.logger.error).toHaveBeenCalledWith(
      'release.sign.error',
      expect.objectContaining({ code: 'signing_failure' })
    );
  });

  it('rejeita assinatura que nao confere com o certificado', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0', {
      packager: { signFn: () => Buffer.from('assinatura-falsa').toString('base64') }
    });

    await expect(packager.buildRelease(sourceBinary(workspace, '1.1.0'))).rejects.toMatchObject({
      code: 'signing_failure'
    });
    expect(fs.existsSync(path.join(workspace.workspaceDir, 'packages'))).toBe(false);
  });

  it('verifyPackage detecta arquivo adulterado', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0');
    const pkg = await packager.buildRelease(sourceBinary(workspace, '1.1.0'));

    const intact = await packager.verifyPackage(pkg.artifactPath);
    expect(intact).toMatchObject({ checksumOk: true, signaturePresent: true, signatureOk: true });
    expect(intact.certificateSubject).toContain('CN=Fleet Test Signing');

    fs.appendFileSync(pkg.artifactPath, 'x');
    const tampered = await packager.verifyPackage(pkg.artifactPath);
    expect(tampered.checksumOk).toBe(false);
    expect(tampered.signatureOk).toBe(false);
    expect(workspace.logger.warn).toHaveBeenCalledWith(
      'release.verify.failed',
      expect.objectContaining({ checksumOk: false, signatureOk: false })
    );
  });

  it('loadPackage aceita o json de metadados', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0');
    const pkg = await packager.buildRelease(sourceBinary(workspace, '1.1.0'));

    const loaded = packager.loadPackage(pkg.metadataPath);

    expect(loaded.artifactPath).toBe(pkg.artifactPath);
    expect(loaded.sha256).toBe(pkg.sha256);
    expect(loaded.signatureBase64).toBe(pkg.signatureBase64);
    expect(loaded.identity).toEqual(pkg.identity);
  });

  it('clean remove diretorios de trabalho e preserva chaves', async () => {
    const workspace = setup();
    const packager = createTestPackager(workspace, '1.1.0');
    await packager.buildRelease(sourceBinary(workspace, '1.1.0'));

    expect(packager.clean().removed).toEqual([
      path.join(workspace.workspaceDir, 'build'),
      path.join(workspace.workspaceDir, 'staging')
    ]);
    expect(fs.existsSync(packager.packagesDir)).toBe(true);

    expect(packager.clean({ packages: true }).removed).toEqual([packager.packagesDir]);
    expect(workspace.keyManager.hasKeyMaterial()).toBe(true);
  });
});

class StubBuildRunner extends CommandBuildRunner {
  readonly calls: Array<{ command: string | null; args: string[] }> = [];

  constructor(private readonly outputPath: string) {
    super({ logger: mockLogger() });
  }

  async run(build: ReleaseBuildConfig): Promise<string> {
    this.calls.push({ command: build.command, args: build.args });
    return this.outputPath;
  }
}

function setup(): ReleaseWorkspace {
  return createReleaseWorkspace(makeTempDir(tempDirs, 'release'));
}

function sourceBinary(workspace: ReleaseWorkspace, version: string): string {
  const filePath = path.join(workspace.rootDir, 'input', version, 'fleet-agent');
  writeFakeBinary(filePath, version);
  return filePath;
}

function sha256(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}
