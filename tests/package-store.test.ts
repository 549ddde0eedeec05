import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import type { PackageMetadata } from '@shared/contracts';
import { PackageStore, metadataPathFor } from '@main/services/release/PackageStore';
import { makeTempDir, thrownBy } from './helpers/fixtures';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('PackageStore', () => {
  it('grava arquivo, assinatura e metadados e recusa sobrescrever', () => {
    const dir = makeTempDir(tempDirs, 'store');
    const store = new PackageStore(path.join(dir, 'packages'));
    const metadata = buildMetadata();

    const committed = store.commit({
      stagedArchivePath: stage(dir, 'conteudo'),
      signatureBase64: 'c2lnbmF0dXJl',
      metadata
    });

    expect(committed.artifactPath).toBe(path.join(dir, 'packages', 'fleet-agent-2.0.0-abc1234-2026-03-14.tar.gz'));
    expect(fs.readFileSync(committed.signaturePath, 'utf-8')).toBe('c2lnbmF0dXJl\n');
    expect(store.readMetadata(committed.artifactPath)).toEqual(metadata);
    expect(store.has('fleet-agent-2.0.0-abc1234-2026-03-14')).toBe(true);

    const second = stage(dir, 'outro conteudo');
    expect(thrownBy(() => store.commit({ stagedArchivePath: second, signatureBase64: 'eA==', metadata }))).toMatchObject({
      code: 'package_exists'
    });
    expect(fs.readFileSync(committed.artifactPath, 'utf-8')).toBe('conteudo');
    expect(fs.existsSync(second)).toBe(true);
  });

  it('loadPackage exige a assinatura ao lado do arquivo', () => {
    const dir = makeTempDir(tempDirs, 'store');
    const store = new PackageStore(dir);
    const committed = store.commit({ stagedArchivePath: stage(dir, 'x'), signatureBase64: 'eA==', metadata: buildMetadata() });

    const loaded = store.loadPackage(committed.artifactPath, 'CERT');
    expect(loaded.identity.fullVersion).toBe('2.0.0-abc1234-2026-03-14');
    expect(loaded.sha256).toBe('ab'.repeat(32));
    expect(loaded.certificatePem).toBe('CERT');

    fs.rmSync(committed.signaturePath);
    expect(thrownBy(() => store.loadPackage(committed.artifactPath, 'CERT'))).toMatchObject({ code: 'signature_missing' });
  });

  it('metadados invalidos viram manifest_invalid', () => {
    const dir = makeTempDir(tempDirs, 'store');
    const archive = path.join(dir, 'pacote.tar.gz');
    fs.writeFileSync(path.join(dir, 'pacote.json'), JSON.stringify({ name: 'fleet-agent', checksum: 'curto' }));

    expect(thrownBy(() => new PackageStore(dir).readMetadata(archive))).toMatchObject({ code: 'manifest_invalid' });
  });
});

describe('metadataPathFor', () => {
  it('deriva o json do arquivo e aceita o proprio json', () => {
    expect(metadataPathFor('/srv/packages/a-1.0.0.tar.gz')).toBe('/srv/packages/a-1.0.0.json');
    expect(metadataPathFor('/srv/packages/a-1.0.0.json')).toBe('/srv/packages/a-1.0.0.json');
  });
});

function stage(dir: string, content: string): string {
  const staging = path.join(dir, 'staging');
  fs.mkdirSync(staging, { recursive: true });
  const filePath = path.join(staging, `pacote-${fs.readdirSync(staging).length}.tar.gz`);
  fs.writeFileSync(filePath, content);
  return filePath;
}

function buildMetadata(): PackageMetadata {
  return {
    name: 'fleet-agent',
    version: '2.0.0',
    fullVersion: '2.0.0-abc1234-2026-03-14',
    gitCommit: 'abc1234',
    buildDate: '2026-03-14',
    targetPlatform: 'x86_64-unknown-linux-gnu',
    packageFile: 'fleet-agent-2.0.0-abc1234-2026-03-14.tar.gz',
    signatureFile: 'fleet-agent-2.0.0-abc1234-2026-03-14.tar.gz.sig',
    checksum: 'ab'.repeat(32),
    size: 8,
    createdAt: '2026-03-14T10:00:00.000Z'
  };
}
