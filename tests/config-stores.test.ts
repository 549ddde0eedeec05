import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { DEFAULT_RELEASE_CONFIG, ReleaseConfigStore, parseReleaseConfig } from '@main/services/config/ReleaseConfigStore';
import {
  DEFAULT_UPDATE_CLIENT_CONFIG,
  UpdateClientConfigStore,
  parseUpdateClientConfig
} from '@main/services/config/UpdateClientConfigStore';
import { makeTempDir, thrownBy } from './helpers/fixtures';

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ReleaseConfigStore', () => {
  it('cria arquivo com defaults e resolve caminhos relativos ao arquivo', () => {
    const dir = makeTempDir(tempDirs, 'config');
    const filePath = path.join(dir, 'conf', 'release.json');

    const config = new ReleaseConfigStore(filePath).get();

    expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual(DEFAULT_RELEASE_CONFIG);
    expect(config.workspaceDir).toBe(path.join(dir, 'conf', '.fleet', 'releases'));
    expect(config.versionFile).toBe(path.join(dir, 'conf', 'package.json'));
    expect(config.signing).toMatchObject({
      keysDir: path.join(dir, 'conf', '.fleet', 'releases', 'keys'),
      identity: 'fleet',
      keyBits: 4096,
      validityDays: 3650
    });
    expect(config.publish).toEqual({
      baseUrl: 'https://updates.example.invalid',
      publishDir: path.join(dir, 'conf', '.fleet', 'releases', 'publish'),
      minSystemVersion: '1.0.0'
    });
    expect(config.install).toEqual({
      installDir: '/opt/fleet-agent',
      binDir: '/usr/local/bin',
      configDir: '/etc/fleet-agent'
    });
  });

  it('recusa chave menor que 4096 bits', () => {
    const dir = makeTempDir(tempDirs, 'config');
    const filePath = path.join(dir, 'release.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({ name: 'fleet-agent', executableName: 'fleet-agent', workspaceDir: 'out', signing: { keyBits: 2048 } })
    );

    expect(thrownBy(() => new ReleaseConfigStore(filePath))).toMatchObject({
      code: 'config_invalid',
      message: `Configuracao invalida em ${filePath}: signing.keyBits: keyBits minimo e 4096`
    });
  });

  it('JSON ilegivel e erro e o arquivo nao e sobrescrito', () => {
    const dir = makeTempDir(tempDirs, 'config');
    const filePath = path.join(dir, 'release.json');
    fs.writeFileSync(filePath, '{ name: ');

    expect(thrownBy(() => new ReleaseConfigStore(filePath))).toMatchObject({
      code: 'config_invalid',
      message: `Configuracao ilegivel em ${filePath}`
    });
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('{ name: ');
  });

  it('parseReleaseConfig respeita caminhos absolutos', () => {
    const config = parseReleaseConfig(
      {
        name: 'fleet-agent',
        executableName: 'fleet-agent',
        workspaceDir: '/srv/releases',
        signing: { keysDir: '/srv/keys' },
        build: { command: 'make', outputPath: 'out/fleet-agent' }
      },
      '/home/ci/project'
    );

    expect(config.workspaceDir).toBe('/srv/releases');
    expect(config.signing.keysDir).toBe('/srv/keys');
    expect(config.build.outputPath).toBe('/home/ci/project/out/fleet-agent');
    expect(config.build.cwd).toBeNull();
    expect(config.publish.publishDir).toBe('/srv/releases/publish');
  });
});

describe('UpdateClientConfigStore', () => {
  it('cria arquivo com defaults do cliente', () => {
    const dir = makeTempDir(tempDirs, 'config');
    const filePath = path.join(dir, 'client.json');

    const config = new UpdateClientConfigStore(filePath).get();

    expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual(DEFAULT_UPDATE_CLIENT_CONFIG);
    expect(config).toMatchObject({
      channel: 'stable',
      binaryPath: '/opt/fleet-agent/fleet-agent',
      dataDir: path.join(dir, '.fleet', 'client'),
      signaturePolicy: 'required',
      maxBackups: 5,
      systemVersion: null,
      pidFile: null,
      versionArgs: ['--version']
    });
  });

  it('resolve certificados confiaveis relativos ao arquivo', () => {
    const config = parseUpdateClientConfig(
      {
        channel: 'beta',
        feedUrl: 'file:///srv/publish',
        binaryPath: 'bin/fleet-agent',
        dataDir: 'state',
        trustedCertificates: ['keys/current.pem', '/etc/fleet/retired.pem'],
        pidFile: 'run/fleet-agent.pid'
      },
      '/etc/fleet'
    );

    expect(config.binaryPath).toBe('/etc/fleet/bin/fleet-agent');
    expect(config.dataDir).toBe('/etc/fleet/state');
    expect(config.trustedCertificates).toEqual(['/etc/fleet/keys/current.pem', '/etc/fleet/retired.pem']);
    expect(config.pidFile).toBe('/etc/fleet/run/fleet-agent.pid');
  });

  it('politica de assinatura desconhecida vira config_invalid', () => {
    const dir = makeTempDir(tempDirs, 'config');
    const filePath = path.join(dir, 'client.json');
    fs.writeFileSync(filePath, JSON.stringify({ ...DEFAULT_UPDATE_CLIENT_CONFIG, signaturePolicy: 'lenient' }));

    expect(thrownBy(() => new UpdateClientConfigStore(filePath))).toMatchObject({ code: 'config_invalid' });
  });
});
