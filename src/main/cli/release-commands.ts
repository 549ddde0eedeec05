import path from 'node:path';
import { parseArgs } from 'node:util';
import type { ReleasePackage } from '@shared/contracts';
import { ReleaseConfigStore, type ReleaseConfig } from '@main/services/config/ReleaseConfigStore';
import { Logger } from '@main/services/logging/Logger';
import { ManifestPublisher } from '@main/services/manifest/ManifestPublisher';
import { ReleasePackager } from '@main/services/release/ReleasePackager';
import { EXIT_FAILURE, EXIT_OK, UsageError, parseChannel, processIO, reportFailure, type CliIO } from '@main/cli/cli-support';

export const RELEASE_USAGE = [
  'uso: fleet-release <comando> [opcoes]',
  '  create [--binary <caminho>]            monta, assina e grava um pacote',
  '  clean [--packages]                     remove build/staging (e pacotes com --packages)',
  '  verify <pacote.tar.gz>                 confere checksum e assinatura',
  '  publish <canal> <pacote.json|.tar.gz>  publica no manifesto do canal',
  '      [--changelog <linha>]... [--critical] [--min-system <versao>] [--no-rollback]',
  'opcoes globais: --config <arquivo> (ou FLEET_RELEASE_CONFIG)'
].join('\n');

export interface ReleaseCliDeps {
  loadConfig?: (filePath: string) => ReleaseConfig;
  createPackager?: (config: ReleaseConfig, logger: Logger) => ReleasePackager;
}

export async function runReleaseCli(argv: string[], io: CliIO = processIO(), deps: ReleaseCliDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: 'string', short: 'c' },
        binary: { type: 'string' },
        packages: { type: 'boolean', default: false },
        changelog: { type: 'string', multiple: true },
        critical: { type: 'boolean', default: false },
        'min-system': { type: 'string' },
        'no-rollback': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });

    const [command, ...rest] = positionals;
    if (values.help) {
      io.out(RELEASE_USAGE);
      return EXIT_OK;
    }
    if (!command) {
      throw new UsageError('Informe um comando.');
    }

    const configPath = path.resolve(values.config ?? io.env.FLEET_RELEASE_CONFIG ?? 'fleet-release.json');
    const config = (deps.loadConfig ?? ((filePath) => new ReleaseConfigStore(filePath).get()))(configPath);
    const logger = new Logger(config.workspaceDir, { fileName: 'release.log', echo: { minLevel: 'warn', write: io.err } });
    const packager = deps.createPackager?.(config, logger) ?? new ReleasePackager({ config, logger });

    switch (command) {
      case 'create': {
        const pkg = await packager.buildRelease(values.binary);
        printPackage(io, pkg);
        return EXIT_OK;
      }
      case 'clean': {
        const result = packager.clean({ packages: values.packages });
        io.out(result.removed.length > 0 ? `removido: ${result.removed.join(', ')}` : 'nada para remover');
        return EXIT_OK;
      }
      case 'verify': {
        const target = requirePositional(rest, 0, 'verify exige o caminho do pacote');
        const result = await packager.verifyPackage(target);
        io.out(`checksum: ${result.checksumOk ? 'ok' : 'FALHOU'} (${result.actualChecksum})`);
        io.out(`assinatura: ${result.signatureOk ? `ok (${result.certificateSubject ?? '?'})` : 'FALHOU'}`);
        return result.checksumOk && result.signatureOk ? EXIT_OK : EXIT_FAILURE;
      }
      case 'publish': {
        const channel = parseChannel(requirePositional(rest, 0, 'publish exige o canal'), 'stable');
        const pkg = packager.loadPackage(requirePositional(rest, 1, 'publish exige o pacote'));
        const publisher = new ManifestPublisher({
          publishDir: config.publish.publishDir,
          baseUrl: config.publish.baseUrl,
          publisherVersion: pkg.identity.semanticVersion,
          logger
        });
        const manifest = await publisher.publishPackage(channel, pkg, {
          changelog: values.changelog,
          critical: values.critical,
          minSystemVersion: values['min-system'] ?? config.publish.minSystemVersion,
          rollbackAllowed: !values['no-rollback']
        });
        io.out(`publicado ${pkg.identity.semanticVersion} em ${channel}; latest=${manifest.latestVersion}`);
        io.out(`manifesto: ${publisher.manifestPath(channel)}`);
        return EXIT_OK;
      }
      default:
        throw new UsageError(`Comando desconhecido: ${command}`);
    }
  } catch (error) {
    return reportFailure(io, error, RELEASE_USAGE);
  }
}

function printPackage(io: CliIO, pkg: ReleasePackage): void {
  io.out(`pacote: ${pkg.artifactPath}`);
  io.out(`versao: ${pkg.identity.fullVersion}`);
  io.out(`sha256: ${pkg.sha256}`);
  io.out(`tamanho: ${pkg.sizeBytes} bytes`);
  io.out(`assinatura: ${pkg.signaturePath}`);
}

function requirePositional(values: string[], index: number, message: string): string {
  const value = values[index];
  if (typeof value !== 'string' || !value.trim()) {
    throw new UsageError(message);
  }
  return value;
}
