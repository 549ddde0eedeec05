import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import type { UpdateOutcome } from '@shared/contracts';
import { UpdateClientConfigStore, type UpdateClientConfig } from '@main/services/config/UpdateClientConfigStore';
import { PipelineError, errorReason } from '@main/services/errors/PipelineError';
import { assertCommandsAvailable } from '@main/services/environment/command-resolution';
import { createInstallationContext } from '@main/services/installation/InstallationContext';
import { Logger } from '@main/services/logging/Logger';
import { CommandBuildRunner } from '@main/services/release/CommandBuildRunner';
import { SignalProcessTerminator } from '@main/services/update/ProcessTerminator';
import { ReleaseFeedClient } from '@main/services/update/ReleaseFeedClient';
import { UpdateClient } from '@main/services/update/UpdateClient';
import { ExecVersionProbe } from '@main/services/update/VersionProbe';
import { EXIT_FAILURE, EXIT_OK, UsageError, parseChannel, processIO, reportFailure, type CliIO } from '@main/cli/cli-support';

export const UPDATE_USAGE = [
  'uso: fleet-update <comando> [canal] [opcoes]',
  '  check [canal]    consulta o manifesto sem alterar nada',
  '  update [canal]   baixa, verifica e aplica a versao mais recente',
  '  rollback         restaura o backup mais recente',
  '  build            compila a partir do fonte com o comando configurado',
  'canais: stable, beta, alpha, development',
  'opcoes: --config <arquivo> (ou FLEET_UPDATE_CONFIG), --feed <url> (ou FLEET_UPDATE_FEED_URL)'
].join('\n');

const SUCCESS_OUTCOMES: UpdateOutcome[] = ['verified', 'up_to_date'];

export interface UpdateCliDeps {
  loadConfig?: (filePath: string) => UpdateClientConfig;
  createClient?: (config: UpdateClientConfig, logger: Logger) => UpdateClient;
  onInterrupt?: (handler: () => void) => () => void;
}

export async function runUpdateCli(argv: string[], io: CliIO = processIO(), deps: UpdateCliDeps = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        config: { type: 'string', short: 'c' },
        feed: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });

    const [command = 'check', channelArg] = positionals;
    if (values.help) {
      io.out(UPDATE_USAGE);
      return EXIT_OK;
    }

    const configPath = path.resolve(values.config ?? io.env.FLEET_UPDATE_CONFIG ?? 'fleet-update.json');
    const loaded = (deps.loadConfig ?? ((filePath) => new UpdateClientConfigStore(filePath).get()))(configPath);
    const config: UpdateClientConfig = {
      ...loaded,
      feedUrl: values.feed ?? io.env.FLEET_UPDATE_FEED_URL ?? loaded.feedUrl
    };
    const channel = parseChannel(channelArg ?? io.env.FLEET_UPDATE_CHANNEL, config.channel);
    const logger = new Logger(config.dataDir, { fileName: 'update.log', echo: { minLevel: 'warn', write: io.err } });

    if (command === 'build') {
      return await runBuild(io, config, logger);
    }

    const client = deps.createClient?.(config, logger) ?? createUpdateClient(config, logger);
    switch (command) {
      case 'check': {
        const report = await client.check(channel);
        io.out(`canal: ${report.channel}`);
        io.out(`instalada: ${report.installedVersion ?? 'nenhuma'}`);
        io.out(`disponivel: ${report.latestVersion}`);
        if (report.available && report.entry) {
          io.out(`atualizacao disponivel: ${report.entry.version}${report.entry.critical ? ' (critica)' : ''}`);
          for (const line of report.entry.changelog) {
            io.out(`  - ${line}`);
          }
        } else {
          io.out('sistema atualizado');
        }
        return EXIT_OK;
      }
      case 'update': {
        const subscribe = deps.onInterrupt ?? subscribeInterrupt;
        const unsubscribe = subscribe(() => {
          client.cancel();
        });
        try {
          const session = await client.update(channel);
          io.out(`resultado: ${session.outcome}`);
          io.out(`transicoes: ${session.transitions.join(' -> ')}`);
          if (session.message) {
            io.out(session.message);
          }
          return SUCCESS_OUTCOMES.includes(session.outcome) ? EXIT_OK : EXIT_FAILURE;
        } finally {
          unsubscribe();
        }
      }
      case 'rollback': {
        const result = await client.rollback();
        io.out(`restaurado backup ${result.record.id} (${result.record.versionTag})`);
        io.out(`versao reportada: ${result.restoredVersion ?? 'desconhecida'}`);
        return EXIT_OK;
      }
      default:
        throw new UsageError(`Comando desconhecido: ${command}`);
    }
  } catch (error) {
    return reportFailure(io, error, UPDATE_USAGE);
  }
}

export function createUpdateClient(config: UpdateClientConfig, logger: Logger): UpdateClient {
  const context = createInstallationContext({ binaryPath: config.binaryPath, dataDir: config.dataDir });
  return new UpdateClient({
    context,
    feed: new ReleaseFeedClient({ feedUrl: config.feedUrl }),
    logger,
    versionProbe: new ExecVersionProbe({ args: config.versionArgs, timeoutMs: config.versionProbeTimeoutMs }),
    terminator: new SignalProcessTerminator({ logger, graceMs: config.terminateGraceMs, pidFile: config.pidFile }),
    trustedCertificates: readTrustedCertificates(config.trustedCertificates),
    signaturePolicy: config.signaturePolicy,
    systemVersion: config.systemVersion,
    sessionTimeoutMs: config.sessionTimeoutMs,
    maxBackups: config.maxBackups
  });
}

export function readTrustedCertificates(paths: string[]): string[] {
  return paths.map((filePath) => {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new PipelineError('config_invalid', `Certificado confiavel ilegivel ${filePath}: ${errorReason(error)}`, {
        cause: error
      });
    }
  });
}

async function runBuild(io: CliIO, config: UpdateClientConfig, logger: Logger): Promise<number> {
  if (config.build.command) {
    assertCommandsAvailable([config.build.command]);
  }
  const output = await new CommandBuildRunner({ logger }).run(config.build, path.dirname(config.binaryPath));
  io.out(`build concluido: ${output}`);
  return EXIT_OK;
}

function subscribeInterrupt(handler: () => void): () => void {
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}
