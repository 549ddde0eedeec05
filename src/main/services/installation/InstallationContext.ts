import path from 'node:path';
import type { InstallationContext } from '@shared/contracts';

export interface InstallationContextInput {
  binaryPath: string;
  dataDir: string;
}

/**
 * Todos os caminhos mutaveis de uma instalacao. Servicos recebem este valor
 * em vez de ler estado global, entao cada teste monta um contexto isolado.
 */
export function createInstallationContext(input: InstallationContextInput): InstallationContext {
  const binaryPath = path.resolve(input.binaryPath);
  const dataDir = path.resolve(input.dataDir);
  const installDir = path.dirname(binaryPath);
  const executableName = path.basename(binaryPath);

  return {
    binaryPath,
    installDir,
    executableName,
    dataDir,
    backupsDir: path.join(dataDir, 'backups'),
    downloadsDir: path.join(dataDir, 'downloads'),
    lockPath: path.join(installDir, `.${executableName}.update.lock`),
    versionFilePath: path.join(dataDir, 'version.json')
  };
}
