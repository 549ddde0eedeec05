import path from 'node:path';
import { spawnSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { PipelineError } from '@main/services/errors/PipelineError';

export interface CommandResolution {
  found: boolean;
  path: string | null;
}

export type CommandResolver = (commandName: string) => CommandResolution;

const DEFAULT_PATH_SEGMENTS: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: ['/usr/local/sbin', '/usr/local/bin', '/usr/sbin', '/usr/bin', '/sbin', '/bin'],
  darwin: ['/opt/homebrew/bin', '/usr/local/bin', '/usr/bin', '/bin', '/usr/sbin', '/sbin'],
  win32: []
};

export function buildCommandEnvironment(
  platform: NodeJS.Platform = process.platform,
  baseEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env = { ...baseEnv };
  const entries = splitPathEntries(baseEnv.PATH);
  for (const fallback of DEFAULT_PATH_SEGMENTS[platform] ?? []) {
    if (!entries.includes(fallback)) {
      entries.push(fallback);
    }
  }
  if (entries.length > 0) {
    env.PATH = entries.join(path.delimiter);
  }
  return env;
}

export function resolveCommandBinary(commandName: string, platform: NodeJS.Platform = process.platform): CommandResolution {
  const normalized = commandName.trim();
  if (!normalized) {
    return { found: false, path: null };
  }

  if (path.isAbsolute(normalized) || normalized.includes('/')) {
    const absolute = path.resolve(normalized);
    return existsSync(absolute) ? { found: true, path: absolute } : { found: false, path: null };
  }

  const env = buildCommandEnvironment(platform);
  const searchPath = splitPathEntries(env.PATH);
  const suffixes = platform === 'win32' ? ['', '.exe', '.cmd', '.bat'] : [''];
  for (const dir of searchPath) {
    for (const suffix of suffixes) {
      const candidate = path.join(dir, `${normalized}${suffix}`);
      if (existsSync(candidate)) {
        return { found: true, path: candidate };
      }
    }
  }

  return { found: false, path: null };
}

export function findMissingCommands(commands: string[], resolver: CommandResolver = resolveCommandBinary): string[] {
  const unique = Array.from(new Set(commands.map((command) => command.trim()).filter(Boolean)));
  return unique.filter((command) => !resolver(command).found);
}

/** Pre-flight: aborta antes de qualquer efeito colateral se faltar ferramenta externa. */
export function assertCommandsAvailable(commands: string[], resolver: CommandResolver = resolveCommandBinary): void {
  const missing = findMissingCommands(commands, resolver);
  if (missing.length > 0) {
    throw new PipelineError('missing_dependency', `Dependencia ausente: ${missing.join(', ')}`);
  }
}

/** Primeira linha de stdout de um comando curto, ou `null` se falhar. */
export function readCommandOutput(command: string, args: string[], cwd?: string): string | null {
  try {
    const result = spawnSync(command, args, {
      cwd,
      encoding: 'utf-8',
      env: buildCommandEnvironment(),
      timeout: 10_000
    });
    if (result.status !== 0 || typeof result.stdout !== 'string') {
      return null;
    }
    return result.stdout.split('\n').map((line) => line.trim()).find(Boolean) ?? null;
  } catch {
    return null;
  }
}

function splitPathEntries(value: string | undefined): string[] {
  if (typeof value !== 'string' || !value.trim()) {
    return [];
  }

  return value
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);
}
