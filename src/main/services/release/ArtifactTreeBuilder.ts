import fs from 'node:fs';
import path from 'node:path';
import type { ReleaseIdentity } from '@shared/contracts';
import { PipelineError } from '@main/services/errors/PipelineError';

export interface InstallLayout {
  installDir: string;
  binDir: string;
  configDir: string;
}

export interface ArtifactTreeInput {
  name: string;
  executableName: string;
  identity: ReleaseIdentity;
  binaryPath: string;
  install: InstallLayout;
}

interface TemplateTarget {
  template: string;
  target: string;
  mode: number;
}

const TEMPLATE_TARGETS: TemplateTarget[] = [
  { template: 'default.toml', target: path.join('config', 'default.toml'), mode: 0o644 },
  { template: 'install.sh', target: path.join('scripts', 'install.sh'), mode: 0o755 },
  { template: 'uninstall.sh', target: path.join('scripts', 'uninstall.sh'), mode: 0o755 },
  { template: 'README.md', target: path.join('docs', 'README.md'), mode: 0o644 }
];

export class ArtifactTreeBuilder {
  private readonly templatesDir: string;

  constructor(templatesDir?: string | null) {
    this.templatesDir = templatesDir ?? resolveDefaultTemplatesDir();
  }

  /** Monta `<parentDir>/<name>-<fullVersion>/` e devolve o caminho da raiz. */
  build(parentDir: string, input: ArtifactTreeInput): string {
    const rootName = `${input.name}-${input.identity.fullVersion}`;
    const rootDir = path.join(parentDir, rootName);
    fs.rmSync(rootDir, { recursive: true, force: true });

    const binDir = path.join(rootDir, 'bin');
    fs.mkdirSync(binDir, { recursive: true });
    const binaryTarget = path.join(binDir, input.executableName);
    fs.copyFileSync(input.binaryPath, binaryTarget);
    fs.chmodSync(binaryTarget, 0o755);

    const values = templateValues(input);
    for (const item of TEMPLATE_TARGETS) {
      const source = path.join(this.templatesDir, item.template);
      if (!fs.existsSync(source)) {
        throw new PipelineError('build_failure', `Template ausente: ${source}`);
      }

      const target = path.join(rootDir, item.target);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, renderTemplate(fs.readFileSync(source, 'utf-8'), values), 'utf-8');
      fs.chmodSync(target, item.mode);
    }

    return rootDir;
  }
}

/** Substitui `{{chave}}`; chaves desconhecidas ficam intactas. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*([A-Za-z][A-Za-z0-9]*)\s*\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

function templateValues(input: ArtifactTreeInput): Record<string, string> {
  return {
    name: input.name,
    executableName: input.executableName,
    version: input.identity.semanticVersion,
    fullVersion: input.identity.fullVersion,
    gitCommit: input.identity.sourceRevision,
    buildDate: input.identity.buildDate,
    targetPlatform: input.identity.targetPlatform,
    installDir: input.install.installDir,
    binDir: input.install.binDir,
    configDir: input.install.configDir
  };
}

function resolveDefaultTemplatesDir(): string {
  const candidates = [
    path.resolve(__dirname, '..', '..', '..', '..', 'templates'),
    path.resolve(__dirname, '..', '..', 'templates'),
    path.resolve(process.cwd(), 'templates')
  ];
  return candidates.find((candidate) => fs.existsSync(path.join(candidate, 'default.toml'))) ?? candidates[0];
}
