import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { CHANNEL_PATH_SEGMENTS, type ReleaseChannel, type ReleaseManifest } from '@shared/contracts';
import { PipelineError, errorReason, isPipelineError } from '@main/services/errors/PipelineError';
import { ManifestValidator } from '@main/services/manifest/ManifestValidator';

interface ReleaseFeedClientOptions {
  feedUrl: string;
  fetchFn?: typeof fetch;
  userAgent?: string;
  validator?: ManifestValidator;
}

export interface DownloadResult {
  path: string;
  sizeBytes: number;
}

/** Le manifestos e artefatos por http(s) ou `file:`. */
export class ReleaseFeedClient {
  private readonly feedUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly userAgent: string;
  private readonly validator: ManifestValidator;

  constructor(options: ReleaseFeedClientOptions) {
    this.feedUrl = options.feedUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? fetch;
    this.userAgent = options.userAgent ?? 'FleetUpdateClient/0.3';
    this.validator = options.validator ?? new ManifestValidator();
  }

  manifestUrl(channel: ReleaseChannel): string {
    return `${this.feedUrl}/${CHANNEL_PATH_SEGMENTS[channel]}/manifest.json`;
  }

  async fetchManifest(channel: ReleaseChannel, signal?: AbortSignal): Promise<ReleaseManifest> {
    const url = this.manifestUrl(channel);
    const bytes = await this.fetchBytes(url, 'application/json', signal);

    const validated = this.validator.validateText(bytes.toString('utf-8'));
    if (!validated.ok) {
      throw new PipelineError('manifest_invalid', `Manifesto invalido em ${url}: ${validated.error}`);
    }
    if (validated.manifest.channel !== channel) {
      throw new PipelineError('manifest_invalid', `Manifesto de ${url} pertence ao canal ${validated.manifest.channel}.`);
    }
    return validated.manifest;
  }

  async download(url: string, targetPath: string, signal?: AbortSignal): Promise<DownloadResult> {
    const bytes = await this.fetchBytes(url, 'application/octet-stream, */*', signal);
    fs.mkdirSync(path.dirname(targetPath), { recursive: true });
    const pending = `${targetPath}.part`;
    fs.writeFileSync(pending, bytes);
    fs.renameSync(pending, targetPath);
    return { path: targetPath, sizeBytes: bytes.length };
  }

  private async fetchBytes(url: string, accept: string, signal?: AbortSignal): Promise<Buffer> {
    signal?.throwIfAborted();

    if (url.startsWith('file:')) {
      try {
        return await fs.promises.readFile(fileURLToPath(url), { signal });
      } catch (error) {
        throw wrapNetworkError(url, error);
      }
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          Accept: accept,
          'User-Agent': this.userAgent
        },
        signal
      });
    } catch (error) {
      throw wrapNetworkError(url, error);
    }

    if (!response.ok) {
      throw new PipelineError('network_failure', `Falha ao buscar ${url}: HTTP ${response.status}.`);
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw wrapNetworkError(url, error);
    }
  }
}

/** Nome de arquivo seguro derivado da URL de download. */
export function fileNameFromUrl(url: string): string {
  try {
    const pathname = new URL(url).pathname;
    const candidate = decodeURIComponent(pathname.split('/').filter(Boolean).pop() ?? '');
    const safe = candidate.replace(/[^A-Za-z0-9._-]/g, '_');
    return safe && safe !== '.' && safe !== '..' ? safe : 'artifact';
  } catch {
    return 'artifact';
  }
}

function wrapNetworkError(url: string, error: unknown): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  return new PipelineError('network_failure', `Falha ao buscar ${url}: ${errorReason(error)}`, { cause: error });
}
