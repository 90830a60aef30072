import type { ReleaseInfo, ReleaseLookupResult } from '@shared/contracts';
import type { ComponentDefinition } from '@main/services/components/component-catalog';
import { OperationError, describeError } from '@main/services/errors/OperationError';
import type { AppLogger } from '@main/services/logging/Logger';

interface GitHubReleaseAsset {
  name?: unknown;
  browser_download_url?: unknown;
}

export interface GitHubRelease {
  tag_name?: unknown;
  assets?: unknown;
}

interface GitHubReleaseLookupOptions {
  apiBaseUrl?: string;
  userAgent?: string;
  logger: AppLogger;
}

export class GitHubReleaseLookup {
  private readonly apiBaseUrl: string;
  private readonly userAgent: string;
  private readonly logger: AppLogger;

  constructor(options: GitHubReleaseLookupOptions) {
    this.apiBaseUrl = (options.apiBaseUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? '3dse/0.1';
    this.logger = options.logger;
  }

  async latest(component: ComponentDefinition): Promise<ReleaseLookupResult> {
    try {
      const release = await this.fetchLatestRelease(component);
      const info = selectReleaseAsset(release, component);
      this.logger.info('release.lookup.ok', {
        component: component.id,
        version: info.version,
        asset: info.assetName
      });
      return { ok: true, release: info };
    } catch (error) {
      const errorCode = error instanceof OperationError ? error.code : 'unexpected';
      const message =
        error instanceof OperationError
          ? error.message
          : `Erro inesperado ao consultar release de ${component.displayName}: ${describeError(error)}`;
      this.logger.warn('release.lookup.failed', {
        component: component.id,
        errorCode,
        message
      });
      return { ok: false, errorCode, message };
    }
  }

  private async fetchLatestRelease(component: ComponentDefinition): Promise<GitHubRelease> {
    const url = `${this.apiBaseUrl}/repos/${encodeURIComponent(component.owner)}/${encodeURIComponent(component.repo)}/releases/latest`;

    this.logger.debug('release.lookup.request', { component: component.id, url });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': this.userAgent
        }
      });
    } catch (error) {
      throw new OperationError(
        'network_error',
        `Erro ao conectar ao GitHub para ${component.displayName}: ${describeError(error)}. Verifique sua conexao com a internet.`
      );
    }

    if (!response.ok) {
      throw new OperationError(
        'network_error',
        `GitHub respondeu HTTP ${response.status} para ${component.owner}/${component.repo}.`
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new OperationError(
        'data_format',
        `Resposta do GitHub para ${component.displayName} nao e JSON valido: ${describeError(error)}`
      );
    }

    if (!isRecord(json)) {
      throw new OperationError('data_format', `Resposta do GitHub para ${component.displayName} em formato inesperado.`);
    }

    return {
      tag_name: json.tag_name,
      assets: json.assets
    };
  }
}

/**
 * Valida a tag e escolhe o primeiro asset cujo nome casa com o padrao do
 * componente, na ordem devolvida pela API.
 */
export function selectReleaseAsset(release: GitHubRelease, component: ComponentDefinition): ReleaseInfo {
  const tagName = release.tag_name;
  if (typeof tagName !== 'string' || !tagName.startsWith('v')) {
    throw new OperationError(
      'data_format',
      `Nao foi possivel encontrar a versao mais recente de ${component.displayName} no GitHub (tag_name ausente ou invalida).`
    );
  }

  const assets = Array.isArray(release.assets) ? release.assets : [];
  for (const candidate of assets) {
    const asset = asReleaseAsset(candidate);
    if (!asset) {
      continue;
    }

    if (typeof asset.name !== 'string' || !component.assetPattern.test(asset.name)) {
      continue;
    }

    if (typeof asset.browser_download_url !== 'string' || !asset.browser_download_url) {
      continue;
    }

    return {
      version: tagName.slice(1),
      downloadUrl: asset.browser_download_url,
      tagName,
      assetName: asset.name
    };
  }

  throw new OperationError(
    'asset_not_found',
    `Arquivo ZIP de ${component.displayName} (padrao '${component.assetPatternLabel}') nao encontrado na release ${tagName}. O nome do asset pode ter mudado.`
  );
}

function asReleaseAsset(value: unknown): GitHubReleaseAsset | null {
  if (!isRecord(value)) {
    return null;
  }

  return {
    name: value.name,
    browser_download_url: value.browser_download_url
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
