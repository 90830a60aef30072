import { afterEach, describe, expect, it, vi } from 'vitest';
import { GODMODE9_COMPONENT, LUMA_COMPONENT } from '@main/services/components/component-catalog';
import { GitHubReleaseLookup } from '@main/services/releases/GitHubReleaseLookup';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

function okJson(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: { 'content-type': 'application/json' }
  });
}

function asset(name: string, url = `https://example.invalid/${name}`) {
  return { name, browser_download_url: url };
}

describe('GitHubReleaseLookup', () => {
  it('consulta releases/latest e devolve versao sem o prefixo v', async () => {
    const fetchMock = vi.fn(async (url: string) => {
      if (url === 'https://api.example.invalid/repos/LumaTeam/Luma3DS/releases/latest') {
        return okJson({
          tag_name: 'v13.1.2',
          assets: [asset('Luma3DSv13.1.2.zip')]
        });
      }

      throw new Error(`URL inesperada: ${url}`);
    });
    vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);

    const logger = createLogger();
    const lookup = new GitHubReleaseLookup({ apiBaseUrl: 'https://api.example.invalid/', logger });
    const result = await lookup.latest(LUMA_COMPONENT);

    expect(result).toEqual({
      ok: true,
      release: {
        version: '13.1.2',
        downloadUrl: 'https://example.invalid/Luma3DSv13.1.2.zip',
        tagName: 'v13.1.2',
        assetName: 'Luma3DSv13.1.2.zip'
      }
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('release.lookup.request', {
      component: 'luma',
      url: 'https://api.example.invalid/repos/LumaTeam/Luma3DS/releases/latest'
    });
  });

  it('escolhe o primeiro asset que casa com o padrao, na ordem da API', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        okJson({
          tag_name: 'v2.1.1',
          assets: [
            asset('GodMode9-v2.1.1-source.tar.gz'),
            asset('GodMode9-v2.1.1-20240101.zip', 'https://example.invalid/first.zip'),
            asset('GodMode9-v2.1.1-nightly.zip', 'https://example.invalid/second.zip')
          ]
        })
      ) as unknown as typeof fetch
    );

    const lookup = new GitHubReleaseLookup({ logger: createLogger() });
    const result = await lookup.latest(GODMODE9_COMPONENT);

    expect(result.ok).toBe(true);
    expect(result.ok && result.release.downloadUrl).toBe('https://example.invalid/first.zip');
  });

  it('retorna asset_not_found quando nenhum nome casa, mesmo com tag valida', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        okJson({
          tag_name: 'v13.1.2',
          assets: [asset('Luma3DS-13.1.2.zip'), asset('source.zip'), asset('xLuma3DSv13.1.2.zip')]
        })
      ) as unknown as typeof fetch
    );
    const logger = createLogger();

    const lookup = new GitHubReleaseLookup({ logger });
    const result = await lookup.latest(LUMA_COMPONENT);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.errorCode).toBe('asset_not_found');
    expect(logger.warn).toHaveBeenCalledWith(
      'release.lookup.failed',
      expect.objectContaining({ component: 'luma', errorCode: 'asset_not_found' })
    );
  });

  it('retorna data_format quando a tag esta ausente ou sem prefixo v', async () => {
    const payloads = [{ assets: [asset('Luma3DSv13.1.2.zip')] }, { tag_name: '13.1.2', assets: [] }];

    for (const payload of payloads) {
      vi.stubGlobal('fetch', vi.fn(async () => okJson(payload)) as unknown as typeof fetch);
      const lookup = new GitHubReleaseLookup({ logger: createLogger() });
      const result = await lookup.latest(LUMA_COMPONENT);
      expect(!result.ok && result.errorCode).toBe('data_format');
    }
  });

  it('retorna network_error para HTTP nao-2xx', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('rate limited', { status: 403 })) as unknown as typeof fetch
    );

    const lookup = new GitHubReleaseLookup({ logger: createLogger() });
    const result = await lookup.latest(LUMA_COMPONENT);

    expect(result).toEqual({
      ok: false,
      errorCode: 'network_error',
      message: 'GitHub respondeu HTTP 403 para LumaTeam/Luma3DS.'
    });
  });

  it('retorna network_error quando a conexao falha', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }) as unknown as typeof fetch
    );

    const lookup = new GitHubReleaseLookup({ logger: createLogger() });
    const result = await lookup.latest(GODMODE9_COMPONENT);

    expect(!result.ok && result.errorCode).toBe('network_error');
    expect(!result.ok && result.message).toContain('fetch failed');
  });

  it('retorna data_format quando o corpo nao e JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>', { status: 200 })) as unknown as typeof fetch);

    const lookup = new GitHubReleaseLookup({ logger: createLogger() });
    const result = await lookup.latest(LUMA_COMPONENT);

    expect(!result.ok && result.errorCode).toBe('data_format');
  });
});
