import fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { OperationError, describeError } from '@main/services/errors/OperationError';
import type { ProgressReporter } from '@main/services/progress/ProgressReporter';

export const DOWNLOAD_PERCENT_START = 10;
export const DOWNLOAD_PERCENT_END = 60;

const MIB = 1024 * 1024;

type ResponseBody = NonNullable<Response['body']>;

interface ArchiveDownloaderOptions {
  userAgent?: string;
}

export interface DownloadOutcome {
  bytes: number;
  totalBytes: number | null;
}

export class ArchiveDownloader {
  private readonly userAgent: string;

  constructor(options?: ArchiveDownloaderOptions) {
    this.userAgent = options?.userAgent ?? '3dse/0.1';
  }

  /**
   * Baixa `url` em streaming para `targetPath`. Com content-length conhecido o
   * progresso ocupa a faixa 10-60%; sem ele apenas a contagem de bytes e
   * reportada.
   */
  async download(url: string, targetPath: string, progress: ProgressReporter): Promise<DownloadOutcome> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: 'application/octet-stream, */*',
          'User-Agent': this.userAgent
        }
      });
    } catch (error) {
      throw new OperationError('network_error', `Erro de rede ao baixar ${url}: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new OperationError('network_error', `Falha no download do arquivo: HTTP ${response.status}.`);
    }
    if (!response.body) {
      throw new OperationError('network_error', 'Resposta do download veio sem corpo.');
    }

    const totalBytes = parseContentLength(response.headers.get('content-length'));
    let received = 0;

    const reportChunk = (bytes: number): void => {
      received += bytes;
      if (totalBytes === null) {
        progress.info(`Baixado: ${formatMiB(received)} MB`);
        return;
      }

      const span = DOWNLOAD_PERCENT_END - DOWNLOAD_PERCENT_START;
      const percent = DOWNLOAD_PERCENT_START + Math.floor((received / totalBytes) * span);
      progress.info(
        `Baixado: ${formatMiB(received)} MB de ${formatMiB(totalBytes)} MB`,
        Math.min(percent, DOWNLOAD_PERCENT_END)
      );
    };

    try {
      await pipeline(readBody(response.body, reportChunk), fs.createWriteStream(targetPath));
    } catch (error) {
      if (error instanceof OperationError) {
        throw error;
      }
      throw new OperationError('unexpected', `Falha ao gravar o arquivo baixado: ${describeError(error)}`);
    }

    return { bytes: received, totalBytes };
  }
}

/**
 * Le o corpo da resposta chunk a chunk. Se quem consome parar antes do fim
 * (falha de escrita), o corpo e cancelado.
 */
async function* readBody(body: ResponseBody, onChunk: (bytes: number) => void): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let settled = false;

  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        settled = true;
        throw new OperationError('network_error', `Conexao interrompida durante o download: ${describeError(error)}`);
      });
      if (chunk.done) {
        settled = true;
        return;
      }

      const value: Uint8Array = chunk.value;
      yield value;
      onChunk(value.byteLength);
    }
  } finally {
    if (!settled) {
      await reader.cancel();
    }
  }
}

export function parseContentLength(value: string | null): number | null {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }

  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
}

function formatMiB(bytes: number): string {
  return (bytes / MIB).toFixed(2);
}
