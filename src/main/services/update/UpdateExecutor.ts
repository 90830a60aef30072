import path from 'node:path';
import type { OperationResult, ProgressListener } from '@shared/contracts';
import { toFailureResult } from '@main/services/errors/OperationError';
import type { AppLogger } from '@main/services/logging/Logger';
import { ProgressReporter } from '@main/services/progress/ProgressReporter';
import { DOWNLOAD_PERCENT_END, DOWNLOAD_PERCENT_START } from '@main/services/update/ArchiveDownloader';
import type { ArchiveDownloader } from '@main/services/update/ArchiveDownloader';
import { extractArchive } from '@main/services/update/ArchiveExtractor';
import type { ComponentInstaller } from '@main/services/update/ComponentInstaller';
import { withScopedTempDir } from '@main/services/update/scoped-temp-dir';

interface UpdateExecutorOptions {
  tempParentDir?: string;
}

/**
 * Fluxo comum de atualizacao: baixa o ZIP num diretorio temporario, extrai e
 * delega a copia para o cartao ao instalador do componente. Nao ha rollback:
 * uma falha no meio da copia deixa o cartao parcialmente atualizado.
 */
export class UpdateExecutor {
  constructor(
    private readonly installer: ComponentInstaller,
    private readonly downloader: ArchiveDownloader,
    private readonly logger: AppLogger,
    private readonly options: UpdateExecutorOptions = {}
  ) {}

  async run(deviceRoot: string, downloadUrl: string, onProgress?: ProgressListener): Promise<OperationResult> {
    const { id, displayName } = this.installer.component;
    const progress = new ProgressReporter(id, onProgress);

    this.logger.info(`update.${id}.start`, { deviceRoot, downloadUrl });
    progress.info(`Iniciando atualizacao do ${displayName}...`, 0);

    try {
      await withScopedTempDir(
        `3dse-${id}-`,
        async (tempDir) => {
          const archivePath = path.join(tempDir, `${id}_update.zip`);
          progress.info(`Baixando ${displayName}...`, DOWNLOAD_PERCENT_START);
          const download = await this.downloader.download(downloadUrl, archivePath, progress);
          progress.info(`Arquivo do ${displayName} baixado.`, DOWNLOAD_PERCENT_END);

          const extractedDir = path.join(tempDir, `extracted_${id}`);
          const extraction = await extractArchive(archivePath, extractedDir);
          progress.info(`Arquivo do ${displayName} extraido.`, 70);
          this.logger.info(`update.${id}.extracted`, { bytes: download.bytes, ...extraction });

          await this.installer.install(extractedDir, deviceRoot, progress);
        },
        this.options.tempParentDir
      );
    } catch (error) {
      const failure = toFailureResult(error, `Erro inesperado na atualizacao do ${displayName}`);
      this.logger.error(`update.${id}.failed`, {
        deviceRoot,
        errorCode: failure.errorCode,
        message: failure.message
      });
      progress.error(failure.message);
      return failure;
    }

    progress.success(`Arquivos do ${displayName} copiados com sucesso.`);
    this.logger.info(`update.${id}.finish`, { deviceRoot });
    return {
      ok: true,
      message: `Atualizacao do ${displayName} concluida.`,
      errorCode: null
    };
  }
}
