import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { DumpBatchResult, DumpFileResult, DumpTarget, ProgressListener, ProgressSeverity } from '@shared/contracts';
import rawDumpTargets from '@main/services/dump/dump-targets.json';
import { describeError } from '@main/services/errors/OperationError';
import type { AppLogger } from '@main/services/logging/Logger';
import { ProgressReporter } from '@main/services/progress/ProgressReporter';
import { copyFilePreservingTimes, isFile } from '@main/services/update/ComponentInstaller';

const dumpTargetsSchema = z
  .array(
    z.object({
      key: z.string().min(1),
      sourcePath: z.string().min(1),
      displayName: z.string().min(1)
    })
  )
  .min(1);

export const DUMP_TARGETS: readonly DumpTarget[] = dumpTargetsSchema.parse(rawDumpTargets);

export function findDumpTargets(keys: string[]): DumpTarget[] {
  const wanted = new Set(keys);
  return DUMP_TARGETS.filter((target) => wanted.has(target.key));
}

export class DumpService {
  constructor(private readonly logger: AppLogger) {}

  listTargets(): readonly DumpTarget[] {
    return DUMP_TARGETS;
  }

  async dumpFile(
    deviceRoot: string,
    target: DumpTarget,
    destinationDir: string,
    onProgress?: ProgressListener
  ): Promise<DumpFileResult> {
    const progress = new ProgressReporter('dump', onProgress);
    const source = path.join(deviceRoot, target.sourcePath);
    const fileName = path.basename(target.sourcePath);
    const destination = path.join(destinationDir, fileName);

    try {
      await fs.promises.mkdir(destinationDir, { recursive: true });
    } catch (error) {
      return this.fail(target, progress, 'unexpected', `Nao foi possivel criar '${destinationDir}': ${describeError(error)}`);
    }

    progress.info(`Iniciando copia de ${fileName}...`, 0);

    if (!(await isFile(source))) {
      return this.fail(target, progress, 'source_not_found', `Arquivo de origem '${source}' nao encontrado no cartao SD.`);
    }

    try {
      await copyFilePreservingTimes(source, destination);
    } catch (error) {
      return this.fail(target, progress, 'unexpected', `Erro ao copiar '${fileName}': ${describeError(error)}`);
    }

    this.logger.info('dump.file.copied', { source, destination });
    progress.success(`Arquivo '${fileName}' copiado com sucesso.`);
    return {
      ok: true,
      message: `Arquivo '${fileName}' copiado para '${destination}'.`,
      errorCode: null,
      target,
      destinationPath: destination
    };
  }

  /**
   * Copia cada alvo selecionado em sequencia. Falha em um arquivo nao
   * interrompe os seguintes; o evento final resume quantos deram certo.
   */
  async dumpBatch(
    deviceRoot: string,
    targets: DumpTarget[],
    destinationDir: string,
    onProgress?: ProgressListener
  ): Promise<DumpBatchResult> {
    const progress = new ProgressReporter('dump', onProgress);
    const total = targets.length;
    const results: DumpFileResult[] = [];

    this.logger.info('dump.batch.start', { deviceRoot, destinationDir, total });

    for (const [index, target] of targets.entries()) {
      progress.info(
        `Copiando '${target.displayName}' (${index + 1}/${total})...`,
        Math.floor(((index + 0.5) / total) * 100)
      );

      const result = await this.dumpFile(deviceRoot, target, destinationDir);
      results.push(result);

      const percent = Math.floor(((index + 1) / total) * 100);
      if (result.ok) {
        progress.info(`Copia de '${target.displayName}' concluida.`, percent);
      } else {
        progress.emit('error', `Copia de '${target.displayName}' falhou.`, percent);
      }
    }

    const succeeded = results.filter((result) => result.ok).length;
    progress.emit(summarySeverity(succeeded, total), `${succeeded} de ${total} arquivos copiados.`, 100);
    this.logger.info('dump.batch.finish', { total, succeeded });

    return { total, succeeded, results };
  }

  private fail(
    target: DumpTarget,
    progress: ProgressReporter,
    errorCode: DumpFileResult['errorCode'],
    message: string
  ): DumpFileResult {
    this.logger.warn('dump.file.failed', { key: target.key, errorCode, message });
    progress.error(message);
    return {
      ok: false,
      message,
      errorCode,
      target,
      destinationPath: null
    };
  }
}

function summarySeverity(succeeded: number, total: number): ProgressSeverity {
  if (succeeded === total) {
    return 'success';
  }

  return succeeded > 0 ? 'warning' : 'error';
}
