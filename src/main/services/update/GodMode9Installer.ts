import fs from 'node:fs';
import path from 'node:path';
import { GODMODE9_COMPONENT } from '@main/services/components/component-catalog';
import { OperationError } from '@main/services/errors/OperationError';
import { GODMODE9_FIRM, PAYLOADS_DIR } from '@main/services/inventory/InventoryService';
import type { AppLogger } from '@main/services/logging/Logger';
import type { ProgressReporter } from '@main/services/progress/ProgressReporter';
import type { ComponentInstaller } from '@main/services/update/ComponentInstaller';
import { copyFilePreservingTimes, isDirectory } from '@main/services/update/ComponentInstaller';

export const GM9_DIR = 'gm9';
export const PRESERVED_CHILD = 'scripts';

export class GodMode9Installer implements ComponentInstaller {
  readonly component = GODMODE9_COMPONENT;

  constructor(private readonly logger: AppLogger) {}

  async install(extractedDir: string, deviceRoot: string, progress: ProgressReporter): Promise<void> {
    const firmSource = await findFileByName(extractedDir, GODMODE9_FIRM);
    if (!firmSource) {
      throw new OperationError(
        'required_file_missing',
        `'${GODMODE9_FIRM}' nao encontrado no arquivo extraido do GodMode9.`
      );
    }

    const payloadsDir = path.join(deviceRoot, PAYLOADS_DIR);
    await fs.promises.mkdir(payloadsDir, { recursive: true });

    progress.info(`Copiando ${GODMODE9_FIRM}...`, 75);
    await copyFilePreservingTimes(firmSource, path.join(payloadsDir, GODMODE9_FIRM));

    const sourceGm9 = path.join(extractedDir, GM9_DIR);
    if (!(await isDirectory(sourceGm9))) {
      this.logger.info('update.godmode9.no_gm9_dir', { extractedDir });
      return;
    }

    progress.info('Atualizando pasta gm9/...', 80);
    await mergePreservingScripts(sourceGm9, path.join(deviceRoot, GM9_DIR), progress);
  }
}

/**
 * Busca em profundidade, olhando os arquivos de cada nivel antes de descer
 * para os subdiretorios (em ordem alfabetica).
 */
export async function findFileByName(rootDir: string, fileName: string): Promise<string | null> {
  const entries = await fs.promises.readdir(rootDir, { withFileTypes: true });

  const direct = entries.find((entry) => entry.isFile() && entry.name === fileName);
  if (direct) {
    return path.join(rootDir, direct.name);
  }

  const subdirs = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  for (const name of subdirs) {
    const found = await findFileByName(path.join(rootDir, name), fileName);
    if (found) {
      return found;
    }
  }

  return null;
}

/**
 * Mescla `sourceDir` em `targetDir`: arquivos sao sobrescritos, diretorios
 * sao apagados e recriados a partir da origem, e `scripts` nunca e tocado.
 */
export async function mergePreservingScripts(
  sourceDir: string,
  targetDir: string,
  progress: ProgressReporter
): Promise<void> {
  await fs.promises.mkdir(targetDir, { recursive: true });

  const entries = await fs.promises.readdir(sourceDir, { withFileTypes: true });
  for (const entry of entries) {
    const source = path.join(sourceDir, entry.name);
    const target = path.join(targetDir, entry.name);

    if (entry.name === PRESERVED_CHILD) {
      progress.info(`Mantendo pasta ${GM9_DIR}/${PRESERVED_CHILD}...`, 85);
      continue;
    }

    if (entry.isDirectory()) {
      await fs.promises.rm(target, { recursive: true, force: true });
      await fs.promises.cp(source, target, { recursive: true, preserveTimestamps: true });
    } else if (entry.isFile()) {
      await copyFilePreservingTimes(source, target);
    }
  }
}
