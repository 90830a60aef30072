import fs from 'node:fs';
import path from 'node:path';
import { LUMA_COMPONENT } from '@main/services/components/component-catalog';
import type { AppLogger } from '@main/services/logging/Logger';
import type { ProgressReporter } from '@main/services/progress/ProgressReporter';
import type { ComponentInstaller } from '@main/services/update/ComponentInstaller';
import { copyFilePreservingTimes, isDirectory, isFile } from '@main/services/update/ComponentInstaller';

const ROOT_FILES: Array<{ name: string; percent: number }> = [
  { name: 'boot.firm', percent: 75 },
  { name: 'boot.3dsx', percent: 80 }
];

const CONFIG_DIR = path.join('luma', 'config');

export class LumaInstaller implements ComponentInstaller {
  readonly component = LUMA_COMPONENT;

  constructor(private readonly logger: AppLogger) {}

  async install(extractedDir: string, deviceRoot: string, progress: ProgressReporter): Promise<void> {
    for (const file of ROOT_FILES) {
      const source = path.join(extractedDir, file.name);
      if (!(await isFile(source))) {
        this.logger.warn('update.luma.optional_missing', { file: file.name });
        progress.warning(`Aviso: '${file.name}' nao encontrado no arquivo do Luma3DS.`, file.percent);
        continue;
      }

      progress.info(`Copiando ${file.name}...`, file.percent);
      await copyFilePreservingTimes(source, path.join(deviceRoot, file.name));
    }

    const sourceConfigDir = path.join(extractedDir, CONFIG_DIR);
    if (!(await isDirectory(sourceConfigDir))) {
      this.logger.warn('update.luma.optional_missing', { file: 'luma/config' });
      progress.warning('Aviso: pasta luma/config nao encontrada na release.', 85);
      return;
    }

    progress.info('Atualizando pasta luma/config...', 85);
    const targetConfigDir = path.join(deviceRoot, CONFIG_DIR);
    await fs.promises.mkdir(targetConfigDir, { recursive: true });

    const entries = await fs.promises.readdir(sourceConfigDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      await copyFilePreservingTimes(path.join(sourceConfigDir, entry.name), path.join(targetConfigDir, entry.name));
    }
  }
}
