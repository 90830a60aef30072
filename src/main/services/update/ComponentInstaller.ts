import fs from 'node:fs';
import type { ComponentDefinition } from '@main/services/components/component-catalog';
import type { ProgressReporter } from '@main/services/progress/ProgressReporter';

export interface ComponentInstaller {
  readonly component: ComponentDefinition;
  install(extractedDir: string, deviceRoot: string, progress: ProgressReporter): Promise<void>;
}

export async function copyFilePreservingTimes(source: string, destination: string): Promise<void> {
  await fs.promises.copyFile(source, destination);
  const stats = await fs.promises.stat(source);
  await fs.promises.utimes(destination, stats.atime, stats.mtime);
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isFile();
  } catch {
    return false;
  }
}
