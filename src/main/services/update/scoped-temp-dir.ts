import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * Executa `task` com um diretorio temporario exclusivo, removido em qualquer
 * saida (sucesso, falha tratada ou excecao).
 */
export async function withScopedTempDir<T>(
  prefix: string,
  task: (dir: string) => Promise<T>,
  parentDir: string = os.tmpdir()
): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(parentDir, prefix));
  try {
    return await task(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
