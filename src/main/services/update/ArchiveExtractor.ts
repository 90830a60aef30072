import fs from 'node:fs';
import path from 'node:path';
import AdmZip from 'adm-zip';
import { OperationError, describeError } from '@main/services/errors/OperationError';

export interface ExtractionSummary {
  files: number;
  directories: number;
}

/**
 * Extrai o ZIP inteiro em `targetDir`. Estrutura invalida, checksum quebrado
 * ou entrada apontando para fora do destino viram `corrupt_archive`.
 * As gravacoes sao assincronas; o event loop segue livre entre as entradas.
 */
export async function extractArchive(archivePath: string, targetDir: string): Promise<ExtractionSummary> {
  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (error) {
    throw new OperationError('corrupt_archive', `O arquivo ZIP baixado esta corrompido: ${describeError(error)}`);
  }

  await fs.promises.mkdir(targetDir, { recursive: true });
  const root = path.resolve(targetDir);
  const summary: ExtractionSummary = { files: 0, directories: 0 };

  for (const entry of zip.getEntries()) {
    const destination = path.resolve(root, entry.entryName);
    if (destination !== root && !destination.startsWith(`${root}${path.sep}`)) {
      throw new OperationError('corrupt_archive', `Entrada do ZIP fora do diretorio de extracao: ${entry.entryName}`);
    }

    if (entry.isDirectory) {
      await fs.promises.mkdir(destination, { recursive: true });
      summary.directories += 1;
      continue;
    }

    let data: Buffer;
    try {
      data = entry.getData();
    } catch (error) {
      throw new OperationError('corrupt_archive', `Falha ao ler '${entry.entryName}' do ZIP: ${describeError(error)}`);
    }

    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    await fs.promises.writeFile(destination, data);
    summary.files += 1;
  }

  return summary;
}
