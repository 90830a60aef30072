import path from 'node:path';

export type DeviceRootResolution =
  | { ok: true; root: string }
  | { ok: false; message: string };

const DRIVE_LETTER = /^([a-zA-Z]):?[\\/]?$/;

/**
 * Normaliza o identificador digitado pelo usuario. No Windows uma letra
 * solta ("e", "E:", "E:\") vira a raiz do drive; nos demais sistemas o valor
 * e tratado como ponto de montagem.
 */
export function resolveDeviceRoot(
  input: string,
  platform: NodeJS.Platform = process.platform,
  cwd: string = process.cwd()
): DeviceRootResolution {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, message: 'Informe a letra do drive ou o caminho do cartao SD.' };
  }

  if (platform === 'win32') {
    const match = trimmed.match(DRIVE_LETTER);
    if (match?.[1]) {
      return { ok: true, root: `${match[1].toUpperCase()}:\\` };
    }

    return { ok: true, root: path.win32.resolve(cwd, trimmed) };
  }

  return { ok: true, root: path.posix.resolve(cwd, trimmed) };
}
