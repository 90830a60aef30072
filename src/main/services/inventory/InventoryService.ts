import fs from 'node:fs';
import path from 'node:path';
import type { GodMode9Installation, InventoryError, LumaInstallation } from '@shared/contracts';
import { describeError } from '@main/services/errors/OperationError';
import type { AppLogger } from '@main/services/logging/Logger';

export const LUMA_DIR = 'luma';
export const LUMA_CONFIG_FILE = 'config.ini';
export const PAYLOADS_DIR = path.join('luma', 'payloads');
export const GODMODE9_FIRM = 'GodMode9.firm';

const LUMA_VERSION_PATTERN = /v(\d+\.\d+\.\d+)/;

export class InventoryService {
  constructor(private readonly logger: AppLogger) {}

  async readLumaVersion(deviceRoot: string): Promise<LumaInstallation> {
    const configPath = path.join(deviceRoot, LUMA_DIR, LUMA_CONFIG_FILE);

    const missing = probeLayout([
      { element: 'device', target: deviceRoot, kind: 'directory', message: `Drive '${deviceRoot}' nao encontrado.` },
      {
        element: 'directory',
        target: path.join(deviceRoot, LUMA_DIR),
        kind: 'directory',
        message: `Diretorio 'luma' nao encontrado em '${deviceRoot}'.`
      },
      { element: 'file', target: configPath, kind: 'file', message: `Arquivo '${configPath}' (config.ini) nao encontrado.` }
    ]);
    if (missing) {
      this.logger.info('inventory.luma.missing', { deviceRoot, missing: missing.missing });
      return { component: 'luma', version: null, error: missing };
    }

    let firstLine: string;
    try {
      firstLine = await readFirstLine(configPath);
    } catch (error) {
      const message = `Erro ao ler config.ini: ${describeError(error)}`;
      this.logger.warn('inventory.luma.read_failed', { configPath, message });
      return { component: 'luma', version: null, error: { code: 'format_error', missing: null, message } };
    }

    const match = firstLine.match(LUMA_VERSION_PATTERN);
    if (!match?.[1]) {
      this.logger.warn('inventory.luma.unparsable', { configPath });
      return {
        component: 'luma',
        version: null,
        error: {
          code: 'format_error',
          missing: null,
          message: 'A primeira linha de config.ini nao contem a versao do Luma3DS no formato esperado.'
        }
      };
    }

    return { component: 'luma', version: match[1], error: null };
  }

  checkGodMode9(deviceRoot: string): GodMode9Installation {
    const firmPath = path.join(deviceRoot, PAYLOADS_DIR, GODMODE9_FIRM);

    const missing = probeLayout([
      { element: 'device', target: deviceRoot, kind: 'directory', message: `Drive '${deviceRoot}' nao encontrado.` },
      {
        element: 'directory',
        target: path.join(deviceRoot, PAYLOADS_DIR),
        kind: 'directory',
        message: `Diretorio 'luma/payloads' nao encontrado em '${deviceRoot}'.`
      },
      { element: 'file', target: firmPath, kind: 'file', message: `Arquivo '${firmPath}' (GodMode9.firm) nao encontrado.` }
    ]);

    if (!missing) {
      return { component: 'godmode9', presence: 'installed', error: null };
    }

    this.logger.info('inventory.godmode9.missing', { deviceRoot, missing: missing.missing });
    // arquivo ausente nao e fatal: o payload simplesmente ainda nao foi instalado
    return {
      component: 'godmode9',
      presence: missing.missing === 'file' ? 'not_found' : 'error',
      error: missing
    };
  }
}

interface LayoutProbe {
  element: NonNullable<InventoryError['missing']>;
  target: string;
  kind: 'directory' | 'file';
  message: string;
}

function probeLayout(probes: LayoutProbe[]): InventoryError | null {
  for (const probe of probes) {
    if (!matchesKind(probe.target, probe.kind)) {
      return { code: 'not_found', missing: probe.element, message: probe.message };
    }
  }

  return null;
}

function matchesKind(target: string, kind: LayoutProbe['kind']): boolean {
  try {
    const stats = fs.statSync(target);
    return kind === 'directory' ? stats.isDirectory() : stats.isFile();
  } catch {
    return false;
  }
}

async function readFirstLine(filePath: string): Promise<string> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  const [first = ''] = text.split(/\r?\n/, 1);
  return first.trim();
}
