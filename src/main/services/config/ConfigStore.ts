import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { AppConfig } from '@shared/contracts';

const configSchema = z.object({
  deviceRoot: z.string(),
  dumpDir: z.string().min(1),
  apiBaseUrl: z.string().url(),
  userAgent: z.string().min(1)
});

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_USER_AGENT = '3dse/0.1';

export function defaultDumpDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '3DSE_Dumps');
}

export function buildDefaultConfig(homeDir: string = os.homedir()): AppConfig {
  return {
    deviceRoot: '',
    dumpDir: defaultDumpDir(homeDir),
    apiBaseUrl: DEFAULT_API_BASE_URL,
    userAgent: DEFAULT_USER_AGENT
  };
}

interface ConfigStoreOptions {
  homeDir?: string;
  apiBaseUrlOverride?: string | null;
}

export class ConfigStore {
  private readonly filePath: string;
  private readonly defaults: AppConfig;
  private readonly apiBaseUrlOverride: string | null;
  private cache: AppConfig;

  constructor(baseDir: string, options?: ConfigStoreOptions) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, '3dse.config.json');
    this.defaults = buildDefaultConfig(options?.homeDir);
    this.apiBaseUrlOverride = normalizeUrl(options?.apiBaseUrlOverride);
    this.cache = this.load();
  }

  get(): AppConfig {
    if (this.apiBaseUrlOverride) {
      return { ...this.cache, apiBaseUrl: this.apiBaseUrlOverride };
    }

    return this.cache;
  }

  setDeviceRoot(deviceRoot: string): AppConfig {
    const sanitized = deviceRoot.trim();
    if (!sanitized) {
      return this.get();
    }

    return this.patch({ deviceRoot: sanitized });
  }

  setDumpDir(dumpDir: string): AppConfig {
    const sanitized = dumpDir.trim();
    if (!sanitized) {
      return this.get();
    }

    return this.patch({ dumpDir: path.resolve(sanitized) });
  }

  private patch(update: Partial<AppConfig>): AppConfig {
    this.cache = { ...this.cache, ...update };
    this.persist(this.cache);
    return this.get();
  }

  private load(): AppConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(this.defaults);
      return this.defaults;
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      // arquivo ilegivel: cai no default abaixo
    }

    this.persist(this.defaults);
    return this.defaults;
  }

  private persist(config: AppConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

function normalizeUrl(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  return z.string().url().safeParse(trimmed).success ? trimmed : null;
}
