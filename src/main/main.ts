import os from 'node:os';
import path from 'node:path';
import { ConfigStore } from '@main/services/config/ConfigStore';
import { DumpService } from '@main/services/dump/DumpService';
import { InventoryService } from '@main/services/inventory/InventoryService';
import { Logger } from '@main/services/logging/Logger';
import { GitHubReleaseLookup } from '@main/services/releases/GitHubReleaseLookup';
import { StatusService } from '@main/services/status/StatusService';
import { UpdateService } from '@main/services/update/UpdateService';
import { SessionController } from '@renderer/state/session-controller';
import { ConsoleApp } from '@renderer/terminal/ConsoleApp';
import { createReadlineIo } from '@renderer/terminal/terminal-io';

function resolveBaseDir(): string {
  const fromEnv = process.env.TDSE_HOME?.trim();
  return fromEnv ? path.resolve(fromEnv) : path.join(os.homedir(), '.3dse');
}

function resolveDebugLogMirrorPath(): string | null {
  const value = process.env.TDSE_DEBUG_LOG_MIRROR?.trim();
  return value ? path.resolve(value) : null;
}

async function bootstrap(): Promise<void> {
  const baseDir = resolveBaseDir();
  const logger = new Logger(baseDir, {
    mirrorFilePath: resolveDebugLogMirrorPath()
  });
  const configStore = new ConfigStore(baseDir, {
    apiBaseUrlOverride: process.env.TDSE_GITHUB_API ?? null
  });
  const config = configStore.get();

  const releases = new GitHubReleaseLookup({
    apiBaseUrl: config.apiBaseUrl,
    userAgent: config.userAgent,
    logger
  });
  const inventory = new InventoryService(logger);
  const statusService = new StatusService(inventory, releases, logger);
  const updateService = new UpdateService(logger, { userAgent: config.userAgent });
  const dumpService = new DumpService(logger);

  const session = new SessionController({
    statusService,
    updateService,
    dumpService,
    configStore,
    logger
  });

  logger.info('app.bootstrap', {
    baseDir,
    logFile: logger.path,
    apiBaseUrl: config.apiBaseUrl,
    dumpDir: config.dumpDir,
    platform: process.platform
  });

  const app = new ConsoleApp(session, dumpService.listTargets(), createReadlineIo(), logger);
  await app.run();
  logger.info('app.exit');
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`Falha ao iniciar: ${message}\n`);
  process.exitCode = 1;
});
