import type { ComponentId, OperationResult, ProgressListener, ReleaseInfo } from '@shared/contracts';
import type { AppLogger } from '@main/services/logging/Logger';
import { ArchiveDownloader } from '@main/services/update/ArchiveDownloader';
import { GodMode9Installer } from '@main/services/update/GodMode9Installer';
import { LumaInstaller } from '@main/services/update/LumaInstaller';
import { UpdateExecutor } from '@main/services/update/UpdateExecutor';

interface UpdateServiceOptions {
  userAgent?: string;
  tempParentDir?: string;
}

export class UpdateService {
  private readonly executors: Record<ComponentId, UpdateExecutor>;

  constructor(
    private readonly logger: AppLogger,
    options: UpdateServiceOptions = {}
  ) {
    const downloader = new ArchiveDownloader({ userAgent: options.userAgent });
    const executorOptions = { tempParentDir: options.tempParentDir };
    this.executors = {
      luma: new UpdateExecutor(new LumaInstaller(logger), downloader, logger, executorOptions),
      godmode9: new UpdateExecutor(new GodMode9Installer(logger), downloader, logger, executorOptions)
    };
  }

  async apply(
    component: ComponentId,
    deviceRoot: string,
    release: ReleaseInfo,
    onProgress?: ProgressListener
  ): Promise<OperationResult> {
    this.logger.info('update.apply.requested', {
      component,
      deviceRoot,
      version: release.version
    });
    return this.executors[component].run(deviceRoot, release.downloadUrl, onProgress);
  }
}
