import type {
  ComponentStatus,
  GodMode9Installation,
  LumaInstallation,
  ReleaseLookupResult,
  StatusReport
} from '@shared/contracts';
import { GODMODE9_COMPONENT, LUMA_COMPONENT } from '@main/services/components/component-catalog';
import type { InventoryService } from '@main/services/inventory/InventoryService';
import type { AppLogger } from '@main/services/logging/Logger';
import type { GitHubReleaseLookup } from '@main/services/releases/GitHubReleaseLookup';
import { compareVersions } from '@main/services/versioning/version-compare';

export class StatusService {
  constructor(
    private readonly inventory: InventoryService,
    private readonly releases: GitHubReleaseLookup,
    private readonly logger: AppLogger
  ) {}

  async check(deviceRoot: string): Promise<StatusReport> {
    this.logger.info('status.check.start', { deviceRoot });

    const [lumaLocal, lumaLatest, gm9Latest] = await Promise.all([
      this.inventory.readLumaVersion(deviceRoot),
      this.releases.latest(LUMA_COMPONENT),
      this.releases.latest(GODMODE9_COMPONENT)
    ]);
    const gm9Local = this.inventory.checkGodMode9(deviceRoot);

    const report: StatusReport = {
      deviceRoot,
      checkedAt: new Date().toISOString(),
      luma: evaluateLuma(lumaLocal, lumaLatest),
      godmode9: evaluateGodMode9(gm9Local, gm9Latest)
    };

    this.logger.info('status.check.finish', {
      deviceRoot,
      luma: report.luma.verdict,
      godmode9: report.godmode9.verdict
    });
    return report;
  }
}

export function evaluateLuma(local: LumaInstallation, latest: ReleaseLookupResult): ComponentStatus {
  const base = { component: 'luma' as const, local, latest };

  if (!local.version || !latest.ok) {
    return {
      ...base,
      verdict: 'comparison_unavailable',
      updateOffered: false,
      summary: 'Comparacao de versao nao disponivel.'
    };
  }

  const localVersion = local.version;
  const latestVersion = latest.release.version;
  const order = compareVersions(localVersion, latestVersion);

  if (order === -1) {
    return {
      ...base,
      verdict: 'update_available',
      updateOffered: true,
      summary: `Atualizacao disponivel! (${localVersion} -> ${latestVersion})`
    };
  }

  if (order === 0) {
    return {
      ...base,
      verdict: 'up_to_date',
      updateOffered: false,
      summary: `Atualizado (${localVersion})`
    };
  }

  return {
    ...base,
    verdict: 'local_newer',
    updateOffered: false,
    summary: `Sua versao e mais nova (${localVersion} vs. ${latestVersion})`
  };
}

/**
 * O GodMode9 nao expoe versao legivel no cartao: a instalacao e recomendada
 * quando o payload falta ou quando a release tem versao acima de 0.0.0.
 */
export function evaluateGodMode9(local: GodMode9Installation, latest: ReleaseLookupResult): ComponentStatus {
  const base = { component: 'godmode9' as const, local, latest };

  if (!latest.ok) {
    return {
      ...base,
      verdict: 'comparison_unavailable',
      updateOffered: false,
      summary: 'Verificacao de versao nao disponivel.'
    };
  }

  if (local.error?.missing === 'device') {
    return {
      ...base,
      verdict: 'comparison_unavailable',
      updateOffered: false,
      summary: 'Cartao SD nao encontrado.'
    };
  }

  const latestVersion = latest.release.version;
  if (local.presence !== 'not_found' && compareVersions('0.0.0', latestVersion) !== -1) {
    return {
      ...base,
      verdict: 'up_to_date',
      updateOffered: false,
      summary: `Parece estar atualizado (release: ${latestVersion}).`
    };
  }

  return {
    ...base,
    verdict: 'install_recommended',
    updateOffered: true,
    summary: `Atualizacao/instalacao recomendada! (Mais recente: ${latestVersion})`
  };
}
