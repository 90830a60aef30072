import type {
  ComponentId,
  DumpBatchResult,
  OperationResult,
  ProgressListener,
  StatusReport
} from '@shared/contracts';
import type { ConfigStore } from '@main/services/config/ConfigStore';
import { resolveDeviceRoot } from '@main/services/device/device-root';
import type { DumpService } from '@main/services/dump/DumpService';
import { findDumpTargets } from '@main/services/dump/DumpService';
import type { AppLogger } from '@main/services/logging/Logger';
import type { StatusService } from '@main/services/status/StatusService';
import type { UpdateService } from '@main/services/update/UpdateService';
import { createOperationGate, type OperationCategory, type OperationGate } from '@renderer/state/operation-gate';

export type SessionActionResult<T> = { ok: true; value: T } | { ok: false; message: string };

export type SessionControllerDeps = {
  statusService: StatusService;
  updateService: UpdateService;
  dumpService: DumpService;
  configStore: ConfigStore;
  logger: AppLogger;
  platform?: NodeJS.Platform;
  gate?: OperationGate;
};

const BLOCKED_MESSAGES: Record<OperationCategory, string> = {
  check: 'Uma verificacao de status ja esta em andamento.',
  update: 'Uma atualizacao esta em andamento; aguarde terminar.',
  dump: 'Uma copia de arquivos esta em andamento; aguarde terminar.'
};

export class SessionController {
  private readonly gate: OperationGate;
  private readonly platform: NodeJS.Platform;
  private deviceRoot: string | null = null;
  private report: StatusReport | null = null;

  constructor(private readonly deps: SessionControllerDeps) {
    this.gate = deps.gate ?? createOperationGate();
    this.platform = deps.platform ?? process.platform;

    const remembered = deps.configStore.get().deviceRoot;
    if (remembered) {
      const resolved = resolveDeviceRoot(remembered, this.platform);
      this.deviceRoot = resolved.ok ? resolved.root : null;
    }
  }

  get currentDeviceRoot(): string | null {
    return this.deviceRoot;
  }

  get lastReport(): StatusReport | null {
    return this.report;
  }

  get dumpDir(): string {
    return this.deps.configStore.get().dumpDir;
  }

  isBusy(category: OperationCategory): boolean {
    return this.gate.isBusy(category);
  }

  selectDevice(input: string): SessionActionResult<string> {
    const resolved = resolveDeviceRoot(input, this.platform);
    if (!resolved.ok) {
      return { ok: false, message: resolved.message };
    }

    if (resolved.root !== this.deviceRoot) {
      this.report = null;
    }
    this.deviceRoot = resolved.root;
    this.deps.configStore.setDeviceRoot(resolved.root);
    this.deps.logger.info('session.device.selected', { root: resolved.root });
    return { ok: true, value: resolved.root };
  }

  setDumpDir(dir: string): SessionActionResult<string> {
    const trimmed = dir.trim();
    if (!trimmed) {
      return { ok: false, message: 'Informe uma pasta de destino.' };
    }

    const updated = this.deps.configStore.setDumpDir(trimmed);
    return { ok: true, value: updated.dumpDir };
  }

  async checkStatus(): Promise<SessionActionResult<StatusReport>> {
    const root = this.deviceRoot;
    if (!root) {
      return { ok: false, message: 'Informe a letra do drive do cartao SD primeiro.' };
    }

    const outcome = await this.gate.run('check', () => this.deps.statusService.check(root));
    if (!outcome.started) {
      return { ok: false, message: BLOCKED_MESSAGES[outcome.blockedBy] };
    }

    this.report = outcome.value;
    return { ok: true, value: outcome.value };
  }

  /**
   * Aplica a atualizacao oferecida pela ultima verificacao. Em caso de
   * sucesso o status e verificado de novo para confirmar o novo estado.
   */
  async updateComponent(
    component: ComponentId,
    onProgress?: ProgressListener
  ): Promise<SessionActionResult<OperationResult>> {
    const root = this.deviceRoot;
    const status = this.report?.[component];
    if (!root || !status || !status.latest.ok) {
      return {
        ok: false,
        message: 'Nenhuma URL de download ou drive disponivel. Execute a verificacao de status novamente.'
      };
    }

    if (!status.updateOffered) {
      return { ok: false, message: `Nenhuma atualizacao oferecida: ${status.summary}` };
    }

    const release = status.latest.release;
    const outcome = await this.gate.run('update', () =>
      this.deps.updateService.apply(component, root, release, onProgress)
    );
    if (!outcome.started) {
      return { ok: false, message: BLOCKED_MESSAGES[outcome.blockedBy] };
    }

    if (outcome.value.ok) {
      await this.checkStatus();
    }

    return { ok: true, value: outcome.value };
  }

  async dump(keys: string[], onProgress?: ProgressListener): Promise<SessionActionResult<DumpBatchResult>> {
    const root = this.deviceRoot;
    if (!root) {
      return { ok: false, message: 'Informe a letra do drive do cartao SD e verifique o status primeiro.' };
    }

    const targets = findDumpTargets(keys);
    if (targets.length === 0) {
      return { ok: false, message: 'Selecione pelo menos um arquivo para copiar.' };
    }

    const destination = this.dumpDir;
    const outcome = await this.gate.run('dump', () =>
      this.deps.dumpService.dumpBatch(root, targets, destination, onProgress)
    );
    if (!outcome.started) {
      return { ok: false, message: BLOCKED_MESSAGES[outcome.blockedBy] };
    }

    return { ok: true, value: outcome.value };
  }
}
