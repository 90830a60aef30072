import type { ComponentId, DumpTarget, ProgressEvent } from '@shared/contracts';
import { COMPONENTS } from '@main/services/components/component-catalog';
import type { AppLogger, LogEntry, LogReader } from '@main/services/logging/Logger';
import type { SessionController } from '@renderer/state/session-controller';
import { createProgressQueue } from '@renderer/state/progress-queue';
import type { TerminalIo } from '@renderer/terminal/terminal-io';
import { formatProgressEvent } from '@renderer/ui/progress-view';
import { formatDumpSummary, formatStatusReport } from '@renderer/ui/status-view';

export type ConsoleCommand = 'status' | 'drive' | 'luma' | 'gm9' | 'dump' | 'folder' | 'log' | 'help' | 'exit';

const COMMAND_ALIASES: Record<string, ConsoleCommand> = {
  status: 'status',
  s: 'status',
  drive: 'drive',
  d: 'drive',
  luma: 'luma',
  gm9: 'gm9',
  godmode9: 'gm9',
  dump: 'dump',
  folder: 'folder',
  pasta: 'folder',
  log: 'log',
  logs: 'log',
  help: 'help',
  ajuda: 'help',
  '?': 'help',
  exit: 'exit',
  sair: 'exit',
  quit: 'exit'
};

const HELP_LINES = [
  'Comandos:',
  '  status  verifica Luma3DS e GodMode9 no cartao e no GitHub',
  '  drive   troca a letra do drive / caminho do cartao SD',
  '  luma    atualiza o Luma3DS (quando houver atualizacao)',
  '  gm9     instala/atualiza o GodMode9',
  '  dump    copia arquivos do console para o computador',
  '  folder  troca a pasta de destino dos dumps',
  '  log     mostra as ultimas entradas do log',
  '  exit    encerra'
];

const LOG_TAIL = 20;

const UPDATE_WARNINGS: Record<ComponentId, string> = {
  luma: 'Isto atualiza boot.firm, boot.3dsx e o conteudo da pasta luma/config.',
  godmode9: 'Isto copia GodMode9.firm para luma/payloads/ e atualiza a pasta gm9/, PRESERVANDO gm9/scripts/.'
};

export function parseCommand(input: string): ConsoleCommand | null {
  return COMMAND_ALIASES[input.trim().toLowerCase()] ?? null;
}

/**
 * Interpreta a selecao de dumps: "all"/"todos" ou numeros separados por
 * virgula/espaco (1-based). Numeros fora da lista invalidam a selecao.
 */
export function parseDumpSelection(input: string, targets: readonly DumpTarget[]): string[] | null {
  const normalized = input.trim().toLowerCase();
  if (normalized === 'all' || normalized === 'todos') {
    return targets.map((target) => target.key);
  }

  const tokens = normalized.split(/[\s,]+/).filter(Boolean);
  if (tokens.length === 0) {
    return null;
  }

  const keys: string[] = [];
  for (const token of tokens) {
    if (!/^\d+$/.test(token)) {
      return null;
    }
    const target = targets[Number(token) - 1];
    if (!target) {
      return null;
    }
    if (!keys.includes(target.key)) {
      keys.push(target.key);
    }
  }

  return keys;
}

export function formatLogEntry(entry: LogEntry): string {
  const meta = entry.meta === undefined ? '' : ` ${JSON.stringify(entry.meta)}`;
  return `${entry.ts} ${entry.level.toUpperCase()} ${entry.message}${meta}`;
}

function isAffirmative(answer: string | null): boolean {
  const normalized = answer?.trim().toLowerCase() ?? '';
  return normalized === 's' || normalized === 'sim' || normalized === 'y' || normalized === 'yes';
}

export class ConsoleApp {
  constructor(
    private readonly session: SessionController,
    private readonly dumpTargets: readonly DumpTarget[],
    private readonly io: TerminalIo,
    private readonly logger: AppLogger & LogReader
  ) {}

  async run(): Promise<void> {
    this.io.print('--- 3DSE - 3DS Everything Tool ---');
    this.io.print(`Pasta de dumps: ${this.session.dumpDir}`);

    if (!this.session.currentDeviceRoot && !(await this.promptDrive())) {
      this.io.close();
      return;
    }

    this.io.print(HELP_LINES.join('\n'));

    for (;;) {
      const answer = await this.io.ask(`\n[${this.session.currentDeviceRoot ?? '?'}] > `);
      if (answer === null) {
        break;
      }

      const command = parseCommand(answer);
      if (!command) {
        if (answer.trim()) {
          this.io.print(`Comando desconhecido: ${answer.trim()}. Digite 'help'.`);
        }
        continue;
      }

      if (command === 'exit') {
        break;
      }

      try {
        await this.dispatch(command);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('console.command.failed', { command, message });
        this.io.print(`Erro inesperado: ${message}`);
      }
    }

    this.io.print('Encerrado.');
    this.io.close();
  }

  private async dispatch(command: Exclude<ConsoleCommand, 'exit'>): Promise<void> {
    switch (command) {
      case 'status':
        await this.showStatus();
        return;
      case 'drive':
        await this.promptDrive();
        return;
      case 'luma':
        await this.runUpdate('luma');
        return;
      case 'gm9':
        await this.runUpdate('godmode9');
        return;
      case 'dump':
        await this.runDump();
        return;
      case 'folder':
        await this.promptDumpDir();
        return;
      case 'log':
        this.showLog();
        return;
      case 'help':
        this.io.print(HELP_LINES.join('\n'));
        return;
    }
  }

  private showLog(): void {
    this.io.print(`Arquivo de log: ${this.logger.path}`);
    const entries = this.logger.entries(LOG_TAIL);
    if (entries.length === 0) {
      this.io.print('Log vazio.');
      return;
    }

    this.io.print(entries.map(formatLogEntry).join('\n'));
  }

  private async promptDrive(): Promise<boolean> {
    for (;;) {
      const answer = await this.io.ask('Letra do drive do cartao SD (ex.: E:) ou caminho de montagem: ');
      if (answer === null) {
        return false;
      }

      const selected = this.session.selectDevice(answer);
      if (selected.ok) {
        this.io.print(`Cartao SD: ${selected.value}`);
        return true;
      }
      this.io.print(selected.message);
    }
  }

  private async promptDumpDir(): Promise<void> {
    const answer = await this.io.ask(`Nova pasta de destino [${this.session.dumpDir}]: `);
    if (answer === null || !answer.trim()) {
      return;
    }

    const updated = this.session.setDumpDir(answer);
    this.io.print(updated.ok ? `Pasta de destino: ${updated.value}` : updated.message);
  }

  private async showStatus(): Promise<void> {
    this.io.print('Verificando...');
    const result = await this.session.checkStatus();
    if (!result.ok) {
      this.io.print(result.message);
      return;
    }

    this.io.print(formatStatusReport(result.value).join('\n'));
  }

  private async runUpdate(component: ComponentId): Promise<void> {
    const { displayName } = COMPONENTS[component];
    const status = this.session.lastReport?.[component];
    if (!status?.updateOffered) {
      this.io.print(
        status ? `${displayName}: ${status.summary}` : "Execute 'status' antes de atualizar."
      );
      return;
    }

    this.io.print(`Atualizar ${displayName} no cartao SD (${this.session.currentDeviceRoot ?? '?'}) agora?`);
    this.io.print(UPDATE_WARNINGS[component]);
    this.io.print('Garanta que o cartao esta inserido e que nenhum outro programa o esta usando.');
    this.io.print('** FACA UM BACKUP DO SEU CARTAO SD ANTES DE CONTINUAR! **');
    if (!isAffirmative(await this.io.ask('Continuar? (s/n): '))) {
      this.io.print(`Atualizacao do ${displayName} cancelada.`);
      return;
    }

    const queue = createProgressQueue((event: ProgressEvent) => this.io.print(formatProgressEvent(event)));
    const result = await this.session.updateComponent(component, queue.push);
    await queue.drained();

    if (!result.ok) {
      this.io.print(result.message);
      return;
    }

    if (result.value.ok) {
      this.io.print(`${result.value.message} Remova o cartao SD com seguranca e insira-o no 3DS.`);
      const report = this.session.lastReport;
      if (report) {
        this.io.print(formatStatusReport(report).join('\n'));
      }
      return;
    }

    this.io.print(`Falha na atualizacao do ${displayName}: ${result.value.message}`);
    this.io.print('Verifique a mensagem de erro e, se necessario, restaure seu backup.');
  }

  private async runDump(): Promise<void> {
    this.io.print(`Os arquivos serao copiados para: ${this.session.dumpDir}`);
    this.dumpTargets.forEach((target, index) => {
      this.io.print(`  ${index + 1}. ${target.displayName}`);
    });

    const answer = await this.io.ask("Selecione numeros (ex.: 1,3) ou 'all': ");
    if (answer === null) {
      return;
    }

    const keys = parseDumpSelection(answer, this.dumpTargets);
    if (!keys) {
      this.io.print('Selecao invalida.');
      return;
    }

    if (!isAffirmative(await this.io.ask(`Copiar ${keys.length} arquivo(s) para '${this.session.dumpDir}'? (s/n): `))) {
      this.io.print('Copia cancelada.');
      return;
    }

    const queue = createProgressQueue((event: ProgressEvent) => this.io.print(formatProgressEvent(event)));
    const result = await this.session.dump(keys, queue.push);
    await queue.drained();

    if (!result.ok) {
      this.io.print(result.message);
      return;
    }

    this.io.print(formatDumpSummary(result.value).join('\n'));
  }
}
