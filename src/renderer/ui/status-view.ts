import type { ComponentStatus, DumpBatchResult, GodMode9Installation, LumaInstallation, StatusReport } from '@shared/contracts';

export function formatStatusReport(report: StatusReport): string[] {
  return [
    `Cartao SD: ${report.deviceRoot}`,
    '',
    '--- Luma3DS ---',
    ...formatComponent(report.luma),
    '',
    '--- GodMode9 ---',
    ...formatComponent(report.godmode9)
  ];
}

export function formatComponent(status: ComponentStatus): string[] {
  const latest = status.latest.ok ? status.latest.release.version : status.latest.message;
  const lines = [formatLocal(status.local), `Versao mais recente (GitHub): ${latest}`, `Status: ${status.summary}`];

  if (status.updateOffered) {
    lines.push(`Use '${status.component === 'luma' ? 'luma' : 'gm9'}' para atualizar.`);
  }

  return lines;
}

function formatLocal(local: LumaInstallation | GodMode9Installation): string {
  if (local.component === 'luma') {
    return `Versao local: ${local.version ?? local.error?.message ?? 'N/D'}`;
  }

  if (local.presence === 'installed') {
    return 'GodMode9 local: Instalado';
  }

  return `Arquivos locais: ${local.error?.message ?? 'N/D'}`;
}

export function formatDumpSummary(result: DumpBatchResult): string[] {
  const header =
    result.succeeded === result.total
      ? `Todos os ${result.total} arquivos foram copiados!`
      : result.succeeded > 0
        ? `${result.succeeded} de ${result.total} arquivos copiados. Houve erros em alguns arquivos.`
        : 'Nenhum arquivo pode ser copiado.';

  return [header, 'Detalhes:', ...result.results.map((item) => `${item.target.displayName}: ${item.message}`)];
}
