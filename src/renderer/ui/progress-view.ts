import type { OperationKind, ProgressEvent, ProgressSeverity } from '@shared/contracts';

const OPERATION_LABELS: Record<OperationKind, string> = {
  luma: 'Luma3DS',
  godmode9: 'GodMode9',
  dump: 'Dump'
};

const SEVERITY_TAGS: Record<ProgressSeverity, string> = {
  info: '',
  warning: 'AVISO ',
  error: 'ERRO ',
  success: 'OK '
};

export function renderProgressBar(percent: number, width = 20): string {
  const clamped = Math.min(100, Math.max(0, Math.trunc(percent)));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

export function formatProgressEvent(event: ProgressEvent): string {
  const percent = `${event.percent}%`.padStart(4, ' ');
  return `${OPERATION_LABELS[event.operation]} ${renderProgressBar(event.percent)} ${percent} ${SEVERITY_TAGS[event.severity]}${event.message}`;
}
