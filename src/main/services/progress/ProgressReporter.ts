import type { OperationKind, ProgressListener, ProgressSeverity } from '@shared/contracts';

/**
 * Emite eventos de progresso de uma unica invocacao. O percentual nunca
 * regride: valores menores que o ultimo emitido sao elevados a ele.
 */
export class ProgressReporter {
  private lastPercent = 0;

  constructor(
    private readonly operation: OperationKind,
    private readonly listener?: ProgressListener
  ) {}

  get percent(): number {
    return this.lastPercent;
  }

  info(message: string, percent?: number): void {
    this.emit('info', message, percent);
  }

  warning(message: string, percent?: number): void {
    this.emit('warning', message, percent);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  success(message: string): void {
    this.emit('success', message, 100);
  }

  emit(severity: ProgressSeverity, message: string, percent?: number): void {
    if (typeof percent === 'number' && Number.isFinite(percent)) {
      this.lastPercent = Math.max(this.lastPercent, clampPercent(percent));
    }

    this.listener?.({
      operation: this.operation,
      message,
      percent: this.lastPercent,
      severity,
      timestamp: new Date().toISOString()
    });
  }
}

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, Math.trunc(value)));
}
