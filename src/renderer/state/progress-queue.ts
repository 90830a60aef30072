import type { ProgressEvent, ProgressListener } from '@shared/contracts';

export type ProgressQueue = {
  push: ProgressListener;
  pending: () => number;
  drained: () => Promise<void>;
};

/**
 * Fila FIFO entre a tarefa em segundo plano e quem desenha a tela. Os eventos
 * sao entregues um por vez, no proprio turno do consumidor (setImmediate).
 */
export function createProgressQueue(consumer: (event: ProgressEvent) => void): ProgressQueue {
  const queue: ProgressEvent[] = [];
  let scheduled = false;
  let waiters: Array<() => void> = [];

  const flush = (): void => {
    scheduled = false;
    while (queue.length > 0) {
      const next = queue.shift();
      if (next) {
        consumer(next);
      }
    }

    const resolved = waiters;
    waiters = [];
    for (const resolve of resolved) {
      resolve();
    }
  };

  const push = (event: ProgressEvent): void => {
    queue.push(event);
    if (!scheduled) {
      scheduled = true;
      setImmediate(flush);
    }
  };

  const pending = (): number => queue.length;

  const drained = (): Promise<void> => {
    if (!scheduled && queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      waiters.push(resolve);
    });
  };

  return { push, pending, drained };
}
