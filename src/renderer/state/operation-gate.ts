export type OperationCategory = 'check' | 'update' | 'dump';

export type OperationGate = {
  isBusy: (category: OperationCategory) => boolean;
  run: <T>(category: OperationCategory, task: () => Promise<T>) => Promise<GateOutcome<T>>;
};

export type GateOutcome<T> = { started: true; value: T } | { started: false; blockedBy: OperationCategory };

// Enquanto update ou dump mexem no cartao, a verificacao de status fica bloqueada.
const BLOCKERS: Record<OperationCategory, OperationCategory[]> = {
  check: ['check', 'update', 'dump'],
  update: ['update', 'check', 'dump'],
  dump: ['dump', 'update']
};

export function createOperationGate(): OperationGate {
  const busy = new Set<OperationCategory>();

  const isBusy = (category: OperationCategory): boolean => busy.has(category);

  const run = async <T>(category: OperationCategory, task: () => Promise<T>): Promise<GateOutcome<T>> => {
    const blockedBy = BLOCKERS[category].find((candidate) => busy.has(candidate));
    if (blockedBy) {
      return { started: false, blockedBy };
    }

    busy.add(category);
    try {
      return { started: true, value: await task() };
    } finally {
      busy.delete(category);
    }
  };

  return { isBusy, run };
}
