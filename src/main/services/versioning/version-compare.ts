export type VersionOrder = -1 | 0 | 1;

const EDGE_NOISE = /^[^\d.]*|[^\d.]*$/g;

export function parseVersion(value: string): bigint[] {
  const normalized = value.replace(EDGE_NOISE, '');
  const parts: bigint[] = [];

  for (const segment of normalized.split('.')) {
    if (!/^\d+$/.test(segment)) {
      return [];
    }
    parts.push(BigInt(segment));
  }

  return parts;
}

/**
 * Ordena duas versoes pontuadas. Componentes ausentes valem zero, entao
 * "1.2" e "1.2.0" sao iguais; entrada malformada vira versao vazia.
 *
 * @returns -1 quando `local` e mais antiga, 1 quando e mais nova, 0 quando iguais.
 */
export function compareVersions(local: string, latest: string): VersionOrder {
  const left = parseVersion(local);
  const right = parseVersion(latest);
  const max = Math.max(left.length, right.length);

  for (let i = 0; i < max; i += 1) {
    const a = left[i] ?? 0n;
    const b = right[i] ?? 0n;
    if (a < b) {
      return -1;
    }
    if (a > b) {
      return 1;
    }
  }

  return 0;
}
