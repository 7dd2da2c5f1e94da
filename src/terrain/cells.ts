/** Closed set of terrain cell kinds. Index order is the storage code. */
export const CELL_KINDS = ['empty', 'grass', 'stone', 'mulch', 'acidic', 'container', 'nest'] as const;

export type CellKind = (typeof CELL_KINDS)[number];

const CODES: Record<CellKind, number> = {
  empty: 0,
  grass: 1,
  stone: 2,
  mulch: 3,
  acidic: 4,
  container: 5,
  nest: 6
};

export function cellCode(kind: CellKind): number {
  return CODES[kind];
}

export function cellFromCode(code: number): CellKind {
  return CELL_KINDS[code] ?? 'empty';
}

/** Anything other than empty can be stood on. */
export function isSolid(kind: CellKind): boolean {
  return kind !== 'empty';
}
