// Data source kinds, indexed by their wire code (collectd network.h: DS_TYPE_*)
export const VALUE_KINDS = ['counter', 'gauge', 'derive', 'absolute'] as const

export type ValueKind = (typeof VALUE_KINDS)[number]

export function valueKindCode(kind: ValueKind): number {
  return VALUE_KINDS.indexOf(kind)
}

export function valueKindFromCode(code: number): ValueKind | null {
  return VALUE_KINDS.find((_, i) => i === code) ?? null
}

/** Matches a types.db kind keyword (`GAUGE`, `derive`, ...) case-insensitively. */
export function parseValueKind(keyword: string): ValueKind | null {
  const name = keyword.toLowerCase()
  return VALUE_KINDS.find((kind) => kind === name) ?? null
}
