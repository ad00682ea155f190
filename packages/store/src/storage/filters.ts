import type { ChromaEquality, ChromaScalar, ChromaWhere } from './chroma-client.js';

/** Conjunctive equality constraints over metadata keys. */
export type FilterSet = Record<string, ChromaScalar>;

/** Caller-supplied filters; null/undefined entries are ignored. */
export type FilterInput = Record<string, ChromaScalar | null | undefined>;

/**
 * Merge connector defaults with caller filters. Caller values win on collision.
 */
export function composeFilters(defaults: FilterSet, filters?: FilterInput | null): FilterSet {
  const composed: FilterSet = { ...defaults };
  if (!filters) return composed;
  for (const [key, value] of Object.entries(filters)) {
    if (value === null || value === undefined) continue;
    composed[key] = value;
  }
  return composed;
}

/**
 * AND of per-key equality predicates. Chroma requires at least two operands
 * under $and, so a single predicate is sent bare and none means no `where`.
 */
export function toWhere(filters: FilterSet): ChromaWhere | undefined {
  const clauses: ChromaEquality[] = Object.entries(filters).map(([key, value]) => ({ [key]: { $eq: value } }));
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}
