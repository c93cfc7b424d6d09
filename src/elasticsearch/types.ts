import type { RangeBound } from '../query/types.js';

export type NestedScoreMode = 'avg' | 'max' | 'min' | 'sum' | 'none';

export type EsTermClause = { term: Record<string, string> };

export type EsLeafClause =
  | EsTermClause
  | { bool: { must_not: EsTermClause[] } }
  | { range: Record<string, Partial<Record<RangeBound, string>>> }
  | { match: Record<string, string> }
  | { regexp: Record<string, string> };

export interface EsNestedClause {
  nested: {
    path: string;
    query: EsLeafClause;
    score_mode?: NestedScoreMode;
  };
}

export type EsClause = EsLeafClause | EsNestedClause;

export interface EsGroupQuery {
  bool: { must: EsClause[] };
}

export type EsQuery =
  | { bool: { should: EsGroupQuery[] } }
  | { match_none: Record<string, never> };
