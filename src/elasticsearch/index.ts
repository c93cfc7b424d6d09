export { toElasticsearchQuery } from './serializer.js';
export type { SerializeOptions } from './serializer.js';
export type {
  EsClause,
  EsGroupQuery,
  EsLeafClause,
  EsNestedClause,
  EsQuery,
  EsTermClause,
  NestedScoreMode,
} from './types.js';
