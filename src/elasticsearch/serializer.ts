import type { GroupNode, LeafNode, NestedNode, RangeBound, RootNode } from '../query/types.js';
import type {
  EsClause,
  EsGroupQuery,
  EsLeafClause,
  EsQuery,
  NestedScoreMode,
} from './types.js';

export interface SerializeOptions {
  /** Adds `score_mode` to nested clauses. Omitted by default. */
  nestedScoreMode?: NestedScoreMode;
}

function serializeLeaf(leaf: LeafNode): EsLeafClause {
  switch (leaf.clause) {
    case 'term':
      return { term: { [leaf.field]: leaf.value } };
    case 'not_term':
      return { bool: { must_not: [{ term: { [leaf.field]: leaf.value } }] } };
    case 'range': {
      const bounds: Partial<Record<RangeBound, string>> = {};
      bounds[leaf.bound] = leaf.value;
      return { range: { [leaf.field]: bounds } };
    }
    case 'match':
      return { match: { [leaf.field]: leaf.value } };
    case 'regexp':
      return { regexp: { [leaf.field]: leaf.value } };
    default: {
      const unreachable: never = leaf;
      throw new Error(`Unknown clause: ${JSON.stringify(unreachable)}`);
    }
  }
}

function serializeChild(node: LeafNode | NestedNode, options: SerializeOptions): EsClause {
  if (node.kind === 'leaf') {
    return serializeLeaf(node);
  }
  const query = serializeLeaf(node.child);
  if (options.nestedScoreMode === undefined) {
    return { nested: { path: node.path, query } };
  }
  return { nested: { path: node.path, query, score_mode: options.nestedScoreMode } };
}

function serializeGroup(group: GroupNode, options: SerializeOptions): EsGroupQuery {
  return { bool: { must: group.children.map((child) => serializeChild(child, options)) } };
}

/**
 * Renders a query tree as an Elasticsearch bool query: `should` across
 * groups, `must` within a group. A tree without groups renders as
 * `match_none`, since an empty `should` would match every document.
 */
export function toElasticsearchQuery(root: RootNode, options: SerializeOptions = {}): EsQuery {
  if (root.groups.length === 0) {
    return { match_none: {} };
  }
  return { bool: { should: root.groups.map((group) => serializeGroup(group, options)) } };
}
