export type RangeBound = 'lt' | 'lte' | 'gt' | 'gte';

/** One comparison clause on a document field. */
export type LeafNode =
  | { kind: 'leaf'; clause: 'term';     field: string; value: string }
  | { kind: 'leaf'; clause: 'not_term'; field: string; value: string }
  | { kind: 'leaf'; clause: 'range';    field: string; value: string; bound: RangeBound }
  | { kind: 'leaf'; clause: 'match';    field: string; value: string }
  | { kind: 'leaf'; clause: 'regexp';   field: string; value: string };

export type ClauseKind = LeafNode['clause'];

/** Scopes a leaf to a nested sub-document collection. */
export interface NestedNode {
  kind: 'nested';
  path: string;
  child: LeafNode;
}

/** All children required (AND). */
export interface GroupNode {
  kind: 'group';
  children: readonly (LeafNode | NestedNode)[];
}

/** Any one group sufficient (OR). */
export interface RootNode {
  kind: 'root';
  groups: readonly GroupNode[];
}

export type QueryNode = LeafNode | NestedNode | GroupNode | RootNode;
