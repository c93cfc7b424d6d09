/** Comparison operators of the supported rule shape. */
export const OPERATORS = ['==', '!=', '<', '<=', '>', '>=', 'contains', 're_match'] as const;

export type Operator = (typeof OPERATORS)[number];

export function isOperator(op: string): op is Operator {
  return (OPERATORS as readonly string[]).includes(op);
}

/**
 * One field comparison extracted from a rule block.
 *
 * `indexPath` has the data root stripped (`data.elastic.posts` → `elastic.posts`),
 * `field` has the iterator qualifier stripped (`x.author` → `author`).
 * `operator` and `valueToken` are copied verbatim from the policy text, so a
 * string literal keeps its quotes and an input reference keeps its root.
 */
export interface Condition {
  readonly iteratorVar: string;
  readonly indexPath: string;
  readonly field: string;
  readonly operator: string;
  readonly valueToken: string;
}

/** Conditions of one rule block, joined by AND. Groups are OR alternatives. */
export type ConditionGroup = readonly Condition[];

/** What the compiler needs from a condition. */
export type ComparisonCondition = Omit<Condition, 'iteratorVar'>;

/** Wire form of a condition. */
export interface ConditionRecord {
  index: string;
  field: string;
  operator: string;
  value: string;
}

export interface ConditionRecordDocument {
  conditionGroups: ConditionRecord[][];
}

/** Input binding name → value, e.g. `{ user: 'bob' }` for `input.user`. */
export type Bindings = Readonly<Record<string, string>>;
