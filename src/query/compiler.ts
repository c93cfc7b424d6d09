import { BindingNotFoundError, UnsupportedOperatorError } from '../errors.js';
import { isOperator } from '../types.js';
import type { Bindings, ComparisonCondition, Operator } from '../types.js';
import type { GroupNode, LeafNode, NestedNode, RootNode } from './types.js';

type LeafFactory = (field: string, value: string) => LeafNode;

const LEAF_FACTORIES: Record<Operator, LeafFactory> = {
  '==': (field, value) => ({ kind: 'leaf', clause: 'term', field, value }),
  '!=': (field, value) => ({ kind: 'leaf', clause: 'not_term', field, value }),
  '<': (field, value) => ({ kind: 'leaf', clause: 'range', field, value, bound: 'lt' }),
  '<=': (field, value) => ({ kind: 'leaf', clause: 'range', field, value, bound: 'lte' }),
  '>': (field, value) => ({ kind: 'leaf', clause: 'range', field, value, bound: 'gt' }),
  '>=': (field, value) => ({ kind: 'leaf', clause: 'range', field, value, bound: 'gte' }),
  contains: (field, value) => ({ kind: 'leaf', clause: 'match', field, value }),
  re_match: (field, value) => ({ kind: 'leaf', clause: 'regexp', field, value }),
};

export interface QueryCompilerOptions {
  /** Root that marks a value token as an input reference. Defaults to `input`. */
  inputRoot?: string;
}

/**
 * Compiles condition groups into a query tree: one OR'd group per condition
 * group, one AND'd clause per condition. Conditions on a multi-segment index
 * path are wrapped in a nested node carrying that path.
 *
 * Compilation is all-or-nothing: the first unresolved binding or unknown
 * operator throws and no tree is returned.
 */
export class QueryCompiler {
  private readonly inputPrefix: string;

  constructor(options: QueryCompilerOptions = {}) {
    this.inputPrefix = `${options.inputRoot ?? 'input'}.`;
  }

  compile(
    groups: readonly (readonly ComparisonCondition[])[],
    bindings: Bindings,
  ): RootNode {
    const compiled: GroupNode[] = [];
    for (const group of groups) {
      // An empty group would match every document
      if (group.length === 0) continue;
      compiled.push({
        kind: 'group',
        children: group.map((condition) => this.compileCondition(condition, bindings)),
      });
    }
    return { kind: 'root', groups: compiled };
  }

  private compileCondition(
    condition: ComparisonCondition,
    bindings: Bindings,
  ): LeafNode | NestedNode {
    if (!isOperator(condition.operator)) {
      throw new UnsupportedOperatorError(condition.operator);
    }
    const value = this.resolveValue(condition.valueToken, bindings);
    const leaf = LEAF_FACTORIES[condition.operator](condition.field, value);

    if (condition.indexPath.includes('.')) {
      return { kind: 'nested', path: condition.indexPath, child: leaf };
    }
    return leaf;
  }

  /** Looks up input references in the bindings; strips the quotes off literals. */
  resolveValue(valueToken: string, bindings: Bindings): string {
    if (valueToken.startsWith(this.inputPrefix)) {
      const name = valueToken.slice(this.inputPrefix.length);
      const value = Object.hasOwn(bindings, name) ? bindings[name] : undefined;
      if (value === undefined) {
        throw new BindingNotFoundError(name);
      }
      return value;
    }
    if (valueToken.length >= 2 && valueToken.startsWith('"') && valueToken.endsWith('"')) {
      return valueToken.slice(1, -1);
    }
    return valueToken;
  }
}

const defaultCompiler = new QueryCompiler();

/** Compiles condition groups using the default input root. */
export function compile(
  groups: readonly (readonly ComparisonCondition[])[],
  bindings: Bindings,
): RootNode {
  return defaultCompiler.compile(groups, bindings);
}
