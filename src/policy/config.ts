import { OPERATORS } from '../types.js';

/** Marks the start of every rule block. Part of the supported rule shape. */
export const RULE_BLOCK_MARKER = 'allowed contains x if {';

export interface ExtractorConfig {
  /** Comparison operators the matcher accepts. */
  readonly operators: readonly string[];
  /** Root of index paths in iteration headers (`data` in `some x in data.posts`). */
  readonly dataRoot: string;
  /** Root of value references resolved against input bindings. */
  readonly inputRoot: string;
}

export interface ExtractorConfigOptions {
  operators?: readonly string[];
  dataRoot?: string;
  inputRoot?: string;
}

const ROOT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const WORD_OPERATOR_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SYMBOL_OPERATOR_PATTERN = /^[=!<>:]+$/;

/**
 * Validates the options and returns a frozen configuration.
 * Throws if the operator list is empty, an operator cannot be tokenized,
 * or a root is not a plain identifier.
 */
export function createExtractorConfig(options: ExtractorConfigOptions = {}): ExtractorConfig {
  const operators = options.operators ?? OPERATORS;
  const dataRoot = options.dataRoot ?? 'data';
  const inputRoot = options.inputRoot ?? 'input';

  if (operators.length === 0) {
    throw new Error('createExtractorConfig: operators must not be empty');
  }
  for (const op of operators) {
    if (!WORD_OPERATOR_PATTERN.test(op) && !SYMBOL_OPERATOR_PATTERN.test(op)) {
      throw new Error(
        `createExtractorConfig: operator "${op}" must be a word or a run of = ! < > :`,
      );
    }
  }
  for (const [label, root] of [['dataRoot', dataRoot], ['inputRoot', inputRoot]] as const) {
    if (!ROOT_PATTERN.test(root)) {
      throw new Error(`createExtractorConfig: ${label} "${root}" must be an identifier`);
    }
  }
  if (dataRoot === inputRoot) {
    throw new Error('createExtractorConfig: dataRoot and inputRoot must differ');
  }

  return Object.freeze({
    operators: Object.freeze([...new Set(operators)]),
    dataRoot,
    inputRoot,
  });
}

export const DEFAULT_EXTRACTOR_CONFIG: ExtractorConfig = createExtractorConfig();
