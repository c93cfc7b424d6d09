export { extract, ConditionExtractor, splitRuleBlocks } from './policy/extractor.js';
export type { ExtractionResult, RuleBlock } from './policy/extractor.js';
export type { ExtractionDiagnostic } from './policy/matcher.js';
export {
  createExtractorConfig,
  DEFAULT_EXTRACTOR_CONFIG,
  RULE_BLOCK_MARKER,
} from './policy/config.js';
export type { ExtractorConfig, ExtractorConfigOptions } from './policy/config.js';
export { toConditionRecords, fromConditionRecords } from './policy/records.js';
export { compile, QueryCompiler } from './query/compiler.js';
export type { QueryCompilerOptions } from './query/compiler.js';
export type {
  ClauseKind,
  GroupNode,
  LeafNode,
  NestedNode,
  QueryNode,
  RangeBound,
  RootNode,
} from './query/types.js';
export { translatePolicy } from './translate.js';
export type { TranslateOptions, Translation } from './translate.js';
export { OPERATORS, isOperator } from './types.js';
export type {
  Bindings,
  ComparisonCondition,
  Condition,
  ConditionGroup,
  ConditionRecord,
  ConditionRecordDocument,
  Operator,
} from './types.js';
export { BindingNotFoundError, UnsupportedOperatorError } from './errors.js';
