import { toElasticsearchQuery } from './elasticsearch/serializer.js';
import type { SerializeOptions } from './elasticsearch/serializer.js';
import type { EsQuery } from './elasticsearch/types.js';
import { DEFAULT_EXTRACTOR_CONFIG } from './policy/config.js';
import type { ExtractorConfig } from './policy/config.js';
import { ConditionExtractor } from './policy/extractor.js';
import type { ExtractionDiagnostic } from './policy/matcher.js';
import { QueryCompiler } from './query/compiler.js';
import type { Bindings, ConditionGroup } from './types.js';

export interface TranslateOptions extends SerializeOptions {
  config?: ExtractorConfig;
}

export interface Translation {
  conditionGroups: ConditionGroup[];
  diagnostics: ExtractionDiagnostic[];
  query: EsQuery;
}

/**
 * Extracts the conditions of a policy and compiles them into an
 * Elasticsearch filter for the given input bindings.
 * Throws BindingNotFoundError when the policy references a missing binding.
 */
export function translatePolicy(
  policyText: string,
  bindings: Bindings,
  options: TranslateOptions = {},
): Translation {
  const config = options.config ?? DEFAULT_EXTRACTOR_CONFIG;
  const { groups, diagnostics } = new ConditionExtractor(config).analyze(policyText);
  const root = new QueryCompiler({ inputRoot: config.inputRoot }).compile(groups, bindings);
  return {
    conditionGroups: groups,
    diagnostics,
    query: toElasticsearchQuery(root, options),
  };
}
