import type { ConditionGroup } from '../types.js';
import { DEFAULT_EXTRACTOR_CONFIG, RULE_BLOCK_MARKER } from './config.js';
import type { ExtractorConfig } from './config.js';
import { tokenize } from './lexer.js';
import { matchBlock } from './matcher.js';
import type { ExtractionDiagnostic } from './matcher.js';

export interface RuleBlock {
  index: number;
  text: string;
  /** Position in the policy text where the block starts. */
  line: number;
  column: number;
}

export interface ExtractionResult {
  groups: ConditionGroup[];
  diagnostics: ExtractionDiagnostic[];
}

/**
 * Splits policy text on the rule block marker. Text before the first marker
 * is block 0 and is matched like any other block.
 */
export function splitRuleBlocks(policyText: string): RuleBlock[] {
  const blocks: RuleBlock[] = [];
  let line = 1;
  let column = 1;
  for (const text of policyText.split(RULE_BLOCK_MARKER)) {
    blocks.push({ index: blocks.length, text, line, column });
    for (const ch of text + RULE_BLOCK_MARKER) {
      if (ch === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
  }
  return blocks;
}

/**
 * Extracts condition groups from policy text, one group per rule block
 * that yields at least one condition.
 *
 * Extraction is lenient: statements outside the supported rule shape are
 * skipped and only reported through {@link ConditionExtractor.analyze}.
 * Instances hold no mutable state and may be shared.
 */
export class ConditionExtractor {
  constructor(readonly config: ExtractorConfig = DEFAULT_EXTRACTOR_CONFIG) {}

  analyze(policyText: string): ExtractionResult {
    const groups: ConditionGroup[] = [];
    const diagnostics: ExtractionDiagnostic[] = [];

    for (const block of splitRuleBlocks(policyText)) {
      const tokens = tokenize(block.text, block.line, block.column);
      const match = matchBlock(tokens, this.config, block.index);
      if (match.conditions.length > 0) {
        groups.push(match.conditions);
      }
      diagnostics.push(...match.diagnostics);
    }

    return { groups, diagnostics };
  }

  extract(policyText: string): ConditionGroup[] {
    return this.analyze(policyText).groups;
  }
}

const defaultExtractor = new ConditionExtractor();

/** Extracts condition groups using the default configuration. */
export function extract(policyText: string): ConditionGroup[] {
  return defaultExtractor.extract(policyText);
}
