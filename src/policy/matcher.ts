import type { Condition } from '../types.js';
import type { ExtractorConfig } from './config.js';
import type { Token } from './lexer.js';

/** A statement the matcher skipped, with where it started. */
export interface ExtractionDiagnostic {
  /** Index of the rule block; 0 is any text before the first block marker. */
  block: number;
  line: number;
  column: number;
  message: string;
}

export interface BlockMatch {
  conditions: Condition[];
  diagnostics: ExtractionDiagnostic[];
}

interface Scope {
  iteratorVar: string;
  indexPath: string;
}

/**
 * Recursive-descent matcher for the statements of one rule block:
 *
 * ```
 * statement  := iteration | comparison
 * iteration  := "some" IDENT "in" path
 * comparison := path OPERATOR value
 * path       := IDENT ("." IDENT)*
 * value      := STRING | <inputRoot> "." IDENT ("." IDENT)*
 * ```
 *
 * Statements end at a separator token, though a comparison may directly
 * follow an iteration header on the same line. A statement that does not
 * match is skipped up to the next separator and reported as a diagnostic.
 */
class BlockMatcher {
  private pos = 0;
  private current: Scope | undefined;
  private readonly scopes = new Map<string, string>();
  private readonly conditions: Condition[] = [];
  private readonly diagnostics: ExtractionDiagnostic[] = [];

  constructor(
    private readonly tokens: readonly Token[],
    private readonly config: ExtractorConfig,
    private readonly block: number,
  ) {}

  run(): BlockMatch {
    while (this.pos < this.tokens.length) {
      const start = this.peek();
      if (start === undefined) break;
      if (start.type === 'separator') {
        this.pos++;
        continue;
      }
      const failure = this.isKeyword(start, 'some') ? this.iteration() : this.comparison();
      if (failure !== undefined) {
        this.diagnostics.push({
          block: this.block,
          line: start.line,
          column: start.column,
          message: failure,
        });
        this.skipStatement();
      }
    }
    return { conditions: this.conditions, diagnostics: this.diagnostics };
  }

  /** Returns a failure message, or undefined when the header was bound. */
  private iteration(): string | undefined {
    this.pos++; // 'some'
    const iterator = this.peek();
    if (iterator?.type !== 'ident') {
      return "expected an iterator name after 'some'";
    }
    this.pos++;
    const keyword = this.peek();
    if (keyword === undefined || !this.isKeyword(keyword, 'in')) {
      return `expected 'in' after 'some ${iterator.value}'`;
    }
    this.pos++;
    const path = this.path();
    if (path === undefined) {
      return `expected a collection path after 'some ${iterator.value} in'`;
    }

    const [head, ...rest] = path;
    let indexPath: string | undefined;
    if (head === this.config.dataRoot) {
      if (rest.length === 0) {
        return `collection '${head}' does not name an index`;
      }
      indexPath = rest.join('.');
    } else if (head !== undefined) {
      // Iterating a sub-collection of a bound iterator stays within its index
      indexPath = this.scopes.get(head);
    }
    if (indexPath === undefined) {
      return `unknown collection '${path.join('.')}': expected '${this.config.dataRoot}.' or a bound iterator`;
    }

    this.scopes.set(iterator.value, indexPath);
    this.current = { iteratorVar: iterator.value, indexPath };
    return undefined;
  }

  /** Returns a failure message, or undefined when a condition was recorded. */
  private comparison(): string | undefined {
    const start = this.peek();
    const path = this.path();
    if (path === undefined) {
      return `unrecognized statement starting at '${start?.value ?? ''}'`;
    }
    const fieldPath = path.join('.');

    const operator = this.peek();
    if (operator === undefined || operator.type === 'separator') {
      return `expected a comparison operator after '${fieldPath}'`;
    }
    if (!this.config.operators.includes(operator.value)) {
      return operator.type === 'operator'
        ? `unsupported operator '${operator.value}' after '${fieldPath}'`
        : `expected a comparison operator after '${fieldPath}', found '${operator.value}'`;
    }
    this.pos++;

    const valueToken = this.value();
    if (valueToken === undefined) {
      return `expected a string literal or '${this.config.inputRoot}.' reference after '${fieldPath} ${operator.value}'`;
    }

    if (this.current === undefined) {
      return `comparison '${fieldPath}' appears before any 'some ... in' header`;
    }

    const [head, ...rest] = path;
    const qualified = head !== undefined && rest.length > 0 ? this.scopes.get(head) : undefined;
    if (head !== undefined && qualified !== undefined) {
      this.conditions.push({
        iteratorVar: head,
        indexPath: qualified,
        field: rest.join('.'),
        operator: operator.value,
        valueToken,
      });
    } else {
      this.conditions.push({
        iteratorVar: this.current.iteratorVar,
        indexPath: this.current.indexPath,
        field: fieldPath,
        operator: operator.value,
        valueToken,
      });
    }
    return undefined;
  }

  private value(): string | undefined {
    const token = this.peek();
    if (token?.type === 'string') {
      this.pos++;
      return token.value;
    }
    const path = this.path();
    if (path !== undefined && path.length > 1 && path[0] === this.config.inputRoot) {
      return path.join('.');
    }
    return undefined;
  }

  /** Consumes `IDENT ("." IDENT)*`; undefined when it is absent or ends in a dot. */
  private path(): string[] | undefined {
    const first = this.peek();
    if (first?.type !== 'ident') return undefined;
    this.pos++;
    const segments = [first.value];
    while (this.peek()?.type === 'dot') {
      this.pos++;
      const next = this.peek();
      if (next?.type !== 'ident') return undefined;
      this.pos++;
      segments.push(next.value);
    }
    return segments;
  }

  private skipStatement(): void {
    while (this.pos < this.tokens.length && this.peek()?.type !== 'separator') {
      this.pos++;
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === 'ident' && token.value === keyword;
  }
}

export function matchBlock(
  tokens: readonly Token[],
  config: ExtractorConfig,
  block: number,
): BlockMatch {
  return new BlockMatcher(tokens, config, block).run();
}
