export type TokenType =
  | 'ident'
  | 'dot'
  | 'string'
  | 'number'
  | 'operator'
  | 'separator'
  | 'invalid';

export interface Token {
  type: TokenType;
  /** Source text of the token. String tokens keep their quotes. */
  value: string;
  line: number;
  column: number;
}

const SYMBOL_CHARS = new Set(['=', '!', '<', '>', ':']);
const SEPARATOR_CHARS = new Set(['\n', ';', '{', '}']);

function isIdentStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

/**
 * Splits rule text into tokens, tracking line and column for diagnostics.
 * Never throws: characters outside the grammar and unterminated strings
 * become `invalid` tokens and are left for the matcher to skip.
 */
export function tokenize(source: string, firstLine = 1, firstColumn = 1): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = firstLine;
  let column = firstColumn;

  function peek(offset = 0): string {
    return source.charAt(pos + offset);
  }

  function advance(): string {
    const ch = source.charAt(pos);
    pos++;
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  }

  while (pos < source.length) {
    const ch = peek();
    const startLine = line;
    const startColumn = column;

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      advance();
      continue;
    }

    // Comments run to end of line; the newline itself is still a separator
    if (ch === '#') {
      while (pos < source.length && peek() !== '\n') advance();
      continue;
    }

    if (SEPARATOR_CHARS.has(ch)) {
      advance();
      tokens.push({ type: 'separator', value: ch, line: startLine, column: startColumn });
      continue;
    }

    if (ch === '"') {
      let text = advance();
      let closed = false;
      while (pos < source.length && peek() !== '\n') {
        const c = advance();
        text += c;
        if (c === '\\' && pos < source.length && peek() !== '\n') {
          text += advance();
          continue;
        }
        if (c === '"') {
          closed = true;
          break;
        }
      }
      tokens.push({ type: closed ? 'string' : 'invalid', value: text, line: startLine, column: startColumn });
      continue;
    }

    if (isIdentStart(ch)) {
      let text = '';
      while (pos < source.length && isIdentPart(peek())) text += advance();
      tokens.push({ type: 'ident', value: text, line: startLine, column: startColumn });
      continue;
    }

    if (isDigit(ch)) {
      let text = '';
      while (pos < source.length && isDigit(peek())) text += advance();
      if (peek() === '.' && isDigit(peek(1))) {
        text += advance();
        while (pos < source.length && isDigit(peek())) text += advance();
      }
      tokens.push({ type: 'number', value: text, line: startLine, column: startColumn });
      continue;
    }

    if (ch === '.') {
      advance();
      tokens.push({ type: 'dot', value: '.', line: startLine, column: startColumn });
      continue;
    }

    if (SYMBOL_CHARS.has(ch)) {
      let text = '';
      while (pos < source.length && SYMBOL_CHARS.has(peek())) text += advance();
      tokens.push({ type: 'operator', value: text, line: startLine, column: startColumn });
      continue;
    }

    tokens.push({ type: 'invalid', value: advance(), line: startLine, column: startColumn });
  }

  return tokens;
}
