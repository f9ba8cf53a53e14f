// ── Tokens ───────────────────────────────────────────────────────────

export type TokenKind = 'word' | 'quoted' | 'string' | 'number' | 'placeholder' | 'symbol';

export interface Token {
  readonly kind: TokenKind;
  /** Source text, quotes included. */
  readonly text: string;
  readonly start: number;
  readonly end: number;
  /** 1-based. */
  readonly line: number;
}

export interface Unterminated {
  readonly kind: 'string' | 'quoted' | 'comment';
  readonly line: number;
}

export interface ScanResult {
  readonly tokens: readonly Token[];
  readonly unterminated?: Unterminated;
}

const TWO_CHAR_SYMBOLS = new Set(['||', '<=', '>=', '<>', '!=', '::']);

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isWordPart(ch: string): boolean {
  return /[A-Za-z0-9_$#]/.test(ch);
}

// ── Scanner ──────────────────────────────────────────────────────────

/**
 * Split SQL text into tokens. Comments and whitespace are dropped;
 * string literals and quoted identifiers keep their quotes.
 */
export function scanSql(sql: string): ScanResult {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;

  const push = (kind: TokenKind, start: number, startLine: number): void => {
    tokens.push({ kind, text: sql.slice(start, pos), start, end: pos, line: startLine });
  };

  /** Advance past a quote-delimited run where a doubled quote escapes. */
  const quoted = (quote: string): boolean => {
    pos++;
    while (pos < sql.length) {
      const ch = sql[pos];
      if (ch === '\n') line++;
      if (ch === quote) {
        if (sql[pos + 1] === quote) {
          pos += 2;
          continue;
        }
        pos++;
        return true;
      }
      pos++;
    }
    return false;
  };

  while (pos < sql.length) {
    const ch = sql.charAt(pos);
    const start = pos;
    const startLine = line;

    if (ch === '\n') {
      line++;
      pos++;
      continue;
    }
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '-' && sql[pos + 1] === '-') {
      while (pos < sql.length && sql[pos] !== '\n') pos++;
      continue;
    }
    if (ch === '/' && sql[pos + 1] === '*') {
      const close = sql.indexOf('*/', pos + 2);
      const body = sql.slice(pos, close === -1 ? sql.length : close + 2);
      line += body.split('\n').length - 1;
      if (close === -1) {
        return { tokens, unterminated: { kind: 'comment', line: startLine } };
      }
      pos = close + 2;
      continue;
    }

    if (ch === "'" || ch === '"') {
      if (!quoted(ch)) {
        return { tokens, unterminated: { kind: ch === "'" ? 'string' : 'quoted', line: startLine } };
      }
      push(ch === "'" ? 'string' : 'quoted', start, startLine);
      continue;
    }

    if (ch === '$' && sql[pos + 1] === '$') {
      const close = sql.indexOf('$$', pos + 2);
      if (close !== -1 && /^[A-Za-z0-9_]+$/.test(sql.slice(pos + 2, close))) {
        pos = close + 2;
        push('placeholder', start, startLine);
        continue;
      }
    }

    if (isWordStart(ch)) {
      while (pos < sql.length && isWordPart(sql.charAt(pos))) pos++;
      push('word', start, startLine);
      continue;
    }

    if (/[0-9]/.test(ch)) {
      while (pos < sql.length && /[0-9.]/.test(sql.charAt(pos))) pos++;
      push('number', start, startLine);
      continue;
    }

    pos += TWO_CHAR_SYMBOLS.has(sql.slice(pos, pos + 2)) ? 2 : 1;
    push('symbol', start, startLine);
  }

  return { tokens };
}

// ── Token helpers ────────────────────────────────────────────────────

export function isWord(token: Token | undefined, ...words: string[]): boolean {
  if (token?.kind !== 'word') return false;
  const upper = token.text.toUpperCase();
  return words.length === 0 || words.includes(upper);
}

export function isSymbol(token: Token | undefined, symbol: string): boolean {
  return token?.kind === 'symbol' && token.text === symbol;
}

/** Identifier text without quotes; doubled quotes collapse. */
export function identifierName(token: Token): string {
  return token.kind === 'quoted' ? token.text.slice(1, -1).replace(/""/g, '"') : token.text;
}

/** Index of the `)` closing the `(` at `open`, or -1. */
export function matchingParen(tokens: readonly Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isSymbol(tokens[i], '(')) depth++;
    else if (isSymbol(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

export interface CteDefinition {
  readonly name: string;
  readonly token: Token;
  /** Index of the body's opening and closing parentheses. */
  readonly open: number;
  readonly close: number;
}

/**
 * Stages of the leading WITH clause, in order. Stops at the first
 * definition that does not read `name AS ( ... )`.
 */
export function readCtes(tokens: readonly Token[]): CteDefinition[] {
  const ctes: CteDefinition[] = [];
  let i = tokens.findIndex((t) => isWord(t, 'WITH'));
  if (i === -1) return ctes;
  i++;
  if (isWord(tokens[i], 'RECURSIVE')) i++;

  for (;;) {
    const nameToken = tokens[i];
    if (!nameToken || (nameToken.kind !== 'word' && nameToken.kind !== 'quoted')) break;
    if (!isWord(tokens[i + 1], 'AS') || !isSymbol(tokens[i + 2], '(')) break;
    const close = matchingParen(tokens, i + 2);
    if (close === -1) break;

    ctes.push({ name: identifierName(nameToken), token: nameToken, open: i + 2, close });
    if (!isSymbol(tokens[close + 1], ',')) break;
    i = close + 2;
  }
  return ctes;
}
