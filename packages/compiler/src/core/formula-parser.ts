import {
  and,
  binary,
  not,
  type BinaryOperator,
  type CaseBranch,
  type Expression,
} from './expression.js';
import { ParseError, type ErrorContext } from './errors.js';

// ── Tokens ───────────────────────────────────────────────────────────

type TokenKind =
  | 'number'
  | 'string'
  | 'quoted'
  | 'ident'
  | 'parameter'
  | 'meta'
  | 'placeholder'
  | 'symbol'
  | 'op'
  | 'eof';

interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly position: number;
}

export interface FormulaOptions {
  /** Accept `{0}`, `{1...}`, `{@name}` and `$name` template syntax. */
  readonly templates?: boolean;
  /** Location attached to parse errors. */
  readonly context?: ErrorContext;
}

const PARAMETER = /^\$\$([A-Za-z0-9_.:]+)\$\$/;
const QUOTED_PARAMETER = /^\$\$([A-Za-z0-9_.:]+)\$\$$/;
const NUMBER = /^\d+(\.\d+)?([eE][+-]?\d+)?/;
const IDENT = /^[A-Za-z_][A-Za-z0-9_#]*/;
const PLACEHOLDER = /^\{(\d+)(\.\.\.)?\}/;
const SYMBOL = /^\{@([A-Za-z_][A-Za-z0-9_]*)\}/;
const META = /^\$([A-Za-z_][A-Za-z0-9_]*)/;
const OPERATORS = ['||', '<=', '>=', '<>', '!=', '=', '<', '>', '+', '-', '*', '/', '(', ')', ',', '.'];

function tokenize(source: string, options: FormulaOptions): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const fail = (message: string): never => {
    throw new ParseError(`${message} at position ${pos} in '${source}'`, options.context);
  };

  while (pos < source.length) {
    const ch = source.charAt(pos);
    const rest = source.slice(pos);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      let value = '';
      let end = pos + 1;
      let closed = false;
      while (end < source.length) {
        const c = source.charAt(end);
        if (c === ch) {
          if (source.charAt(end + 1) === ch) {
            value += ch;
            end += 2;
            continue;
          }
          closed = true;
          break;
        }
        value += c;
        end++;
      }
      if (!closed) fail(ch === "'" ? 'Unterminated string literal' : 'Unterminated quoted identifier');

      const param = ch === "'" ? QUOTED_PARAMETER.exec(value) : null;
      if (param?.[1] !== undefined) {
        tokens.push({ kind: 'parameter', text: param[1], position: pos });
        tokens.push({ kind: 'op', text: "'", position: pos });
      } else {
        tokens.push({ kind: ch === "'" ? 'string' : 'quoted', text: value, position: pos });
      }
      pos = end + 1;
      continue;
    }

    const param = PARAMETER.exec(rest);
    if (param?.[1] !== undefined) {
      tokens.push({ kind: 'parameter', text: param[1], position: pos });
      pos += param[0].length;
      continue;
    }

    if (options.templates) {
      const placeholder = PLACEHOLDER.exec(rest);
      if (placeholder?.[1] !== undefined) {
        tokens.push({ kind: 'placeholder', text: placeholder[2] ? `${placeholder[1]}...` : placeholder[1], position: pos });
        pos += placeholder[0].length;
        continue;
      }
      const symbol = SYMBOL.exec(rest);
      if (symbol?.[1] !== undefined) {
        tokens.push({ kind: 'symbol', text: symbol[1], position: pos });
        pos += symbol[0].length;
        continue;
      }
      const meta = META.exec(rest);
      if (meta?.[1] !== undefined) {
        tokens.push({ kind: 'meta', text: meta[1], position: pos });
        pos += meta[0].length;
        continue;
      }
    }

    const number = NUMBER.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', text: number[0], position: pos });
      pos += number[0].length;
      continue;
    }

    const ident = IDENT.exec(rest);
    if (ident) {
      tokens.push({ kind: 'ident', text: ident[0], position: pos });
      pos += ident[0].length;
      continue;
    }

    const op = OPERATORS.find((o) => rest.startsWith(o));
    if (op) {
      tokens.push({ kind: 'op', text: op === '!=' ? '<>' : op, position: pos });
      pos += op.length;
      continue;
    }

    fail(`Unexpected character '${ch}'`);
  }

  tokens.push({ kind: 'eof', text: '', position: source.length });
  return tokens;
}

// ── Parser ───────────────────────────────────────────────────────────

class FormulaParser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: readonly Token[],
    private readonly options: FormulaOptions,
  ) {}

  parse(): Expression {
    const expr = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'eof') {
      this.fail(`Unexpected '${next.text}'`, next);
    }
    return expr;
  }

  // ── Token helpers ──────────────────────────────────────────────

  private peek(offset = 0): Token {
    const token = this.tokens[this.index + offset] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new ParseError('Empty token stream', this.options.context);
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private isOp(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'op' && token.text === text;
  }

  private isKeyword(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'ident' && token.text.toUpperCase() === word;
  }

  private expectOp(text: string): void {
    if (!this.isOp(text)) {
      const token = this.peek();
      this.fail(`Expected '${text}' but found '${token.text || 'end of input'}'`, token);
    }
    this.advance();
  }

  private expectKeyword(word: string): void {
    if (!this.isKeyword(word)) {
      const token = this.peek();
      this.fail(`Expected ${word} but found '${token.text || 'end of input'}'`, token);
    }
    this.advance();
  }

  private fail(message: string, token: Token): never {
    throw new ParseError(`${message} at position ${token.position} in '${this.source}'`, this.options.context);
  }

  // ── Grammar ────────────────────────────────────────────────────

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.isKeyword('OR')) {
      this.advance();
      left = binary('OR', left, this.parseAnd());
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.isKeyword('AND')) {
      this.advance();
      left = binary('AND', left, this.parseNot());
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.isKeyword('NOT')) {
      this.advance();
      return not(this.parseNot());
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const left = this.parseAdditive();
    const token = this.peek();
    const comparison = token.kind === 'op' ? COMPARISON.get(token.text) : undefined;

    if (comparison) {
      this.advance();
      return binary(comparison, left, this.parseAdditive());
    }

    if (this.isKeyword('IS')) {
      this.advance();
      const negated = this.isKeyword('NOT');
      if (negated) this.advance();
      this.expectKeyword('NULL');
      return { kind: 'unary', operator: negated ? 'IS NOT NULL' : 'IS NULL', operand: left };
    }

    const negated = this.isKeyword('NOT')
      && (this.isKeyword('LIKE', 1) || this.isKeyword('IN', 1) || this.isKeyword('BETWEEN', 1));
    if (negated) this.advance();

    if (this.isKeyword('LIKE')) {
      this.advance();
      const like = binary('LIKE', left, this.parseAdditive());
      return negated ? not(like) : like;
    }

    if (this.isKeyword('IN')) {
      this.advance();
      this.expectOp('(');
      const items = this.parseList();
      this.expectOp(')');
      return { kind: 'in', operand: left, items, negated };
    }

    if (this.isKeyword('BETWEEN')) {
      this.advance();
      const low = this.parseAdditive();
      this.expectKeyword('AND');
      const high = this.parseAdditive();
      const range = and(binary('>=', left, low), binary('<=', left, high));
      return negated ? not(range) : range;
    }

    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (;;) {
      const token = this.peek();
      const operator = token.kind === 'op' ? ADDITIVE.get(token.text) : undefined;
      if (!operator) break;
      this.advance();
      left = binary(operator, left, this.parseMultiplicative());
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      const operator = token.kind === 'op' ? MULTIPLICATIVE.get(token.text) : undefined;
      if (!operator) break;
      this.advance();
      left = binary(operator, left, this.parseUnary());
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.isOp('-')) {
      this.advance();
      const operand = this.parseUnary();
      if (operand.kind === 'literal' && operand.type === 'number') {
        return { kind: 'literal', type: 'number', value: `-${operand.value}` };
      }
      return { kind: 'unary', operator: '-', operand };
    }
    if (this.isOp('+')) {
      this.advance();
      return this.parseUnary();
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.advance();

    switch (token.kind) {
      case 'number':
        return { kind: 'literal', type: 'number', value: token.text };
      case 'string':
        return { kind: 'literal', type: 'string', value: token.text };
      case 'parameter': {
        const quoted = this.isOp("'");
        if (quoted) this.advance();
        return { kind: 'parameter', name: token.text, quoted };
      }
      case 'meta':
        return { kind: 'meta', name: token.text };
      case 'symbol':
        return { kind: 'symbol', name: token.text };
      case 'placeholder': {
        const rest = token.text.endsWith('...');
        return { kind: 'placeholder', index: Number.parseInt(token.text, 10), rest };
      }
      case 'quoted':
        return { kind: 'column', name: token.text };
      case 'ident':
        return this.parseIdentifier(token);
      case 'op':
        if (token.text === '(') {
          const inner = this.parseOr();
          this.expectOp(')');
          return inner;
        }
        if (token.text === '*') {
          return { kind: 'identifier', name: '*' };
        }
        return this.fail(`Unexpected '${token.text}'`, token);
      default:
        return this.fail('Unexpected end of input', token);
    }
  }

  private parseIdentifier(token: Token): Expression {
    const upper = token.text.toUpperCase();

    if (upper === 'NULL') return { kind: 'literal', type: 'null', value: 'NULL' };
    if (upper === 'TRUE' || upper === 'FALSE') return { kind: 'literal', type: 'boolean', value: upper };
    if (upper === 'CASE') return this.parseCase();
    if (upper === 'CAST' && this.isOp('(')) return this.parseCast();

    if (this.isOp('(')) {
      this.advance();
      const args = this.isOp(')') ? [] : this.parseList();
      this.expectOp(')');
      return { kind: 'call', name: token.text, args };
    }

    if (this.isOp('.')) {
      this.advance();
      const field = this.advance();
      if (field.kind !== 'quoted' && field.kind !== 'ident') {
        return this.fail(`Expected column name after '${token.text}.'`, field);
      }
      return { kind: 'column', name: field.text, qualifier: token.text };
    }

    return { kind: 'identifier', name: token.text };
  }

  private parseList(): Expression[] {
    const items = [this.parseOr()];
    while (this.isOp(',')) {
      this.advance();
      items.push(this.parseOr());
    }
    return items;
  }

  private parseCase(): Expression {
    const operand = this.isKeyword('WHEN') ? undefined : this.parseAdditive();
    const branches: CaseBranch[] = [];

    while (this.isKeyword('WHEN')) {
      this.advance();
      const condition = this.parseOr();
      this.expectKeyword('THEN');
      const then = this.parseOr();
      branches.push({ when: operand ? binary('=', operand, condition) : condition, then });
    }

    if (branches.length === 0) {
      this.fail('CASE requires at least one WHEN branch', this.peek());
    }

    let otherwise: Expression | undefined;
    if (this.isKeyword('ELSE')) {
      this.advance();
      otherwise = this.parseOr();
    }
    this.expectKeyword('END');

    return otherwise ? { kind: 'case', branches, otherwise } : { kind: 'case', branches };
  }

  private parseCast(): Expression {
    this.expectOp('(');
    const operand = this.parseOr();
    this.expectKeyword('AS');

    const typeToken = this.advance();
    if (typeToken.kind !== 'ident') {
      return this.fail('Expected a type name in CAST', typeToken);
    }
    let typeName = typeToken.text.toUpperCase();

    if (this.isOp('(')) {
      this.advance();
      const sizes: string[] = [];
      while (!this.isOp(')')) {
        const size = this.advance();
        if (size.kind !== 'number' && size.kind !== 'placeholder') {
          return this.fail('Expected a numeric type size in CAST', size);
        }
        sizes.push(size.text);
        if (this.isOp(',')) this.advance();
      }
      this.advance();
      typeName += `(${sizes.join(', ')})`;
    }

    this.expectOp(')');
    return { kind: 'cast', operand, typeName };
  }
}

const ADDITIVE: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ['+', '+'], ['-', '-'], ['||', '||'],
]);

const MULTIPLICATIVE: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ['*', '*'], ['/', '/'],
]);

const COMPARISON: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ['=', '='], ['<>', '<>'], ['<', '<'], ['<=', '<='], ['>', '>'], ['>=', '>='],
]);

// ── parseFormula ─────────────────────────────────────────────────────

/**
 * Parse a column-engine formula (or, with `templates`, a catalog
 * template) into an expression tree.
 */
export function parseFormula(source: string, options: FormulaOptions = {}): Expression {
  if (source.trim() === '') {
    throw new ParseError('Empty formula', options.context);
  }
  return new FormulaParser(source, tokenize(source, options), options).parse();
}
