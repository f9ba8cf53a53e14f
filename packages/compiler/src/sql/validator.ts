import type { DialectProfile } from '../catalog/catalog.js';
import { isNumeric } from '../core/data-types.js';
import { findColumn, type NodeKey, type Scenario } from '../core/types.js';
import { sanitizeIdentifier } from '../renderer/naming.js';
import {
  identifierName,
  isSymbol,
  isWord,
  readCtes,
  scanSql,
  type Token,
} from './scanner.js';

// ── Issues ───────────────────────────────────────────────────────────

export type Severity = 'error' | 'warning' | 'info';

export type ValidationCode =
  | 'EMPTY_SQL'
  | 'NO_SELECT'
  | 'UNBALANCED_PARENTHESES'
  | 'UNBALANCED_QUOTES'
  | 'DUPLICATE_CTE'
  | 'UNDEFINED_CTE_REFERENCE'
  | 'MISSING_STAGE'
  | 'CARTESIAN_JOIN'
  | 'SELECT_STAR'
  | 'UNRESOLVED_PLACEHOLDER'
  | 'TRAILING_COMMA'
  | 'STRING_CONCAT_PLUS'
  | 'UNSUPPORTED_FUNCTION'
  | 'RESERVED_KEYWORD_IDENTIFIER'
  | 'MISSING_NUMERIC_CAST';

export interface ValidationIssue {
  readonly severity: Severity;
  readonly code: ValidationCode;
  readonly message: string;
  readonly line?: number;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly issues: readonly ValidationIssue[];
  readonly errors: readonly ValidationIssue[];
  readonly warnings: readonly ValidationIssue[];
}

export interface ValidateOptions {
  /** Enables dialect-specific checks. */
  readonly profile?: DialectProfile;
  /** Enables checks against the scenario the SQL was rendered from. */
  readonly scenario?: Scenario;
}

// ── Checks ───────────────────────────────────────────────────────────

type Report = (severity: Severity, code: ValidationCode, message: string, line?: number) => void;

const CLAUSE_END = ['FROM', 'WHERE', 'GROUP', 'UNION', 'ORDER', 'HAVING'];

function checkParentheses(tokens: readonly Token[], report: Report): void {
  let depth = 0;
  for (const token of tokens) {
    if (isSymbol(token, '(')) depth++;
    if (isSymbol(token, ')')) {
      depth--;
      if (depth < 0) {
        report('error', 'UNBALANCED_PARENTHESES', "Unmatched ')'", token.line);
        return;
      }
    }
  }
  if (depth > 0) {
    report('error', 'UNBALANCED_PARENTHESES', `${depth} unclosed '('`);
  }
}

function checkStages(tokens: readonly Token[], options: ValidateOptions, report: Report): void {
  const ctes = readCtes(tokens);
  const defined = new Map<string, string>();

  for (const cte of ctes) {
    const key = cte.name.toLowerCase();
    const earlier = defined.get(key);
    if (earlier !== undefined) {
      report('error', 'DUPLICATE_CTE', `Stage '${cte.name}' is defined more than once (also as '${earlier}')`, cte.token.line);
    } else {
      defined.set(key, cte.name);
    }
    if (cte.token.kind === 'word' && options.profile?.reservedKeywords.has(cte.name.toUpperCase())) {
      report(
        'warning',
        'RESERVED_KEYWORD_IDENTIFIER',
        `Stage name '${cte.name}' is a reserved keyword in ${options.profile.name}`,
        cte.token.line,
      );
    }
  }

  if (ctes.length > 0) {
    tokens.forEach((token, i) => {
      if (!isWord(token, 'FROM', 'JOIN')) return;
      const target: Token | undefined = tokens[i + 1];
      if (target?.kind !== 'word' || isSymbol(tokens[i + 2], '.')) return;
      if (!defined.has(target.text.toLowerCase())) {
        report('error', 'UNDEFINED_CTE_REFERENCE', `Reference to undefined stage '${target.text}'`, target.line);
      }
    });
  }

  if (options.scenario) {
    for (const node of options.scenario.nodes) {
      const name = sanitizeIdentifier(node.name);
      if (!defined.has(name.toLowerCase())) {
        report('error', 'MISSING_STAGE', `Node '${node.name}' has no stage '${name}'`);
      }
    }
  }
}

function checkPatterns(tokens: readonly Token[], options: ValidateOptions, report: Report): void {
  const concatIsPlus = options.profile?.concatOperator === '+';

  tokens.forEach((token, i) => {
    const prev: Token | undefined = tokens[i - 1];
    const next: Token | undefined = tokens[i + 1];

    if (isWord(token, 'ON') && next?.kind === 'number' && isSymbol(tokens[i + 2], '=')) {
      const other = tokens[i + 3];
      if (other?.kind === 'number' && other.text === next.text) {
        report('warning', 'CARTESIAN_JOIN', 'Join condition is always true', token.line);
      }
    }
    if (isWord(token, 'CROSS') && isWord(next, 'JOIN')) {
      report('warning', 'CARTESIAN_JOIN', 'CROSS JOIN produces a cartesian product', token.line);
    }

    if (isSymbol(token, '*') && (isWord(prev, 'SELECT') || isSymbol(prev, '.'))) {
      report('warning', 'SELECT_STAR', 'SELECT * depends on the column order of its source', token.line);
    }

    if (token.kind === 'placeholder' || (token.kind === 'string' && /\$\$[A-Za-z0-9_]+\$\$/.test(token.text))) {
      report('error', 'UNRESOLVED_PLACEHOLDER', `Unresolved placeholder in ${token.text}`, token.line);
    }

    if (isSymbol(token, ',') && (isSymbol(next, ')') || isWord(next, ...CLAUSE_END))) {
      report('error', 'TRAILING_COMMA', `Trailing comma before ${next?.text ?? 'end of input'}`, token.line);
    }

    if (!concatIsPlus && isSymbol(token, '+') && (prev?.kind === 'string' || next?.kind === 'string')) {
      report('warning', 'STRING_CONCAT_PLUS', "String concatenation with '+'; use '||'", token.line);
    }

    const replacement = options.profile?.functionReplacements.get(token.text.toUpperCase());
    if (token.kind === 'word' && replacement !== undefined && isSymbol(next, '(') && !isSymbol(prev, '.')) {
      report(
        'warning',
        'UNSUPPORTED_FUNCTION',
        `Function '${token.text}' is not available in ${options.profile?.name ?? 'the target dialect'}; use ${replacement}`,
        token.line,
      );
    }
  });
}

/**
 * Aggregates that must carry the numeric cast: `AGG(stage."field")` in
 * upper case, for every SUM/AVG-style column over a non-numeric input.
 */
function uncastAggregates(scenario: Scenario, profile: DialectProfile): Set<string> {
  const nodes = new Map<NodeKey, Scenario['nodes'][number]>(scenario.nodes.map((n) => [n.key, n]));
  const expected = new Set<string>();
  for (const node of scenario.nodes) {
    if (node.kind !== 'aggregation') continue;
    for (const col of node.columns) {
      if (col.kind !== 'real' || col.aggregation === undefined) continue;
      if (!profile.numericAggregates.has(col.aggregation)) continue;
      const input = nodes.get(col.source.node);
      const type = input ? findColumn(input, col.source.field)?.type : undefined;
      if (!input || !type || isNumeric(type)) continue;
      expected.add(`${col.aggregation}(${sanitizeIdentifier(input.name)}.${col.source.field})`.toUpperCase());
    }
  }
  return expected;
}

function checkNumericCasts(tokens: readonly Token[], options: ValidateOptions, report: Report): void {
  const { scenario, profile } = options;
  if (!scenario || !profile) return;
  const expected = uncastAggregates(scenario, profile);
  if (expected.size === 0) return;

  tokens.forEach((token, i) => {
    const [open, qualifier, dot, field, close] = tokens.slice(i + 1, i + 6);
    if (token.kind !== 'word' || !isSymbol(open, '(') || !isSymbol(dot, '.') || !isSymbol(close, ')')) return;
    if (!qualifier || !field) return;
    const text = `${token.text}(${identifierName(qualifier)}.${identifierName(field)})`.toUpperCase();
    if (expected.has(text)) {
      report(
        'error',
        'MISSING_NUMERIC_CAST',
        `${token.text.toUpperCase()} over non-numeric column ${identifierName(field)} without a numeric cast`,
        token.line,
      );
    }
  });
}

// ── Public API ───────────────────────────────────────────────────────

export function validateSql(sql: string, options: ValidateOptions = {}): ValidationResult {
  const issues: ValidationIssue[] = [];
  const report: Report = (severity, code, message, line) => {
    issues.push(line === undefined ? { severity, code, message } : { severity, code, message, line });
  };

  if (sql.trim() === '') {
    report('error', 'EMPTY_SQL', 'SQL is empty');
    return summarize(issues);
  }

  const { tokens, unterminated } = scanSql(sql);
  if (unterminated) {
    const what = unterminated.kind === 'string' ? 'string literal' : unterminated.kind === 'quoted' ? 'quoted identifier' : 'comment';
    report('error', 'UNBALANCED_QUOTES', `Unterminated ${what}`, unterminated.line);
  }

  if (!tokens.some((t) => isWord(t, 'SELECT'))) {
    report('error', 'NO_SELECT', 'SQL contains no SELECT');
  }

  checkParentheses(tokens, report);
  checkStages(tokens, options, report);
  checkPatterns(tokens, options, report);
  checkNumericCasts(tokens, options, report);

  return summarize(issues);
}

function summarize(issues: readonly ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings: issues.filter((i) => i.severity === 'warning'),
  };
}
