import type { DialectProfile } from '../catalog/catalog.js';
import { quoteIdentifier } from '../core/expression-printer.js';
import {
  isSymbol,
  isWord,
  readCtes,
  scanSql,
  type Token,
} from './scanner.js';
import type { ValidationCode, ValidationIssue } from './validator.js';

// ── Records ──────────────────────────────────────────────────────────

export interface CorrectionRecord {
  readonly code: ValidationCode;
  readonly original: string;
  readonly corrected: string;
  readonly line: number;
  readonly confidence: number;
  readonly description: string;
}

export interface CorrectionResult {
  readonly sql: string;
  readonly corrections: readonly CorrectionRecord[];
  /** Codes for which at least one fix was applied. */
  readonly issuesFixed: readonly ValidationCode[];
  readonly issuesRemaining: readonly ValidationIssue[];
}

export interface CorrectOptions {
  /** Minimum confidence for a fix to be applied. Defaults to 0.8. */
  readonly threshold?: number;
  readonly profile?: DialectProfile;
}

// ── Fixes ────────────────────────────────────────────────────────────

interface Edit {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly line: number;
}

interface Fix {
  readonly code: ValidationCode;
  readonly confidence: number;
  readonly description: string;
  edits(tokens: readonly Token[], options: CorrectOptions): Edit[];
}

const replaceToken = (token: Token, text: string): Edit => ({ start: token.start, end: token.end, text, line: token.line });

const FIXES: readonly Fix[] = [
  {
    code: 'TRAILING_COMMA',
    confidence: 0.95,
    description: 'Removed trailing comma',
    edits: (tokens) =>
      tokens
        .filter((t, i) => isSymbol(t, ',') && (isSymbol(tokens[i + 1], ')') || isWord(tokens[i + 1], 'FROM', 'WHERE', 'GROUP', 'UNION', 'ORDER', 'HAVING')))
        .map((t) => replaceToken(t, '')),
  },
  {
    code: 'STRING_CONCAT_PLUS',
    confidence: 0.9,
    description: "Replaced '+' with '||' between strings",
    edits: (tokens, options) => {
      if (options.profile?.concatOperator === '+') return [];
      return tokens
        .filter((t, i) => isSymbol(t, '+') && (tokens[i - 1]?.kind === 'string' || tokens[i + 1]?.kind === 'string'))
        .map((t) => replaceToken(t, '||'));
    },
  },
  {
    code: 'UNSUPPORTED_FUNCTION',
    confidence: 0.9,
    description: 'Replaced function with its dialect equivalent',
    edits: (tokens, options) => {
      const replacements = options.profile?.functionReplacements;
      if (!replacements) return [];
      const edits: Edit[] = [];
      tokens.forEach((t, i) => {
        const target = replacements.get(t.text.toUpperCase());
        if (t.kind === 'word' && target !== undefined && isSymbol(tokens[i + 1], '(') && !isSymbol(tokens[i - 1], '.')) {
          edits.push(replaceToken(t, target));
        }
      });
      return edits;
    },
  },
  {
    code: 'RESERVED_KEYWORD_IDENTIFIER',
    confidence: 0.7,
    description: 'Quoted stage name that is a reserved keyword',
    edits: (tokens, options) => {
      const reserved = options.profile?.reservedKeywords;
      if (!reserved) return [];
      const names = new Set(
        readCtes(tokens)
          .filter((c) => c.token.kind === 'word' && reserved.has(c.name.toUpperCase()))
          .map((c) => c.name.toUpperCase()),
      );
      if (names.size === 0) return [];

      const edits: Edit[] = [];
      tokens.forEach((t, i) => {
        if (t.kind !== 'word' || !names.has(t.text.toUpperCase())) return;
        const definition = isWord(tokens[i + 1], 'AS') && isSymbol(tokens[i + 2], '(');
        const reference = isWord(tokens[i - 1], 'FROM', 'JOIN');
        const qualifier = isSymbol(tokens[i + 1], '.');
        if (definition || reference || qualifier) {
          edits.push(replaceToken(t, quoteIdentifier(t.text)));
        }
      });
      return edits;
    },
  },
];

function applyEdits(sql: string, edits: readonly Edit[]): string {
  let result = sql;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Apply every registered fix whose code appears in `issues` and whose
 * confidence reaches the threshold. Fixes are driven by the SQL text, so
 * running the corrector on its own output changes nothing.
 */
export function correctSql(sql: string, issues: readonly ValidationIssue[], options: CorrectOptions = {}): CorrectionResult {
  const threshold = options.threshold ?? 0.8;
  const present = new Set(issues.map((i) => i.code));

  let current = sql;
  const corrections: CorrectionRecord[] = [];
  const fixed = new Set<ValidationCode>();

  for (const fix of FIXES) {
    if (!present.has(fix.code) || fix.confidence < threshold) continue;
    const { tokens, unterminated } = scanSql(current);
    if (unterminated) break;

    const edits = fix.edits(tokens, options);
    if (edits.length === 0) continue;

    for (const edit of edits) {
      corrections.push({
        code: fix.code,
        original: current.slice(edit.start, edit.end),
        corrected: edit.text,
        line: edit.line,
        confidence: fix.confidence,
        description: fix.description,
      });
    }
    current = applyEdits(current, edits);
    fixed.add(fix.code);
  }

  return {
    sql: current,
    corrections,
    issuesFixed: [...fixed],
    issuesRemaining: issues.filter((i) => !fixed.has(i.code)),
  };
}
