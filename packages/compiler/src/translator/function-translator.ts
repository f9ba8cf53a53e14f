import type { Catalog, DialectProfile, FunctionRule, RuleAction } from '../catalog/catalog.js';
import { instantiate, matchPattern, templateSymbols } from '../catalog/template.js';
import { isStringLike, type SqlType } from '../core/data-types.js';
import type { ColumnRef, Expression, FunctionCall } from '../core/expression.js';
import type { TranslationWarning, WarningCode } from '../core/errors.js';
import { mapExpression } from '../core/tree-utils.js';

// ── Options ──────────────────────────────────────────────────────────

export interface TranslateOptions {
  readonly dialect: string;
  readonly catalog: Catalog;
  /** Values for `{@name}` template symbols and `@name` renames. */
  readonly symbols?: ReadonlyMap<string, string>;
  /** Type of a column reference, when known. Drives typed concatenation. */
  readonly columnType?: (column: ColumnRef) => SqlType | undefined;
  /** Stamped on every warning. */
  readonly context?: { readonly node?: string; readonly column?: string };
}

export interface TranslationResult {
  readonly expression: Expression;
  readonly warnings: readonly TranslationWarning[];
}

// ── Translator ───────────────────────────────────────────────────────

class ExpressionTranslator {
  readonly warnings: TranslationWarning[] = [];
  private readonly profile: DialectProfile;
  private readonly symbols: ReadonlyMap<string, string>;

  constructor(private readonly options: TranslateOptions) {
    this.profile = options.catalog.getDialect(options.dialect);
    this.symbols = options.symbols ?? new Map();
  }

  /** Pattern rules first, then function rules; each pass is bottom-up. */
  translate(expr: Expression): Expression {
    const patterned = mapExpression(expr, (node) => this.applyPatterns(node));
    return mapExpression(patterned, (node) => {
      if (node.kind === 'call' && node.rewritten === undefined) {
        return this.translateCall(node);
      }
      if (node.kind === 'binary' && node.operator === '+' && (this.isString(node.left) || this.isString(node.right))) {
        return { ...node, operator: this.profile.concatOperator };
      }
      return node;
    });
  }

  private applyPatterns(node: Expression): Expression {
    for (const rule of this.options.catalog.getPatterns()) {
      const rewrite = rule.rewrites.get(this.profile.name);
      if (!rewrite) continue;

      const bindings = matchPattern(rule.match, node);
      if (!bindings) continue;

      const missing = templateSymbols(rewrite).filter((s) => !this.symbols.has(s));
      if (missing.length > 0) {
        this.warn('UNKNOWN_SYMBOL', `Pattern '${rule.name}' needs undefined symbol(s): ${missing.join(', ')}`);
        continue;
      }
      return instantiate(rewrite, { bindings, symbols: this.symbols });
    }
    return node;
  }

  private translateCall(node: FunctionCall): Expression {
    const rule = this.options.catalog.getFunction(node.name);
    if (!rule) {
      this.warn('UNMAPPED_FUNCTION', `No catalog rule for function '${node.name}'`, node.name);
      return node;
    }

    if (!this.arityMatches(rule, node.args.length)) {
      this.warn(
        'ARITY_MISMATCH',
        `${rule.name} called with ${node.args.length} argument(s), expected ${describeArity(rule)}`,
        rule.name,
      );
      return node;
    }

    const action = this.options.catalog.actionFor(rule, this.profile.name);
    if (!action) {
      this.warn('MISSING_DIALECT_RULE', `${rule.name} has no rule for dialect '${this.profile.name}'`, rule.name);
      return node;
    }

    return this.applyAction(rule, action, node);
  }

  private applyAction(rule: FunctionRule, action: RuleAction, node: FunctionCall): Expression {
    if (action.kind === 'rename') {
      const target = action.target.startsWith('@')
        ? this.symbols.get(action.target.slice(1))
        : action.target;
      if (target === undefined) {
        this.warn('UNKNOWN_SYMBOL', `${rule.name} needs undefined symbol '${action.target.slice(1)}'`, rule.name);
        return node;
      }
      return { kind: 'call', name: target, args: node.args, rewritten: true };
    }

    const missing = templateSymbols(action.template).filter((s) => !this.symbols.has(s));
    if (missing.length > 0) {
      this.warn('UNKNOWN_SYMBOL', `${rule.name} needs undefined symbol(s): ${missing.join(', ')}`, rule.name);
      return node;
    }
    return instantiate(action.template, { args: node.args, symbols: this.symbols });
  }

  private arityMatches(rule: FunctionRule, count: number): boolean {
    return !rule.arity || (count >= rule.arity.min && count <= rule.arity.max);
  }

  private isString(expr: Expression): boolean {
    switch (expr.kind) {
      case 'literal':
        return expr.type === 'string';
      case 'binary':
        return expr.operator === '||';
      case 'column': {
        const type = this.options.columnType?.(expr);
        return type !== undefined && isStringLike(type);
      }
      default:
        return false;
    }
  }

  private warn(code: WarningCode, message: string, fn?: string): void {
    this.warnings.push({
      code,
      message,
      ...(fn === undefined ? {} : { function: fn }),
      ...this.options.context,
    });
  }
}

function describeArity(rule: FunctionRule): string {
  if (!rule.arity) return 'any';
  const { min, max } = rule.arity;
  if (min === max) return String(min);
  return max === Number.POSITIVE_INFINITY ? `at least ${min}` : `${min} to ${max}`;
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Rewrite an expression for a target dialect. Constructs without a
 * usable rule are kept as they are and reported as warnings.
 */
export function translateExpression(expr: Expression, options: TranslateOptions): TranslationResult {
  const translator = new ExpressionTranslator(options);
  const expression = translator.translate(expr);
  return { expression, warnings: translator.warnings };
}
