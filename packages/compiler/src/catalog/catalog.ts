import type { TypeName } from '../core/data-types.js';
import type { Expression } from '../core/expression.js';
import { CatalogError } from '../core/errors.js';

// ── Rule types ───────────────────────────────────────────────────────

export type RuleAction =
  | { readonly kind: 'template'; readonly source: string; readonly template: Expression }
  | { readonly kind: 'rename'; readonly target: string };

export interface ArityConstraint {
  readonly min: number;
  readonly max: number;
}

export interface FunctionRule {
  /** Upper-case source function name. */
  readonly name: string;
  readonly description?: string;
  readonly arity?: ArityConstraint;
  /** Applies to every dialect without its own action. */
  readonly fallback?: RuleAction;
  readonly actions: ReadonlyMap<string, RuleAction>;
}

export interface PatternRule {
  readonly name: string;
  readonly description?: string;
  readonly source: string;
  readonly match: Expression;
  readonly rewrites: ReadonlyMap<string, Expression>;
}

export interface DialectProfile {
  readonly name: string;
  readonly description?: string;
  readonly numericCast: Expression;
  readonly dateCast: Expression;
  readonly opaqueType: string;
  readonly typeNames: Readonly<Record<TypeName, string>>;
  readonly numericAggregates: ReadonlySet<string>;
  readonly concatOperator: '||' | '+';
  /** `{view}` is replaced by the qualified view name. */
  readonly createView: string;
  readonly dropView?: string;
  readonly functionReplacements: ReadonlyMap<string, string>;
  readonly reservedKeywords: ReadonlySet<string>;
}

export interface CatalogRules {
  readonly functions: readonly FunctionRule[];
  readonly patterns: readonly PatternRule[];
  readonly dialects: readonly DialectProfile[];
}

// ── Catalog ──────────────────────────────────────────────────────────

/**
 * Immutable rule table. Built once from rule files and passed by
 * reference into every stage.
 */
export class Catalog {
  private readonly functions: ReadonlyMap<string, FunctionRule>;
  private readonly patterns: readonly PatternRule[];
  private readonly dialects: ReadonlyMap<string, DialectProfile>;

  private constructor(rules: CatalogRules) {
    const functions = new Map<string, FunctionRule>();
    for (const rule of rules.functions) {
      if (functions.has(rule.name)) {
        throw new CatalogError(`Duplicate function rule '${rule.name}'`);
      }
      functions.set(rule.name, Object.freeze(rule));
    }

    const dialects = new Map<string, DialectProfile>();
    for (const profile of rules.dialects) {
      if (dialects.has(profile.name)) {
        throw new CatalogError(`Duplicate dialect profile '${profile.name}'`);
      }
      dialects.set(profile.name, Object.freeze(profile));
    }

    for (const rule of rules.patterns) {
      for (const dialect of rule.rewrites.keys()) {
        if (!dialects.has(dialect)) {
          throw new CatalogError(`Pattern '${rule.name}' targets unknown dialect '${dialect}'`);
        }
      }
    }
    for (const rule of rules.functions) {
      for (const dialect of rule.actions.keys()) {
        if (!dialects.has(dialect)) {
          throw new CatalogError(`Function rule '${rule.name}' targets unknown dialect '${dialect}'`);
        }
      }
    }

    this.functions = functions;
    this.patterns = Object.freeze(rules.patterns.map((p) => Object.freeze(p)));
    this.dialects = dialects;
    Object.freeze(this);
  }

  static create(rules: CatalogRules): Catalog {
    return new Catalog(rules);
  }

  getFunction(name: string): FunctionRule | undefined {
    return this.functions.get(name.toUpperCase());
  }

  /** The action a rule applies for a dialect, if any. */
  actionFor(rule: FunctionRule, dialect: string): RuleAction | undefined {
    return rule.actions.get(dialect) ?? rule.fallback;
  }

  getPatterns(): readonly PatternRule[] {
    return this.patterns;
  }

  hasDialect(name: string): boolean {
    return this.dialects.has(name);
  }

  getDialect(name: string): DialectProfile {
    const profile = this.dialects.get(name);
    if (!profile) {
      throw new CatalogError(
        `Unknown dialect '${name}'. Available: ${this.dialectNames().join(', ')}`,
      );
    }
    return profile;
  }

  dialectNames(): string[] {
    return [...this.dialects.keys()];
  }

  functionNames(): string[] {
    return [...this.functions.keys()];
  }
}
