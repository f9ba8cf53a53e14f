// ── Pipeline steps ───────────────────────────────────────────────────

export type ConversionStep =
  | 'catalog'
  | 'parse'
  | 'translate'
  | 'render'
  | 'validate'
  | 'correct'
  | 'lineage'
  | 'procedural';

export interface ErrorContext {
  readonly node?: string;
  readonly column?: string;
  readonly stage?: string;
  readonly construct?: string;
  readonly line?: number;
}

// ── ConversionError ──────────────────────────────────────────────────

export class ConversionError extends Error {
  readonly step: ConversionStep;
  readonly context: ErrorContext;

  constructor(step: ConversionStep, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'ConversionError';
    this.step = step;
    this.context = context;
  }

  /** Message followed by its location, e.g. `... (node: Join_1, line 12)`. */
  describe(): string {
    const parts: string[] = [];
    if (this.context.stage) parts.push(`stage: ${this.context.stage}`);
    if (this.context.node) parts.push(`node: ${this.context.node}`);
    if (this.context.column) parts.push(`column: ${this.context.column}`);
    if (this.context.construct) parts.push(`at: ${this.context.construct}`);
    if (this.context.line !== undefined) parts.push(`line ${this.context.line}`);
    return parts.length > 0 ? `${this.message} (${parts.join(', ')})` : this.message;
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}

// ── Fatal errors ─────────────────────────────────────────────────────

export class ParseError extends ConversionError {
  constructor(message: string, context: ErrorContext = {}, step: ConversionStep = 'parse') {
    super(step, message, context);
    this.name = 'ParseError';
  }
}

export class RenderError extends ConversionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('render', message, context);
    this.name = 'RenderError';
  }
}

export class CatalogError extends ConversionError {
  constructor(message: string, context: ErrorContext = {}) {
    super('catalog', message, context);
    this.name = 'CatalogError';
  }
}

/** No upstream table owning a join key could be found for a join stage. */
export class FAEResolutionError extends ConversionError {
  readonly key: string;

  constructor(stage: string, key: string, detail: string) {
    super('procedural', `Cannot resolve a source table for key '${key}' of join stage '${stage}': ${detail}`, {
      stage,
      column: key,
    });
    this.name = 'FAEResolutionError';
    this.key = key;
  }

  get stage(): string {
    return this.context.stage ?? '';
  }
}

export interface StrictIssue {
  readonly code: string;
  readonly message: string;
  readonly line?: number;
}

export class StrictModeError extends ConversionError {
  readonly issues: readonly StrictIssue[];

  constructor(issues: readonly StrictIssue[]) {
    const summary = issues.map((i) => i.code).join(', ');
    super('validate', `Strict validation failed with ${issues.length} error(s): ${summary}`);
    this.name = 'StrictModeError';
    this.issues = issues;
  }
}

// ── Non-fatal findings ───────────────────────────────────────────────

export type WarningCode =
  | 'UNMAPPED_FUNCTION'
  | 'ARITY_MISMATCH'
  | 'MISSING_DIALECT_RULE'
  | 'UNKNOWN_SYMBOL'
  | 'CARTESIAN_JOIN'
  | 'DEFAULT_TYPE';

/** Non-fatal finding; the affected construct was passed through unchanged. */
export interface TranslationWarning {
  readonly code: WarningCode;
  readonly message: string;
  readonly function?: string;
  readonly node?: string;
  readonly column?: string;
}
