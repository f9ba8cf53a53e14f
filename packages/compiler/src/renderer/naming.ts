import { quoteIdentifier } from '../core/expression-printer.js';

/** Replace everything outside `[A-Za-z0-9_]` so a name is usable unquoted. */
export function sanitizeIdentifier(value: string): string {
  const cleaned = value.trim().replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/** `"SCHEMA"."OBJECT"`, or just `"OBJECT"` without a schema. */
export function qualifiedName(schema: string | undefined, object: string): string {
  return schema ? `${quoteIdentifier(schema)}.${quoteIdentifier(object)}` : quoteIdentifier(object);
}

/** Unquoted dotted name for function symbols such as a currency UDF. */
export function dottedName(schema: string | undefined, object: string): string {
  return schema ? `${schema}.${object}` : object;
}

/** Replace `{view}` in a DDL template. */
export function fillViewTemplate(template: string, view: string): string {
  return template.replace(/\{view\}/g, view);
}
