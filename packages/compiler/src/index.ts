// ── Core: types ──────────────────────────────────────────────────────
export { toNodeKey, findNode, findColumn, traceColumn, aggregatedType } from './core/types.js';
export type {
  NodeKey,
  AggregationFunction,
  ColumnSource,
  RealColumn,
  CalculatedColumn,
  Column,
  TypeOrigin,
  Filter,
  JoinType,
  JoinKey,
  Join,
  NodeKind,
  TableNode,
  ProjectionNode,
  JoinNode,
  AggregationNode,
  UnionNode,
  UnionBranch,
  UnionValue,
  ViewNode,
  InputParameter,
  Scenario,
} from './core/types.js';

// ── Core: data types ─────────────────────────────────────────────────
export {
  TypeFamily,
  SqlTypes,
  declaredType,
  inferTypeFromName,
  isNumeric,
  isStringLike,
  isCompatible,
  formatType,
  describeType,
} from './core/data-types.js';
export type { SqlType, TypeName } from './core/data-types.js';

// ── Core: expressions ────────────────────────────────────────────────
export { column, stringLiteral, numberLiteral, call, binary, and, not, NULL_LITERAL } from './core/expression.js';
export type { Expression, ExpressionKind, BinaryOperator, UnaryOperator } from './core/expression.js';
export { parseFormula } from './core/formula-parser.js';
export type { FormulaOptions } from './core/formula-parser.js';
export { printExpression, quoteIdentifier, quoteString } from './core/expression-printer.js';
export { mapExpression, walkExpression, findExpressions, referencedColumns } from './core/tree-utils.js';

// ── Core: graph ──────────────────────────────────────────────────────
export { ScenarioGraph } from './core/scenario-graph.js';
export type { GraphNode, GraphEdge } from './core/scenario-graph.js';

// ── Core: errors & steps ─────────────────────────────────────────────
export {
  ConversionError,
  ParseError,
  RenderError,
  CatalogError,
  FAEResolutionError,
  StrictModeError,
  isConversionError,
} from './core/errors.js';
export type { ConversionStep, ErrorContext, StrictIssue, WarningCode, TranslationWarning } from './core/errors.js';
export { StepRecorder, snippetOf } from './core/steps.js';
export type { StepRecord, StepStatus, StepOutcome } from './core/steps.js';

// ── Core: config ─────────────────────────────────────────────────────
export { defineConfig, validateConfig, resolveConversionOptions, DEFAULT_OPTIONS } from './core/config.js';
export type { CvsqlConfig, ConversionSettings, ConversionOptions, CurrencyConfig } from './core/config.js';

// ── Catalog ──────────────────────────────────────────────────────────
export { Catalog } from './catalog/catalog.js';
export type { FunctionRule, PatternRule, DialectProfile, CatalogRules, RuleAction, ArityConstraint } from './catalog/catalog.js';
export { defaultCatalog, loadCatalog, parseCatalog, defaultCatalogDirectory, CATALOG_FILES } from './catalog/loader.js';
export type { CatalogSources } from './catalog/loader.js';

// ── Parser ───────────────────────────────────────────────────────────
export { parseScenario, cleanRef } from './parser/xml-parser.js';

// ── Translator ───────────────────────────────────────────────────────
export { translateExpression } from './translator/function-translator.js';
export type { TranslateOptions, TranslationResult } from './translator/function-translator.js';

// ── Renderer ─────────────────────────────────────────────────────────
export { renderScenario } from './renderer/sql-renderer.js';
export type { RenderOptions, RenderResult, RenderedStage, StageColumn } from './renderer/sql-renderer.js';
export { sanitizeIdentifier, qualifiedName } from './renderer/naming.js';

// ── SQL: validation & correction ─────────────────────────────────────
export { validateSql } from './sql/validator.js';
export type { ValidationCode, ValidationIssue, ValidationResult, ValidateOptions, Severity } from './sql/validator.js';
export { correctSql } from './sql/corrector.js';
export type { CorrectionRecord, CorrectionResult, CorrectOptions } from './sql/corrector.js';

// ── Procedural ───────────────────────────────────────────────────────
export { parseLineage } from './procedural/lineage-parser.js';
export type {
  ParsedSql,
  LineageStage,
  LineageStageKind,
  LineageColumn,
  LineageJoin,
  LineageJoinKey,
  LineageBranch,
  FieldRef,
} from './procedural/lineage-parser.js';
export { LineageGraph, findLineageColumn } from './procedural/lineage-graph.js';
export type { ColumnOwner } from './procedural/lineage-graph.js';
export { buildDependencyMap } from './procedural/dependency-map.js';
export type { DependencyMap, FaeResolution, FaeKey } from './procedural/dependency-map.js';
export { generateProcedural, proceduralName } from './procedural/procedural-generator.js';
export type { GenerateOptions } from './procedural/procedural-generator.js';
export { transpileToProcedural } from './procedural/transpiler.js';
export type { ProceduralOptions, ProceduralResult } from './procedural/transpiler.js';

// ── Pipeline ─────────────────────────────────────────────────────────
export { convertXml } from './pipeline.js';
export type { ConvertOptions, ConversionResult } from './pipeline.js';
