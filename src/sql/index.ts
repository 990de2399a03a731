/**
 * SQL Expression Module
 * ======================
 *
 * Typed expression trees for the query compiler: builders, canonical
 * rendering, type checking against a catalog, aggregate classification and
 * attribute extraction.
 *
 * ## Quick Start
 *
 * ```ts
 * import { sum, plus, attributeRef, intLiteral, typeCheckExpr, renderExpr } from './sql';
 *
 * const expr = sum(plus(attributeRef('o', 'amount'), intLiteral(1)));
 * renderExpr(expr);                                              // 'sum(+ ([o_amount], int[1]))'
 * typeCheckExpr(expr, catalog, [{ tableName: 'Orders', alias: 'o' }]).type; // 'double'
 * ```
 *
 * @module
 */

// Re-export expression types
export * from './expr-types';

// Re-export builders
export * from './expr-builders';

// Re-export analyses
export { renderExpr, formatDouble } from './render';
export { typeCheckExpr, type TypeCheckResult } from './type-check';
export { isAggregate, collectAttributeRefs, attributeRefsOf } from './analysis';
export { analyzeExpr, type ExprSummary } from './analyze';

// Re-export diagnostics and options
export * from './diagnostics';
export * from './options';
export * from './errors';

// Re-export parser adapters
export { SQLParser } from './parser';
export { exprFromSQLAst, exprFromSQL, selectFromSQL, type ExprFromAstOptions, type SelectExprs } from './from-ast';
