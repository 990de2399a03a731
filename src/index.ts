/**
 * sql-typed-expr
 * ===============
 *
 * The typed-expression layer of a SQL query compiler: immutable expression
 * trees plus a semantic type checker that validates operands against a
 * table catalog and the query's alias bindings.
 *
 * ## Quick Start
 *
 * ```ts
 * import { catalogFromDDL, selectFromSQL, analyzeExpr } from 'sql-typed-expr';
 *
 * const catalog = catalogFromDDL('CREATE TABLE Orders (id INT, amount DOUBLE)');
 * const { columns, bindings } = selectFromSQL('SELECT SUM(o.amount + 1) FROM Orders o');
 * analyzeExpr(columns[0], catalog, bindings);
 * // { rendered: 'sum(+ ([o_amount], int[1]))', type: 'double', aggregate: true, ... }
 * ```
 *
 * ## Core Concepts
 *
 * - **ExprNode**: literal, attribute reference, unary (NOT/SUM/AVG) or binary node
 * - **ReturnType**: int, double, string, bool or the absorbing error
 * - **Catalog**: table name -> schema -> attribute type
 * - **Alias bindings**: FROM-clause (table, alias) pairs, first match wins
 *
 * @module
 */

// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export * from './sql';


// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

export * from './catalog';
