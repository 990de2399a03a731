/**
 * Expression Trees from Parser Output
 * ====================================
 *
 * Converts node-sql-parser ASTs into typed expression trees. Tokenizing and
 * grammar stay with node-sql-parser; this module only maps its already
 * parsed expression nodes onto the closed set of ExprNode kinds.
 *
 * Mapping:
 * - `column_ref`            -> attribute reference (`t.col`)
 * - `number`, `bigint`      -> int literal when written without a fraction or
 *                              exponent and within the safe integer range,
 *                              else double
 * - quoted strings          -> string literal
 * - `bool`                  -> bool literal
 * - `+ - * /`               -> arithmetic
 * - `> < = != <>`           -> comparison
 * - `>=`, `<=`              -> `!(< (a, b))`, `!(> (a, b))`
 * - `OR`, `AND`, `NOT`      -> `||`, `!(|| (!(a), !(b)))`, `!`
 * - `SUM(...)`, `AVG(...)`  -> aggregates
 *
 * Anything else raises UnsupportedExpressionError.
 *
 * @module
 */

import { AliasBindings, type AliasBinding } from '../catalog/alias-bindings';
import type { ExprNode } from './expr-types';
import {
  aggregate,
  attributeRef,
  boolLiteral,
  divide,
  doubleLiteral,
  eq,
  gt,
  intLiteral,
  lt,
  minus,
  neq,
  not,
  or,
  plus,
  stringLiteral,
  times,
} from './expr-builders';
import { UnsupportedExpressionError } from './errors';
import { NumericLiteralCursor, SQLParser, identifierText, isAstNode, nodeType, type AstNode } from './parser';

function child(node: AstNode, key: string): AstNode {
  const value = node[key];
  if (!isAstNode(value)) {
    throw new UnsupportedExpressionError(nodeType(node), `missing operand '${key}'`);
  }
  return value;
}

// ============ CONVERSION ============

export interface ExprFromAstOptions {
  /** Alias used for unqualified column references */
  defaultAlias?: string;
  /** Source spelling of numeric literals, consulted to tell `1.0` from `1` */
  literals?: NumericLiteralCursor;
}

function convertNumber(node: AstNode, options: ExprFromAstOptions): ExprNode {
  const type = nodeType(node);
  const value = typeof node.value === 'string' ? Number(node.value) : node.value;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new UnsupportedExpressionError(type, `invalid numeric value ${String(node.value)}`);
  }
  const sourceText = options.literals?.take(Math.abs(value));
  const text = typeof node.value === 'string' ? node.value : sourceText;
  const fractional = text !== undefined && /[.eE]/.test(text);
  return !fractional && Number.isSafeInteger(value) ? intLiteral(value) : doubleLiteral(value);
}

function convertColumnRef(node: AstNode, options: ExprFromAstOptions): ExprNode {
  const column = identifierText(node.column);
  if (column === undefined || column === '*') {
    throw new UnsupportedExpressionError('column_ref', 'expected a named column');
  }
  const alias = identifierText(node.table) ?? options.defaultAlias;
  if (alias === undefined) {
    throw new UnsupportedExpressionError('column_ref', `column '${column}' must be qualified with a table alias`);
  }
  return attributeRef(alias, column);
}

function convertBinary(node: AstNode, options: ExprFromAstOptions): ExprNode {
  const operator = typeof node.operator === 'string' ? node.operator.toUpperCase() : '';
  const left = () => exprFromSQLAst(child(node, 'left'), options);
  const right = () => exprFromSQLAst(child(node, 'right'), options);

  switch (operator) {
    case '+':
      return plus(left(), right());
    case '-':
      return minus(left(), right());
    case '*':
      return times(left(), right());
    case '/':
      return divide(left(), right());
    case '>':
      return gt(left(), right());
    case '<':
      return lt(left(), right());
    case '=':
      return eq(left(), right());
    case '!=':
    case '<>':
      return neq(left(), right());
    case '>=':
      return not(lt(left(), right()));
    case '<=':
      return not(gt(left(), right()));
    case 'OR':
      return or(left(), right());
    case 'AND':
      return not(or(not(left()), not(right())));
    default:
      throw new UnsupportedExpressionError('binary_expr', `operator '${String(node.operator)}'`);
  }
}

function convertUnary(node: AstNode, options: ExprFromAstOptions): ExprNode {
  const operator = typeof node.operator === 'string' ? node.operator.toUpperCase() : '';
  const operand = exprFromSQLAst(child(node, 'expr'), options);

  if (operator === 'NOT' || operator === '!') return not(operand);
  if (operator === '-') {
    if (operand.kind === 'literal' && operand.literal === 'int') return intLiteral(-operand.value);
    if (operand.kind === 'literal' && operand.literal === 'double') return doubleLiteral(-operand.value);
    return minus(intLiteral(0), operand);
  }
  throw new UnsupportedExpressionError('unary_expr', `operator '${String(node.operator)}'`);
}

function convertAggregate(node: AstNode, options: ExprFromAstOptions): ExprNode {
  const name = identifierText(node.name)?.toUpperCase() ?? '';
  if (node.over) {
    throw new UnsupportedExpressionError('aggr_func', `window function ${name}`);
  }
  if (name !== 'SUM' && name !== 'AVG') {
    throw new UnsupportedExpressionError('aggr_func', `aggregate ${name}`);
  }
  const args = child(node, 'args');
  if (args.distinct) {
    throw new UnsupportedExpressionError('aggr_func', `${name}(DISTINCT ...)`);
  }
  const operand = exprFromSQLAst(child(args, 'expr'), options);
  return aggregate(name === 'SUM' ? 'sum' : 'avg', operand);
}

/**
 * Convert a single node-sql-parser expression node into an ExprNode.
 */
export function exprFromSQLAst(ast: unknown, options: ExprFromAstOptions = {}): ExprNode {
  if (!isAstNode(ast)) {
    throw new UnsupportedExpressionError(typeof ast, 'expected an expression node');
  }

  const type = nodeType(ast);
  switch (type) {
    case 'column_ref':
      return convertColumnRef(ast, options);
    case 'number':
    case 'bigint':
      return convertNumber(ast, options);
    case 'single_quote_string':
    case 'double_quote_string':
    case 'string':
      if (typeof ast.value !== 'string') {
        throw new UnsupportedExpressionError(type, 'expected string content');
      }
      return stringLiteral(ast.value);
    case 'bool':
      if (typeof ast.value !== 'boolean') {
        throw new UnsupportedExpressionError(type, 'expected TRUE or FALSE');
      }
      return boolLiteral(ast.value);
    case 'binary_expr':
      return convertBinary(ast, options);
    case 'unary_expr':
      return convertUnary(ast, options);
    case 'aggr_func':
      return convertAggregate(ast, options);
    default:
      throw new UnsupportedExpressionError(type);
  }
}

// ============ SELECT STATEMENTS ============

export interface SelectExprs {
  /** One expression per select-list entry, in order */
  columns: ExprNode[];
  where?: ExprNode;
  bindings: AliasBindings;
}

function bindingsFromFrom(from: unknown): AliasBinding[] {
  if (!Array.isArray(from)) return [];
  const bindings: AliasBinding[] = [];
  for (const entry of from) {
    if (!isAstNode(entry)) continue;
    const tableName = identifierText(entry.table);
    if (tableName === undefined) {
      throw new UnsupportedExpressionError('from', 'only plain table references are supported');
    }
    bindings.push({ tableName, alias: identifierText(entry.as) ?? tableName });
  }
  return bindings;
}

/**
 * Parse a SELECT statement with node-sql-parser and convert its select list
 * and WHERE clause. The FROM clause becomes the alias bindings; with a
 * single table, unqualified columns bind to it.
 *
 * ```ts
 * const { columns, bindings } = selectFromSQL('SELECT SUM(o.amount) FROM Orders o');
 * typeCheckExpr(columns[0], catalog, bindings).type; // 'double'
 * ```
 */
export function selectFromSQL(sql: string): SelectExprs {
  const stmt = new SQLParser().parseStatement(sql);
  if (stmt.type !== 'select') {
    throw new UnsupportedExpressionError(nodeType(stmt), 'expected a SELECT statement');
  }

  const bindings = new AliasBindings(bindingsFromFrom(stmt.from));
  const entries = bindings.entries();
  const options: ExprFromAstOptions = { literals: new NumericLiteralCursor(sql) };
  if (entries.length === 1) options.defaultAlias = entries[0].alias;

  const columns: ExprNode[] = [];
  if (Array.isArray(stmt.columns)) {
    for (const col of stmt.columns) {
      if (!isAstNode(col)) {
        throw new UnsupportedExpressionError('column', 'SELECT * has no expression form');
      }
      columns.push(exprFromSQLAst(col.expr, options));
    }
  }

  const where = isAstNode(stmt.where) ? exprFromSQLAst(stmt.where, options) : undefined;
  return where ? { columns, where, bindings } : { columns, bindings };
}

/** The first select-list expression of `SELECT <expr> FROM ...` */
export function exprFromSQL(sql: string): ExprNode {
  const { columns } = selectFromSQL(sql);
  if (columns.length === 0) {
    throw new UnsupportedExpressionError('select', 'no select-list expression');
  }
  return columns[0];
}
