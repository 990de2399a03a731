/**
 * Parser Adapter Tests
 * =====================
 *
 * Expression trees built from node-sql-parser output, both from hand-built
 * AST records and from SQL text.
 */
import { describe, it, expect } from 'vitest';
import { exprFromSQL, exprFromSQLAst, selectFromSQL } from '../../sql/from-ast';
import { renderExpr } from '../../sql/render';
import { SQLParseError, UnsupportedExpressionError } from '../../sql/errors';
import { NumericLiteralCursor, scanNumericLiterals } from '../../sql/parser';
import type { ExprNode } from '../../sql/expr-types';
import { typeCheckExpr } from '../../sql/type-check';
import { DiagnosticCode } from '../../sql/diagnostics';
import { createTestCatalog } from '../test-catalog';

const col = (table: string | null, column: string) => ({ type: 'column_ref', table, column });

describe('exprFromSQLAst', () => {
  it('should convert column references', () => {
    expect(renderExpr(exprFromSQLAst(col('o', 'amount')))).toBe('[o_amount]');
  });

  it('should accept object-form column names', () => {
    const ast = { type: 'column_ref', table: 'c', column: { expr: { type: 'default', value: 'name' } } };
    expect(renderExpr(exprFromSQLAst(ast))).toBe('[c_name]');
  });

  it('should qualify bare columns with the default alias', () => {
    expect(renderExpr(exprFromSQLAst(col(null, 'id'), { defaultAlias: 'Orders' }))).toBe('[Orders_id]');
  });

  it('should reject bare columns without a default alias', () => {
    expect(() => exprFromSQLAst(col(null, 'id'))).toThrow(UnsupportedExpressionError);
  });

  it('should split numbers into int and double literals', () => {
    expect(renderExpr(exprFromSQLAst({ type: 'number', value: 12 }))).toBe('int[12]');
    expect(renderExpr(exprFromSQLAst({ type: 'number', value: 0.75 }))).toBe('double[0.750000]');
  });

  it('should use the source spelling to keep whole decimals as doubles', () => {
    const literals = new NumericLiteralCursor('1 + 1.0');
    const ast = {
      type: 'binary_expr',
      operator: '+',
      left: { type: 'number', value: 1 },
      right: { type: 'number', value: 1 },
    };
    expect(renderExpr(exprFromSQLAst(ast, { literals }))).toBe('+ (int[1], double[1.000000])');
  });

  it('should turn integers beyond the safe range into doubles', () => {
    expect(renderExpr(exprFromSQLAst({ type: 'bigint', value: '9007199254740993' }))).toBe(
      'double[9007199254740992.000000]'
    );
  });

  it('should convert string and bool literals', () => {
    expect(renderExpr(exprFromSQLAst({ type: 'single_quote_string', value: 'rush' }))).toBe('string[rush]');
    expect(renderExpr(exprFromSQLAst({ type: 'bool', value: false }))).toBe('bool[false]');
  });

  it('should map comparison operators', () => {
    const ast = {
      type: 'binary_expr',
      operator: '<>',
      left: col('c', 'name'),
      right: { type: 'single_quote_string', value: 'x' },
    };
    expect(renderExpr(exprFromSQLAst(ast))).toBe('!= ([c_name], string[x])');
  });

  it('should express >= and <= as negated strict comparisons', () => {
    const ge = { type: 'binary_expr', operator: '>=', left: col('o', 'id'), right: { type: 'number', value: 5 } };
    const le = { type: 'binary_expr', operator: '<=', left: col('o', 'id'), right: { type: 'number', value: 5 } };

    expect(renderExpr(exprFromSQLAst(ge))).toBe('!(< ([o_id], int[5]))');
    expect(renderExpr(exprFromSQLAst(le))).toBe('!(> ([o_id], int[5]))');
  });

  it('should grow linearly when >= nests', () => {
    let ast: unknown = col('o', 'paid');
    for (let i = 0; i < 12; i++) {
      ast = { type: 'binary_expr', operator: '>=', left: ast, right: { type: 'bool', value: true } };
    }
    const expr: ExprNode = exprFromSQLAst(ast);

    expect(expr.depth).toBe(25);
    expect(renderExpr(expr).match(/\[o_paid\]/g)).toHaveLength(1);
  });

  it('should express AND through NOT and OR', () => {
    const ast = {
      type: 'binary_expr',
      operator: 'AND',
      left: col('o', 'paid'),
      right: { type: 'bool', value: true },
    };
    expect(renderExpr(exprFromSQLAst(ast))).toBe('!(|| (!([o_paid]), !(bool[true])))');
  });

  it('should convert NOT and negation', () => {
    expect(renderExpr(exprFromSQLAst({ type: 'unary_expr', operator: 'NOT', expr: col('o', 'paid') }))).toBe(
      '!([o_paid])'
    );
    expect(renderExpr(exprFromSQLAst({ type: 'unary_expr', operator: '-', expr: { type: 'number', value: 3 } }))).toBe(
      'int[-3]'
    );
    expect(renderExpr(exprFromSQLAst({ type: 'unary_expr', operator: '-', expr: col('o', 'id') }))).toBe(
      '- (int[0], [o_id])'
    );
  });

  it('should convert SUM and AVG', () => {
    const ast = { type: 'aggr_func', name: 'AVG', args: { expr: col('o', 'amount') }, over: null };
    expect(renderExpr(exprFromSQLAst(ast))).toBe('avg([o_amount])');
  });

  it('should reject other aggregates and functions', () => {
    expect(() => exprFromSQLAst({ type: 'aggr_func', name: 'COUNT', args: { expr: col('o', 'id') } })).toThrow(
      "Unsupported expression 'aggr_func': aggregate COUNT"
    );
    expect(() => exprFromSQLAst({ type: 'function', name: 'ABS' })).toThrow("Unsupported expression 'function'");
    expect(() => exprFromSQLAst({ type: 'binary_expr', operator: 'LIKE', left: col('o', 'note'), right: col('o', 'note') })).toThrow(
      "operator 'LIKE'"
    );
  });
});

describe('selectFromSQL', () => {
  it('should convert an aggregate select column and the FROM bindings', () => {
    const { columns, bindings, where } = selectFromSQL('SELECT SUM(o.amount + 1) FROM Orders o');

    expect(columns.map(renderExpr)).toEqual(['sum(+ ([o_amount], int[1]))']);
    expect(bindings.entries()).toEqual([{ tableName: 'Orders', alias: 'o' }]);
    expect(where).toBeUndefined();
  });

  it('should convert the WHERE clause', () => {
    const { columns, where } = selectFromSQL(
      "SELECT o.id FROM Orders o WHERE o.amount > 10 OR o.note = 'rush'"
    );

    expect(columns.map(renderExpr)).toEqual(['[o_id]']);
    expect(where && renderExpr(where)).toBe('|| (> ([o_amount], int[10]), == ([o_note], string[rush]))');
  });

  it('should bind unqualified columns to a single FROM table', () => {
    const { columns, bindings } = selectFromSQL('SELECT amount * 2 FROM Orders');

    expect(columns.map(renderExpr)).toEqual(['* ([Orders_amount], int[2])']);
    expect(bindings.resolve('Orders')).toBe('Orders');
  });

  it('should convert decimal literals inside aggregates', () => {
    expect(renderExpr(exprFromSQL('SELECT AVG(o.amount * 1.5) FROM Orders o'))).toBe(
      'avg(* ([o_amount], double[1.500000]))'
    );
  });

  it('should type whole decimals written with a fraction as double', () => {
    const catalog = createTestCatalog();
    const { columns, bindings } = selectFromSQL('SELECT SUM(o.id * 1.0), o.id + 2.0, 2.50 FROM Orders o');

    expect(columns.map(renderExpr)).toEqual([
      'sum(* ([o_id], double[1.000000]))',
      '+ ([o_id], double[2.000000])',
      'double[2.500000]',
    ]);
    expect(columns.map(c => typeCheckExpr(c, catalog, bindings).type)).toEqual(['double', 'double', 'double']);
  });

  it('should report a failing operand of >= once', () => {
    const catalog = createTestCatalog();
    const { where, bindings } = selectFromSQL('SELECT o.id FROM Orders o WHERE x.amount >= 1');
    if (!where) throw new Error('expected a WHERE expression');

    expect(renderExpr(where)).toBe('!(< ([x_amount], int[1]))');
    const result = typeCheckExpr(where, catalog, bindings);
    expect(result.type).toBe('error');
    expect(result.diagnostics.map(d => d.code)).toEqual([DiagnosticCode.AliasNotFound]);
  });

  it('should collect every FROM table', () => {
    const { bindings } = selectFromSQL('SELECT o.id FROM Orders o, Customers c');
    expect(bindings.entries()).toEqual([
      { tableName: 'Orders', alias: 'o' },
      { tableName: 'Customers', alias: 'c' },
    ]);
  });

  it('should reject unsupported select expressions', () => {
    expect(() => selectFromSQL('SELECT COUNT(o.id) FROM Orders o')).toThrow(UnsupportedExpressionError);
  });

  it('should surface parser failures', () => {
    expect(() => selectFromSQL('SELEC amount FROM')).toThrow(SQLParseError);
  });
});

describe('scanNumericLiterals', () => {
  it('should list numeric literals outside strings and identifiers', () => {
    expect(scanNumericLiterals("SELECT t1.c2 + 1.0, '3.5', `x9` FROM t1 WHERE c > .5e2 -- 7")).toEqual(['1.0', '.5e2']);
  });

  it('should hand out spellings in order and skip literals never asked for', () => {
    const literals = new NumericLiteralCursor('10, 2.0, 2');

    expect(literals.take(2)).toBe('2.0');
    expect(literals.take(2)).toBe('2');
    expect(literals.take(10)).toBeUndefined();
  });
});
