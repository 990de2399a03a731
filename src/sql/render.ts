/**
 * Canonical Rendering
 * ====================
 *
 * Deterministic string form of an expression tree, used for plan display,
 * diagnostics and equality checks in tests.
 *
 * Grammar:
 * - literals: `bool[true]`, `int[42]`, `double[1.500000]`, `string[abc]`
 * - attribute: `[alias_attribute]`
 * - binary: `+ (L, R)`, `== (L, R)`, `|| (L, R)`, ...
 * - unary: `!(C)`, `sum(C)`, `avg(C)`
 *
 * @module
 */

import { BINARY_OP_SYMBOLS, assertNever, type ExprNode, type LiteralExpr, type UnaryOp } from './expr-types';

/** Doubles print with six fractional digits, e.g. `double[2.500000]` */
export function formatDouble(value: number): string {
  // toFixed switches to exponent notation from 1e21; doubles that large are whole
  const digits = Math.abs(value) < 1e21 ? value.toFixed(6) : `${BigInt(value).toString()}.000000`;
  return Object.is(value, -0) ? `-${digits}` : digits;
}

function renderLiteral(expr: LiteralExpr): string {
  switch (expr.literal) {
    case 'bool':
      return `bool[${expr.value ? 'true' : 'false'}]`;
    case 'int':
      return `int[${String(expr.value)}]`;
    case 'double':
      return `double[${formatDouble(expr.value)}]`;
    case 'string':
      return `string[${expr.value}]`;
    default:
      return assertNever(expr, 'renderLiteral');
  }
}

const UNARY_PREFIX: Readonly<Record<UnaryOp, string>> = {
  not: '!',
  sum: 'sum',
  avg: 'avg',
};

export function renderExpr(expr: ExprNode): string {
  switch (expr.kind) {
    case 'literal':
      return renderLiteral(expr);
    case 'attribute':
      return `[${expr.alias}_${expr.attribute}]`;
    case 'unary':
      return `${UNARY_PREFIX[expr.op]}(${renderExpr(expr.child)})`;
    case 'binary':
      return `${BINARY_OP_SYMBOLS[expr.op]} (${renderExpr(expr.left)}, ${renderExpr(expr.right)})`;
    default:
      return assertNever(expr, 'renderExpr');
  }
}
