/**
 * Expression Builders
 * ====================
 *
 * Factory functions the planner uses to assemble expression trees bottom-up.
 * Each builder returns a frozen node and records its subtree depth; trees
 * deeper than MAX_EXPRESSION_DEPTH are rejected here so that no traversal
 * can recurse past it.
 *
 * ```ts
 * const total = sum(plus(attributeRef('o', 'amount'), intLiteral(1)));
 * renderExpr(total); // 'sum(+ ([o_amount], int[1]))'
 * ```
 *
 * @module
 */

import type {
  AggregateOp,
  AttributeRefExpr,
  BinaryExpr,
  BinaryOp,
  ExprNode,
  LiteralExpr,
  UnaryExpr,
  UnaryOp,
} from './expr-types';
import { ExpressionDepthError } from './errors';

export const MAX_EXPRESSION_DEPTH = 512;

function checkDepth(depth: number): number {
  if (depth > MAX_EXPRESSION_DEPTH) {
    throw new ExpressionDepthError(depth, MAX_EXPRESSION_DEPTH);
  }
  return depth;
}

// ============ LITERALS ============

export function boolLiteral(value: boolean): LiteralExpr {
  const node: LiteralExpr = { kind: 'literal', literal: 'bool', value, depth: 1 };
  return Object.freeze(node);
}

export function intLiteral(value: number): LiteralExpr {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`intLiteral: value must be a safe integer (got: ${value})`);
  }
  const node: LiteralExpr = { kind: 'literal', literal: 'int', value, depth: 1 };
  return Object.freeze(node);
}

export function doubleLiteral(value: number): LiteralExpr {
  if (!Number.isFinite(value)) {
    throw new Error(`doubleLiteral: value must be finite (got: ${value})`);
  }
  const node: LiteralExpr = { kind: 'literal', literal: 'double', value, depth: 1 };
  return Object.freeze(node);
}

/** String literal from its already-unquoted content */
export function stringLiteral(value: string): LiteralExpr {
  const node: LiteralExpr = { kind: 'literal', literal: 'string', value, depth: 1 };
  return Object.freeze(node);
}

/**
 * String literal from source text such as `'abc'`. Exactly one leading and
 * one trailing delimiter character are removed; nothing is unescaped.
 */
export function stringLiteralFromSource(source: string): LiteralExpr {
  if (source.length < 2) {
    throw new Error(`stringLiteralFromSource: expected a delimited literal (got: "${source}")`);
  }
  return stringLiteral(source.slice(1, -1));
}

// ============ ATTRIBUTE REFERENCES ============

export function attributeRef(alias: string, attribute: string): AttributeRefExpr {
  const node: AttributeRefExpr = { kind: 'attribute', alias, attribute, depth: 1 };
  return Object.freeze(node);
}

// ============ UNARY ============

export function unary(op: UnaryOp, child: ExprNode): UnaryExpr {
  const node: UnaryExpr = { kind: 'unary', op, child, depth: checkDepth(child.depth + 1) };
  return Object.freeze(node);
}

export const not = (child: ExprNode): UnaryExpr => unary('not', child);
export const sum = (child: ExprNode): UnaryExpr => unary('sum', child);
export const avg = (child: ExprNode): UnaryExpr => unary('avg', child);

export function aggregate(op: AggregateOp, child: ExprNode): UnaryExpr {
  return unary(op, child);
}

// ============ BINARY ============

export function binary(op: BinaryOp, left: ExprNode, right: ExprNode): BinaryExpr {
  const depth = checkDepth(Math.max(left.depth, right.depth) + 1);
  const node: BinaryExpr = { kind: 'binary', op, left, right, depth };
  return Object.freeze(node);
}

export const plus = (left: ExprNode, right: ExprNode): BinaryExpr => binary('plus', left, right);
export const minus = (left: ExprNode, right: ExprNode): BinaryExpr => binary('minus', left, right);
export const times = (left: ExprNode, right: ExprNode): BinaryExpr => binary('times', left, right);
export const divide = (left: ExprNode, right: ExprNode): BinaryExpr => binary('divide', left, right);

export const gt = (left: ExprNode, right: ExprNode): BinaryExpr => binary('gt', left, right);
export const lt = (left: ExprNode, right: ExprNode): BinaryExpr => binary('lt', left, right);
export const eq = (left: ExprNode, right: ExprNode): BinaryExpr => binary('eq', left, right);
export const neq = (left: ExprNode, right: ExprNode): BinaryExpr => binary('neq', left, right);

export const or = (left: ExprNode, right: ExprNode): BinaryExpr => binary('or', left, right);
