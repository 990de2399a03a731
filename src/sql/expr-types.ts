/**
 * SQL Expression Tree Types
 * ==========================
 *
 * Type definitions for the typed expression tree: literals, attribute
 * references, unary operators (NOT, SUM, AVG) and binary operators
 * (arithmetic, comparison, OR).
 *
 * Nodes are plain frozen objects tagged by `kind`. Every traversal switches
 * over the full union, so adding a node kind fails to compile until each
 * traversal handles it.
 *
 * @module
 */

// ============ RETURN TYPES ============

/**
 * Result domain of type inference. `error` is absorbing: any node with an
 * `error` child is itself `error`.
 */
export type ReturnType = 'int' | 'double' | 'string' | 'bool' | 'error';

export function isNumericType(type: ReturnType): boolean {
  return type === 'int' || type === 'double';
}

// ============ OPERATORS ============

export type ArithmeticOp = 'plus' | 'minus' | 'times' | 'divide';
export type ComparisonOp = 'gt' | 'lt' | 'eq' | 'neq';
export type LogicalOp = 'or';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export type AggregateOp = 'sum' | 'avg';
export type UnaryOp = 'not' | AggregateOp;

/** Operator symbols used by the canonical render and by diagnostics */
export const BINARY_OP_SYMBOLS: Readonly<Record<BinaryOp, string>> = {
  plus: '+',
  minus: '-',
  times: '*',
  divide: '/',
  gt: '>',
  lt: '<',
  eq: '==',
  neq: '!=',
  or: '||',
};

export function isArithmeticOp(op: BinaryOp): op is ArithmeticOp {
  return op === 'plus' || op === 'minus' || op === 'times' || op === 'divide';
}

export function isAggregateOp(op: UnaryOp): op is AggregateOp {
  return op === 'sum' || op === 'avg';
}

// ============ NODES ============

interface NodeBase {
  /** Height of the subtree rooted here (leaves are 1) */
  readonly depth: number;
}

export type LiteralExpr =
  | (NodeBase & { readonly kind: 'literal'; readonly literal: 'bool'; readonly value: boolean })
  | (NodeBase & { readonly kind: 'literal'; readonly literal: 'int'; readonly value: number })
  | (NodeBase & { readonly kind: 'literal'; readonly literal: 'double'; readonly value: number })
  | (NodeBase & { readonly kind: 'literal'; readonly literal: 'string'; readonly value: string });

/** Column reference qualified by the FROM-clause alias it is bound through */
export interface AttributeRefExpr extends NodeBase {
  readonly kind: 'attribute';
  readonly alias: string;
  readonly attribute: string;
}

export interface UnaryExpr extends NodeBase {
  readonly kind: 'unary';
  readonly op: UnaryOp;
  readonly child: ExprNode;
}

export interface BinaryExpr extends NodeBase {
  readonly kind: 'binary';
  readonly op: BinaryOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export type ExprNode = LiteralExpr | AttributeRefExpr | UnaryExpr | BinaryExpr;

// ============ ATTRIBUTE REFERENCES ============

export interface AttributeRef {
  alias: string;
  attribute: string;
}

/**
 * Set of (alias, attribute) pairs. Pairs are compared by value, so inserting
 * the same reference twice keeps one entry.
 */
export class AttributeRefSet implements Iterable<AttributeRef> {
  private refs = new Map<string, AttributeRef>();

  add(alias: string, attribute: string): this {
    const key = JSON.stringify([alias, attribute]);
    if (!this.refs.has(key)) {
      this.refs.set(key, { alias, attribute });
    }
    return this;
  }

  has(alias: string, attribute: string): boolean {
    return this.refs.has(JSON.stringify([alias, attribute]));
  }

  get size(): number {
    return this.refs.size;
  }

  toArray(): AttributeRef[] {
    return [...this.refs.values()];
  }

  [Symbol.iterator](): Iterator<AttributeRef> {
    return this.refs.values();
  }
}

/** Exhaustiveness guard for switches over closed unions */
export function assertNever(value: never, context: string): never {
  throw new Error(`${context}: unhandled variant ${JSON.stringify(value)}`);
}
