/**
 * Aggregate Classification & Attribute Extraction
 * ================================================
 *
 * Structural analyses that need neither the catalog nor alias bindings.
 *
 * Arithmetic nodes propagate both analyses from their children; SUM and AVG
 * are always aggregate. Comparison and boolean nodes propagate only under
 * `predicatePropagation: 'full'` (see {@link PredicatePropagation}).
 *
 * @module
 */

import {
  AttributeRefSet,
  assertNever,
  isAggregateOp,
  isArithmeticOp,
  type BinaryOp,
  type ExprNode,
  type UnaryOp,
} from './expr-types';
import { DEFAULT_ANALYSIS_OPTIONS, type AnalysisOptions, type PredicatePropagation } from './options';

function propagatesBinary(op: BinaryOp, mode: PredicatePropagation): boolean {
  return isArithmeticOp(op) || mode === 'full';
}

function propagatesUnary(op: UnaryOp, mode: PredicatePropagation): boolean {
  return isAggregateOp(op) || mode === 'full';
}

// ============ AGGREGATES ============

function isAggregateIn(expr: ExprNode, mode: PredicatePropagation): boolean {
  switch (expr.kind) {
    case 'literal':
    case 'attribute':
      return false;
    case 'unary':
      if (isAggregateOp(expr.op)) return true;
      return mode === 'full' && isAggregateIn(expr.child, mode);
    case 'binary':
      return (
        propagatesBinary(expr.op, mode) && (isAggregateIn(expr.left, mode) || isAggregateIn(expr.right, mode))
      );
    default:
      return assertNever(expr, 'isAggregate');
  }
}

/**
 * True when evaluating `expr` needs group-level aggregation: it is SUM/AVG
 * or (for propagating nodes) contains one.
 */
export function isAggregate(expr: ExprNode, options: AnalysisOptions = {}): boolean {
  const { predicatePropagation } = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };
  return isAggregateIn(expr, predicatePropagation);
}

// ============ ATTRIBUTE REFERENCES ============

function collectInto(expr: ExprNode, refs: AttributeRefSet, mode: PredicatePropagation): void {
  switch (expr.kind) {
    case 'literal':
      return;
    case 'attribute':
      refs.add(expr.alias, expr.attribute);
      return;
    case 'unary':
      if (propagatesUnary(expr.op, mode)) collectInto(expr.child, refs, mode);
      return;
    case 'binary':
      if (propagatesBinary(expr.op, mode)) {
        collectInto(expr.left, refs, mode);
        collectInto(expr.right, refs, mode);
      }
      return;
    default:
      assertNever(expr, 'collectAttributeRefs');
  }
}

/** Add every attribute reference reachable from `expr` to `refs` */
export function collectAttributeRefs(expr: ExprNode, refs: AttributeRefSet, options: AnalysisOptions = {}): void {
  const { predicatePropagation } = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };
  collectInto(expr, refs, predicatePropagation);
}

/** Convenience form of {@link collectAttributeRefs} returning a fresh set */
export function attributeRefsOf(expr: ExprNode, options: AnalysisOptions = {}): AttributeRefSet {
  const refs = new AttributeRefSet();
  collectAttributeRefs(expr, refs, options);
  return refs;
}
