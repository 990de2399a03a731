/**
 * Runs the four expression analyses together for plan display.
 *
 * @module
 */

import type { Catalog } from '../catalog/catalog';
import type { AliasBindingsInput } from '../catalog/alias-bindings';
import type { AttributeRef, ExprNode, ReturnType } from './expr-types';
import type { Diagnostic } from './diagnostics';
import type { ExprAnalysisOptions } from './options';
import { attributeRefsOf, isAggregate } from './analysis';
import { renderExpr } from './render';
import { typeCheckExpr } from './type-check';

export interface ExprSummary {
  rendered: string;
  type: ReturnType;
  aggregate: boolean;
  attributes: AttributeRef[];
  diagnostics: Diagnostic[];
}

export function analyzeExpr(
  expr: ExprNode,
  catalog: Catalog,
  bindings: AliasBindingsInput,
  options: ExprAnalysisOptions = {}
): ExprSummary {
  const { type, diagnostics } = typeCheckExpr(expr, catalog, bindings, options);
  return {
    rendered: renderExpr(expr),
    type,
    aggregate: isAggregate(expr, options),
    attributes: attributeRefsOf(expr, options).toArray(),
    diagnostics,
  };
}
