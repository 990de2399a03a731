/**
 * Configuration for the expression analyses.
 *
 * @module
 */

/**
 * How comparison (`> < == !=`) and boolean (`|| !`) nodes treat their
 * children when classifying aggregates and collecting attribute references.
 *
 * - `'arithmetic-only'`: only arithmetic and aggregate nodes look at their
 *   children; a predicate reports no aggregate and no attributes. This is
 *   what existing planners were written against.
 * - `'full'`: predicates propagate like arithmetic, so `sum(x) > 5` is an
 *   aggregate expression referencing `x`.
 */
export type PredicatePropagation = 'arithmetic-only' | 'full';

export interface AnalysisOptions {
  predicatePropagation?: PredicatePropagation;
}

export interface TypeCheckOptions {
  /** Enable debug logging */
  debug?: boolean;
}

export type ExprAnalysisOptions = AnalysisOptions & TypeCheckOptions;

export const DEFAULT_ANALYSIS_OPTIONS: Required<AnalysisOptions> = {
  predicatePropagation: 'arithmetic-only',
};

export const DEFAULT_TYPECHECK_OPTIONS: Required<TypeCheckOptions> = {
  debug: false,
};
