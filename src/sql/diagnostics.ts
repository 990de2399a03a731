/**
 * Type Check Diagnostics
 * =======================
 *
 * Structured diagnostics returned by the type checker in place of printed
 * output. Every diagnostic accompanies an `error` ReturnType somewhere in
 * the tree; callers detect failure from the ReturnType, not from the
 * presence of diagnostics.
 *
 * Codes:
 * - E1xxx: resolution errors (alias, table, attribute, attribute type)
 * - E2xxx: operand type errors (arithmetic, comparison, logic, aggregate)
 *
 * @module
 */

import type { ReturnType } from './expr-types';

// ============ CODES ============

export const DiagnosticCode = {
  AliasNotFound: 'E1001',
  TableNotFound: 'E1002',
  AttributeNotFound: 'E1003',
  UnrecognizedAttributeType: 'E1004',

  InvalidArithmeticOperand: 'E2001',
  IncompatibleComparison: 'E2002',
  NonBooleanOperand: 'E2003',
  NonNumericAggregate: 'E2004',
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export type DiagnosticCategory = 'resolution' | 'operand';

export function categoryOf(code: DiagnosticCode): DiagnosticCategory {
  return code.startsWith('E1') ? 'resolution' : 'operand';
}

// ============ DIAGNOSTIC ============

export interface DiagnosticDetails {
  /** Operator symbol, e.g. `+`, `>`, `||`, `sum` */
  operator?: string;
  leftType?: ReturnType;
  rightType?: ReturnType;
  operandType?: ReturnType;
  alias?: string;
  table?: string;
  attribute?: string;
  /** Attribute type name the catalog reported */
  attributeType?: string;
  /** Rendered form of the offending (sub)expression */
  expression?: string;
}

export interface Diagnostic {
  severity: 'error';
  code: DiagnosticCode;
  category: DiagnosticCategory;
  message: string;
  details: DiagnosticDetails;
}

/**
 * Accumulates diagnostics in the order they are detected (children before
 * parents, left before right).
 */
export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  error(code: DiagnosticCode, message: string, details: DiagnosticDetails = {}): Diagnostic {
    const diagnostic: Diagnostic = {
      severity: 'error',
      code,
      category: categoryOf(code),
      message,
      details,
    };
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  get count(): number {
    return this.diagnostics.length;
  }

  toArray(): Diagnostic[] {
    return [...this.diagnostics];
  }
}

// ============ FORMATTING ============

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `ERROR [${diagnostic.code}]: ${diagnostic.message}`;
}

/** One line per diagnostic, suitable for a user-facing compile error */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string {
  return diagnostics.map(formatDiagnostic).join('\n');
}
