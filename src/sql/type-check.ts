/**
 * Expression Type Checker
 * ========================
 *
 * Infers the ReturnType of an expression tree against a catalog and the
 * query's alias bindings.
 *
 * Rules:
 * - `error` is infectious: once a child is `error` the parent is `error`
 *   and its own operator rule is not applied.
 * - Both children of a binary node are always checked, so diagnostics from
 *   both sides are reported.
 * - Only attribute references consult the catalog; every other rule works
 *   on the children's inferred types.
 *
 * ```ts
 * const { type, diagnostics } = typeCheckExpr(expr, catalog, [{ tableName: 'Orders', alias: 'o' }]);
 * if (type === 'error') throw new Error(formatDiagnostics(diagnostics));
 * ```
 *
 * @module
 */

import type { Catalog } from '../catalog/catalog';
import { toAliasBindings, type AliasBindings, type AliasBindingsInput } from '../catalog/alias-bindings';
import {
  BINARY_OP_SYMBOLS,
  assertNever,
  isNumericType,
  type AggregateOp,
  type ArithmeticOp,
  type AttributeRefExpr,
  type BinaryExpr,
  type ComparisonOp,
  type ExprNode,
  type LiteralExpr,
  type ReturnType,
  type UnaryExpr,
} from './expr-types';
import { DiagnosticCode, DiagnosticCollector, formatDiagnostic, type Diagnostic } from './diagnostics';
import { DEFAULT_TYPECHECK_OPTIONS, type TypeCheckOptions } from './options';
import { renderExpr } from './render';

// ============ RESULT ============

export interface TypeCheckResult {
  type: ReturnType;
  diagnostics: Diagnostic[];
}

const ARITHMETIC_VERBS: Readonly<Record<ArithmeticOp, string>> = {
  plus: 'add',
  minus: 'subtract',
  times: 'multiply',
  divide: 'divide',
};

// ============ CHECKER ============

class ExprTypeChecker {
  readonly collector = new DiagnosticCollector();

  constructor(
    private readonly catalog: Catalog,
    private readonly bindings: AliasBindings,
    private readonly debug: boolean
  ) {}

  check(expr: ExprNode): ReturnType {
    switch (expr.kind) {
      case 'literal':
        return this.checkLiteral(expr);
      case 'attribute':
        return this.checkAttribute(expr);
      case 'unary':
        return this.checkUnary(expr);
      case 'binary':
        return this.checkBinary(expr);
      default:
        return assertNever(expr, 'typeCheckExpr');
    }
  }

  private report(code: DiagnosticCode, message: string, details: Diagnostic['details']): 'error' {
    const diagnostic = this.collector.error(code, message, details);
    if (this.debug) {
      console.log(`[SQL:typecheck] ${formatDiagnostic(diagnostic)}`);
    }
    return 'error';
  }

  // ============ LEAVES ============

  private checkLiteral(expr: LiteralExpr): ReturnType {
    return expr.literal;
  }

  private checkAttribute(expr: AttributeRefExpr): ReturnType {
    const { alias, attribute } = expr;

    const tableName = this.bindings.resolve(alias);
    if (tableName === undefined) {
      return this.report(DiagnosticCode.AliasNotFound, `Table alias '${alias}' not found in query`, {
        alias,
        attribute,
      });
    }

    const schema = this.catalog.lookupTable(tableName);
    if (!schema) {
      return this.report(DiagnosticCode.TableNotFound, `Table '${tableName}' not found in catalog`, {
        alias,
        table: tableName,
        attribute,
      });
    }

    const info = schema.lookupAttribute(attribute);
    if (!info) {
      return this.report(
        DiagnosticCode.AttributeNotFound,
        `Attribute '${attribute}' not found in table '${tableName}'`,
        { alias, table: tableName, attribute }
      );
    }

    if (info.type.isBoolean()) return 'bool';

    const typeName = info.type.canonicalName();
    if (typeName === 'int' || typeName === 'double' || typeName === 'string') {
      return typeName;
    }
    return this.report(
      DiagnosticCode.UnrecognizedAttributeType,
      `Attribute '${attribute}' in table '${tableName}' has unrecognized type '${typeName}'`,
      { alias, table: tableName, attribute, attributeType: typeName }
    );
  }

  // ============ UNARY ============

  private checkUnary(expr: UnaryExpr): ReturnType {
    const childType = this.check(expr.child);
    if (childType === 'error') return 'error';

    switch (expr.op) {
      case 'not':
        if (childType !== 'bool') {
          return this.report(
            DiagnosticCode.NonBooleanOperand,
            `NOT operator requires a boolean expression, but got type ${childType}`,
            { operator: '!', operandType: childType, expression: renderExpr(expr.child) }
          );
        }
        return 'bool';
      case 'sum':
      case 'avg':
        return this.checkAggregate(expr.op, expr.child, childType);
      default:
        return assertNever(expr.op, 'checkUnary');
    }
  }

  private checkAggregate(op: AggregateOp, child: ExprNode, childType: ReturnType): ReturnType {
    if (!isNumericType(childType)) {
      const rendered = renderExpr(child);
      return this.report(
        DiagnosticCode.NonNumericAggregate,
        `Cannot apply ${op.toUpperCase()} to non-numeric expression: ${rendered} (type ${childType})`,
        { operator: op, operandType: childType, expression: rendered }
      );
    }
    // AVG divides, so it never stays integral
    return op === 'avg' ? 'double' : childType;
  }

  // ============ BINARY ============

  private checkBinary(expr: BinaryExpr): ReturnType {
    const leftType = this.check(expr.left);
    const rightType = this.check(expr.right);
    if (leftType === 'error' || rightType === 'error') return 'error';

    const op = expr.op;
    switch (op) {
      case 'plus':
      case 'minus':
      case 'times':
      case 'divide':
        return this.checkArithmetic(op, leftType, rightType);
      case 'gt':
      case 'lt':
      case 'eq':
      case 'neq':
        return this.checkComparison(op, leftType, rightType);
      case 'or':
        if (leftType !== 'bool' || rightType !== 'bool') {
          return this.report(
            DiagnosticCode.NonBooleanOperand,
            `OR operator requires boolean operands, but got ${leftType} and ${rightType}`,
            { operator: BINARY_OP_SYMBOLS.or, leftType, rightType }
          );
        }
        return 'bool';
      default:
        return assertNever(op, 'checkBinary');
    }
  }

  private checkArithmetic(op: ArithmeticOp, leftType: ReturnType, rightType: ReturnType): ReturnType {
    // + on a string is concatenation
    if (op === 'plus' && (leftType === 'string' || rightType === 'string')) {
      return 'string';
    }

    const invalid: ReturnType | undefined =
      leftType === 'string' || rightType === 'string'
        ? 'string'
        : leftType === 'bool' || rightType === 'bool'
          ? 'bool'
          : undefined;
    if (invalid) {
      const symbol = BINARY_OP_SYMBOLS[op];
      return this.report(
        DiagnosticCode.InvalidArithmeticOperand,
        `Cannot ${ARITHMETIC_VERBS[op]} ${invalid} values: left=${leftType}, right=${rightType} (operator '${symbol}')`,
        { operator: symbol, leftType, rightType }
      );
    }

    if (op === 'divide') return 'double';
    return leftType === 'int' && rightType === 'int' ? 'int' : 'double';
  }

  private checkComparison(op: ComparisonOp, leftType: ReturnType, rightType: ReturnType): ReturnType {
    const valid =
      leftType === 'string' || rightType === 'string'
        ? leftType === rightType
        : isNumericType(leftType) && isNumericType(rightType);
    if (!valid) {
      const symbol = BINARY_OP_SYMBOLS[op];
      return this.report(
        DiagnosticCode.IncompatibleComparison,
        `Cannot compare incompatible types: left=${leftType}, right=${rightType} (operator '${symbol}')`,
        { operator: symbol, leftType, rightType }
      );
    }
    return 'bool';
  }
}

// ============ PUBLIC API ============

/**
 * Infer the ReturnType of `expr`. Never throws and never mutates the tree;
 * failures come back as `type: 'error'` with one diagnostic per detected
 * problem.
 */
export function typeCheckExpr(
  expr: ExprNode,
  catalog: Catalog,
  bindings: AliasBindingsInput,
  options: TypeCheckOptions = {}
): TypeCheckResult {
  const { debug } = { ...DEFAULT_TYPECHECK_OPTIONS, ...options };
  const checker = new ExprTypeChecker(catalog, toAliasBindings(bindings), debug);
  const type = checker.check(expr);

  if (debug) {
    console.log(`[SQL:typecheck] ${renderExpr(expr)} : ${type} (${checker.collector.count} diagnostics)`);
  }

  return { type, diagnostics: checker.collector.toArray() };
}
