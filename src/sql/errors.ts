/**
 * Errors raised while building expression trees.
 *
 * Type checking never throws; these cover malformed construction only.
 *
 * @module
 */

export class ExpressionDepthError extends Error {
  readonly depth: number;
  readonly limit: number;

  constructor(depth: number, limit: number) {
    super(`Expression nesting depth ${depth} exceeds the limit of ${limit}`);
    this.name = 'ExpressionDepthError';
    this.depth = depth;
    this.limit = limit;
  }
}

export class UnsupportedExpressionError extends Error {
  /** The parser AST node type that could not be converted */
  readonly nodeType: string;

  constructor(nodeType: string, detail?: string) {
    super(detail ? `Unsupported expression '${nodeType}': ${detail}` : `Unsupported expression '${nodeType}'`);
    this.name = 'UnsupportedExpressionError';
    this.nodeType = nodeType;
  }
}

export class SQLParseError extends Error {
  readonly sql: string;

  constructor(sql: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to parse SQL${reason}`, { cause });
    this.name = 'SQLParseError';
    this.sql = sql;
  }
}
