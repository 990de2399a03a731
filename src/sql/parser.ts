/**
 * SQL Parser
 * ===========
 *
 * Thin wrapper over node-sql-parser. Statements are parsed with the MySQL
 * dialect and handed back as untyped AST records; `from-ast` and the DDL
 * loader narrow them field by field.
 *
 * @module
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

import { SQLParseError } from './errors';

// ============ AST ACCESS ============

export type AstNode = Record<string, unknown>;

export function isAstNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function nodeType(node: AstNode): string {
  return typeof node.type === 'string' ? node.type : 'unknown';
}

/** node-sql-parser emits either `column: 'x'` or `column: { expr: { value: 'x' } }` */
export function identifierText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isAstNode(value) && isAstNode(value.expr) && typeof value.expr.value === 'string') {
    return value.expr.value;
  }
  return undefined;
}

// ============ NUMERIC LITERALS ============

const NUMERIC_LITERAL = /\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?/y;
const IDENTIFIER = /[A-Za-z_$][\w$]*/y;

function skipQuoted(sql: string, start: number): number {
  const quote = sql[start];
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === '\\') {
      i += 2;
    } else if (sql[i] === quote) {
      if (sql[i + 1] !== quote) return i + 1;
      i += 2;
    } else {
      i++;
    }
  }
  return i;
}

/**
 * Source text of every numeric literal in `sql`, in order. Quoted strings,
 * quoted identifiers, comments and identifiers containing digits are skipped.
 */
export function scanNumericLiterals(sql: string): string[] {
  const literals: string[] = [];
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === "'" || ch === '"' || ch === '`') {
      i = skipQuoted(sql, i);
    } else if (sql.startsWith('--', i) || ch === '#') {
      const eol = sql.indexOf('\n', i);
      i = eol < 0 ? sql.length : eol + 1;
    } else if (sql.startsWith('/*', i)) {
      const end = sql.indexOf('*/', i + 2);
      i = end < 0 ? sql.length : end + 2;
    } else {
      IDENTIFIER.lastIndex = i;
      NUMERIC_LITERAL.lastIndex = i;
      const identifier = IDENTIFIER.exec(sql);
      const numeric = identifier ? null : NUMERIC_LITERAL.exec(sql);
      if (identifier) {
        i += identifier[0].length;
      } else if (numeric) {
        literals.push(numeric[0]);
        i += numeric[0].length;
      } else {
        i++;
      }
    }
  }
  return literals;
}

/**
 * Recovers the source spelling of numeric literals, which node-sql-parser
 * reduces to plain numbers (`1.0` arrives as `1`). Lookups must come in
 * source order; literals the caller never asks for are skipped.
 */
export class NumericLiteralCursor {
  private readonly literals: string[];
  private next = 0;

  constructor(sql: string) {
    this.literals = scanNumericLiterals(sql);
  }

  /** Source text of the next literal denoting `value`, if any */
  take(value: number): string | undefined {
    for (let i = this.next; i < this.literals.length; i++) {
      if (Number(this.literals[i]) === value) {
        this.next = i + 1;
        return this.literals[i];
      }
    }
    return undefined;
  }
}

// ============ PARSER ============

/**
 * SQLParser: parses SQL text with node-sql-parser
 */
export class SQLParser {
  private parser: typeof Parser.prototype;

  constructor() {
    this.parser = new Parser();
  }

  /**
   * Parse `;`-separated statements, one AST record per statement
   */
  parseStatements(sql: string): AstNode[] {
    return sql
      .split(';')
      .map(s => s.trim())
      .filter(s => s.length > 0)
      .map(s => this.parseStatement(s));
  }

  parseStatement(sql: string): AstNode {
    let parsed: unknown;
    try {
      // MySQL dialect for broader compatibility
      parsed = this.parser.astify(sql, { database: 'MySQL' });
    } catch (e) {
      throw new SQLParseError(sql, e);
    }

    const stmt: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
    if (!isAstNode(stmt)) {
      throw new SQLParseError(sql);
    }
    return stmt;
  }
}
