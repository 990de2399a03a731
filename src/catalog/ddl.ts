/**
 * Catalog from DDL
 * =================
 *
 * Builds an InMemoryCatalog from CREATE TABLE statements parsed with
 * node-sql-parser.
 *
 * ```ts
 * const catalog = catalogFromDDL(`
 *   CREATE TABLE Orders (id INT, amount DOUBLE, note VARCHAR(40), paid BOOLEAN);
 * `);
 * ```
 *
 * @module
 */

import {
  BOOL_TYPE,
  CatalogBuilder,
  CatalogDefinitionError,
  DOUBLE_TYPE,
  INT_TYPE,
  OpaqueAttributeType,
  STRING_TYPE,
  type AttributeType,
  type ColumnSpec,
  type InMemoryCatalog,
} from './catalog';
import { SQLParser, identifierText, isAstNode, type AstNode } from '../sql/parser';

// ============ TYPE MAPPING ============

const INT_PREFIXES = ['INT', 'INTEGER', 'BIGINT', 'SMALLINT', 'TINYINT', 'MEDIUMINT'];
const DOUBLE_PREFIXES = ['DOUBLE', 'FLOAT', 'REAL', 'DECIMAL', 'NUMERIC'];
const STRING_PREFIXES = ['VARCHAR', 'CHAR', 'TEXT', 'STRING'];
const BOOL_PREFIXES = ['BOOL', 'BOOLEAN'];

/**
 * Map a SQL column type to an attribute type. Lengths and precision
 * (`VARCHAR(40)`, `DECIMAL(10,2)`) are ignored.
 */
export function attributeTypeFromSQL(dataType: string): AttributeType {
  const base = dataType.toUpperCase().replace(/\(.*$/, '').trim();
  if (BOOL_PREFIXES.includes(base)) return BOOL_TYPE;
  if (INT_PREFIXES.includes(base)) return INT_TYPE;
  if (DOUBLE_PREFIXES.includes(base)) return DOUBLE_TYPE;
  if (STRING_PREFIXES.includes(base)) return STRING_TYPE;
  return new OpaqueAttributeType(base);
}

// ============ PARSING ============

function tableNameOf(stmt: AstNode): string | undefined {
  const table = Array.isArray(stmt.table) ? stmt.table[0] : stmt.table;
  return isAstNode(table) ? identifierText(table.table) : undefined;
}

function columnsOf(stmt: AstNode, tableName: string): ColumnSpec[] {
  const columns: ColumnSpec[] = [];
  const defs = Array.isArray(stmt.create_definitions) ? stmt.create_definitions : [];
  for (const def of defs) {
    if (!isAstNode(def) || def.resource !== 'column') continue;
    const name = isAstNode(def.column) ? identifierText(def.column.column) : undefined;
    const dataType = isAstNode(def.definition) ? identifierText(def.definition.dataType) : undefined;
    if (name === undefined || dataType === undefined) {
      throw new CatalogDefinitionError(`Unreadable column definition in table '${tableName}'`);
    }
    columns.push({ name, type: attributeTypeFromSQL(dataType) });
  }
  return columns;
}

/**
 * Build a catalog from one or more `;`-separated CREATE TABLE statements.
 * Other statement kinds are rejected.
 */
export function catalogFromDDL(sql: string): InMemoryCatalog {
  const builder = new CatalogBuilder();

  for (const stmt of new SQLParser().parseStatements(sql)) {
    if (stmt.type !== 'create' || stmt.keyword !== 'table') {
      throw new CatalogDefinitionError(`Expected CREATE TABLE, got a '${String(stmt.type)}' statement`);
    }
    const tableName = tableNameOf(stmt);
    if (tableName === undefined) {
      throw new CatalogDefinitionError('CREATE TABLE without a table name');
    }
    builder.defineTable(tableName, columnsOf(stmt, tableName));
  }

  return builder.build();
}
