/**
 * Table Catalog
 * ==============
 *
 * Read-only registry of table schemas consulted while type checking
 * attribute references. The type checker only depends on the `Catalog`,
 * `TableSchema` and `AttributeType` interfaces; `InMemoryCatalog` is the
 * implementation used by the DDL loader and the tests.
 *
 * ```ts
 * const catalog = new CatalogBuilder()
 *   .defineTable('Orders', [
 *     { name: 'id', type: INT_TYPE },
 *     { name: 'amount', type: DOUBLE_TYPE },
 *   ])
 *   .build();
 * ```
 *
 * @module
 */

// ============ ATTRIBUTE TYPES ============

export interface AttributeType {
  isBoolean(): boolean;
  /** `int`, `double` or `string` for recognised types; anything else is unrecognised */
  canonicalName(): string;
}

class ScalarAttributeType implements AttributeType {
  constructor(private readonly name: string, private readonly boolean = false) {}

  isBoolean(): boolean {
    return this.boolean;
  }

  canonicalName(): string {
    return this.name;
  }

  toString(): string {
    return this.name;
  }
}

export const INT_TYPE: AttributeType = new ScalarAttributeType('int');
export const DOUBLE_TYPE: AttributeType = new ScalarAttributeType('double');
export const STRING_TYPE: AttributeType = new ScalarAttributeType('string');
export const BOOL_TYPE: AttributeType = new ScalarAttributeType('bool', true);

/** A column type this layer has no ReturnType for (DATE, BLOB, ...) */
export class OpaqueAttributeType extends ScalarAttributeType {
  constructor(name: string) {
    super(name.toLowerCase());
  }
}

// ============ SCHEMAS ============

export interface AttributeInfo {
  /** Zero-based ordinal position within the table */
  position: number;
  type: AttributeType;
}

export interface TableSchema {
  lookupAttribute(name: string): AttributeInfo | undefined;
}

export interface Catalog {
  lookupTable(name: string): TableSchema | undefined;
}

export interface ColumnSpec {
  name: string;
  type: AttributeType;
}

export class CatalogDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogDefinitionError';
  }
}

export class Schema implements TableSchema {
  private readonly byName: ReadonlyMap<string, AttributeInfo>;
  private readonly ordered: readonly ColumnSpec[];

  constructor(readonly tableName: string, columns: readonly ColumnSpec[]) {
    const byName = new Map<string, AttributeInfo>();
    columns.forEach((col, position) => {
      if (byName.has(col.name)) {
        throw new CatalogDefinitionError(`Duplicate attribute '${col.name}' in table '${tableName}'`);
      }
      byName.set(col.name, { position, type: col.type });
    });
    this.byName = byName;
    this.ordered = Object.freeze([...columns]);
  }

  lookupAttribute(name: string): AttributeInfo | undefined {
    return this.byName.get(name);
  }

  attributes(): readonly ColumnSpec[] {
    return this.ordered;
  }
}

// ============ CATALOG ============

export class InMemoryCatalog implements Catalog {
  constructor(private readonly tables: ReadonlyMap<string, Schema>) {}

  lookupTable(name: string): Schema | undefined {
    return this.tables.get(name);
  }

  tableNames(): string[] {
    return [...this.tables.keys()];
  }
}

/**
 * Collects table definitions and produces an immutable catalog.
 */
export class CatalogBuilder {
  private tables = new Map<string, Schema>();

  defineTable(name: string, columns: readonly ColumnSpec[]): this {
    if (this.tables.has(name)) {
      throw new CatalogDefinitionError(`Table '${name}' is already defined`);
    }
    this.tables.set(name, new Schema(name, columns));
    return this;
  }

  build(): InMemoryCatalog {
    return new InMemoryCatalog(new Map(this.tables));
  }
}
