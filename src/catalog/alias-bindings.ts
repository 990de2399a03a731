/**
 * FROM-clause alias bindings.
 *
 * An ordered list of (tableName, alias) pairs. Lookup is by alias and the
 * first occurrence wins when an alias is bound more than once.
 *
 * @module
 */

export interface AliasBinding {
  tableName: string;
  alias: string;
}

export class AliasBindings {
  private readonly ordered: readonly AliasBinding[];
  private readonly firstByAlias = new Map<string, string>();

  constructor(bindings: Iterable<AliasBinding>) {
    this.ordered = Object.freeze([...bindings].map(b => Object.freeze({ tableName: b.tableName, alias: b.alias })));
    for (const { tableName, alias } of this.ordered) {
      if (!this.firstByAlias.has(alias)) {
        this.firstByAlias.set(alias, tableName);
      }
    }
  }

  /** Build from `[tableName, alias]` tuples */
  static fromPairs(pairs: ReadonlyArray<readonly [string, string]>): AliasBindings {
    return new AliasBindings(pairs.map(([tableName, alias]) => ({ tableName, alias })));
  }

  /** Table name bound to `alias`, or undefined when the alias is not in the query */
  resolve(alias: string): string | undefined {
    return this.firstByAlias.get(alias);
  }

  entries(): readonly AliasBinding[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}

/** Accepts either a prepared AliasBindings or a raw binding list */
export type AliasBindingsInput = AliasBindings | readonly AliasBinding[];

export function toAliasBindings(input: AliasBindingsInput): AliasBindings {
  return input instanceof AliasBindings ? input : new AliasBindings(input);
}
