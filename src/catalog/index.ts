/**
 * Catalog Module
 * ===============
 *
 * Table schemas and FROM-clause alias bindings consumed by the type checker.
 *
 * @module
 */

export * from './catalog';
export * from './alias-bindings';
export { catalogFromDDL, attributeTypeFromSQL } from './ddl';
