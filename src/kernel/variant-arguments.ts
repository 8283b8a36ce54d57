import { Capability } from './capability.js';
import type { ComparisonMode, FieldMap, LookupTables } from './declaration-nodes.js';

/** Positional argument with the default a constructor parameter would apply (only for `undefined`). */
export function argumentAt(args: readonly unknown[], index: number, fallback?: unknown): unknown {
  const value = args[index];
  return value === undefined ? fallback : value;
}

export function countOf(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Name for an enum index, or the value's string form when the table has no such entry. */
export function tableName(table: readonly string[], value: unknown): string {
  if (typeof value === 'number' && Number.isInteger(value)) {
    const name = table[value];
    if (name !== undefined) {
      return name;
    }
  }
  return String(value);
}

export function comparisonModeOf(option: unknown, tables: LookupTables): ComparisonMode {
  if (option === 'less' || option === 'equal' || option === 'more') {
    return option;
  }
  if (option === tables.comparison.less) {
    return 'less';
  }
  if (option === tables.comparison.equal) {
    return 'equal';
  }
  return 'more';
}

export function listOf(value: unknown): readonly unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (value === undefined || value === null) {
    return [];
  }
  return [value];
}

/** Display text for a reference-like argument: a string, a `{ name }` reference, or a capability's path. */
export function referenceName(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Capability) {
    return value.path;
  }
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return fallback;
}

export function positionalFields(args: readonly unknown[]): FieldMap {
  const fields: Record<string, unknown> = {};
  args.forEach((value, index) => {
    fields[`arg${index}`] = value;
  });
  return fields;
}
