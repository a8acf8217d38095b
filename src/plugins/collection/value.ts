/**
 * Collection Values
 *
 * Qualifier inputs arrive as arbitrary JSON. They are decoded into a tagged
 * variant so every reducer can switch on `kind` instead of probing `typeof`.
 *
 * @module collection/value
 */

import { isRecord } from '../../utils/type-guards.js';

export type CollectionValue =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'list'; items: CollectionValue[] }
  | { kind: 'object'; entries: Array<[string, CollectionValue]> };

export type NumericValue = Extract<CollectionValue, { kind: 'integer' | 'float' }>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// ─── Constructors ────────────────────────────────────────────────────────────

export const integer = (value: number): CollectionValue => ({ kind: 'integer', value });
export const float = (value: number): CollectionValue => ({ kind: 'float', value });
export const text = (value: string): CollectionValue => ({ kind: 'string', value });
export const list = (items: CollectionValue[]): CollectionValue => ({ kind: 'list', items });

/** A JSON number decodes as `integer` when it is whole, `float` otherwise. */
export function numberValue(value: number): CollectionValue {
  return Number.isInteger(value) ? integer(value) : float(value);
}

export function isNumeric(value: CollectionValue): value is NumericValue {
  return value.kind === 'integer' || value.kind === 'float';
}

// ─── JSON Conversion ─────────────────────────────────────────────────────────

export function fromJson(value: unknown): CollectionValue {
  if (value === null || value === undefined) return { kind: 'null' };
  if (typeof value === 'number') return numberValue(value);
  if (typeof value === 'string') return text(value);
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (Array.isArray(value)) return list(value.map(fromJson));
  if (isRecord(value)) {
    return {
      kind: 'object',
      entries: Object.entries(value).map(([key, entry]): [string, CollectionValue] => [key, fromJson(entry)]),
    };
  }
  throw new TypeError(`Unsupported value type: ${typeof value}`);
}

export function toJson(value: CollectionValue): JsonValue {
  switch (value.kind) {
    case 'integer':
    case 'float':
    case 'string':
    case 'boolean':
      return value.value;
    case 'null':
      return null;
    case 'list':
      return value.items.map(toJson);
    case 'object':
      return Object.fromEntries(value.entries.map(([key, entry]): [string, JsonValue] => [key, toJson(entry)]));
  }
}

/** String form used when natural ordering is unavailable. */
export function displayString(value: CollectionValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
    case 'float':
    case 'boolean':
      return String(value.value);
    case 'null':
      return 'null';
    case 'list':
    case 'object':
      return JSON.stringify(toJson(value));
  }
}

// ─── Ordering ────────────────────────────────────────────────────────────────

export class IncomparableValuesError extends Error {
  constructor(left: CollectionValue, right: CollectionValue) {
    super(`Cannot compare ${left.kind} with ${right.kind}`);
    this.name = 'IncomparableValuesError';
  }
}

function sign(difference: number): number {
  return difference < 0 ? -1 : difference > 0 ? 1 : 0;
}

/**
 * Natural ordering: numbers with numbers, strings with strings, booleans with
 * booleans, lists element by element. Throws `IncomparableValuesError` for any
 * other pairing.
 */
export function compareNatural(left: CollectionValue, right: CollectionValue): number {
  if (isNumeric(left) && isNumeric(right)) return sign(left.value - right.value);
  if (left.kind === 'string' && right.kind === 'string') {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (left.kind === 'boolean' && right.kind === 'boolean') return sign(Number(left.value) - Number(right.value));
  if (left.kind === 'list' && right.kind === 'list') {
    const shared = Math.min(left.items.length, right.items.length);
    for (let i = 0; i < shared; i++) {
      const order = compareNatural(left.items[i], right.items[i]);
      if (order !== 0) return order;
    }
    return sign(left.items.length - right.items.length);
  }
  throw new IncomparableValuesError(left, right);
}

export function compareDisplay(left: CollectionValue, right: CollectionValue): number {
  const a = displayString(left);
  const b = displayString(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Run an ordering-dependent computation with natural ordering, restarting it
 * with display-string ordering if any pair turns out to be incomparable.
 */
export function withNaturalOrder<T>(run: (compare: typeof compareNatural) => T): T {
  try {
    return run(compareNatural);
  } catch (error) {
    if (error instanceof IncomparableValuesError) return run(compareDisplay);
    throw error;
  }
}

// ─── Equality ────────────────────────────────────────────────────────────────

/** Structural equality; `1` and `1.0` are equal. */
export function valuesEqual(left: CollectionValue, right: CollectionValue): boolean {
  if (isNumeric(left) && isNumeric(right)) return left.value === right.value;
  switch (left.kind) {
    case 'string':
      return right.kind === 'string' && right.value === left.value;
    case 'boolean':
      return right.kind === 'boolean' && right.value === left.value;
    case 'null':
      return right.kind === 'null';
    case 'list': {
      if (right.kind !== 'list' || right.items.length !== left.items.length) return false;
      const others = right.items;
      return left.items.every((item, i) => valuesEqual(item, others[i]));
    }
    case 'object': {
      if (right.kind !== 'object' || right.entries.length !== left.entries.length) return false;
      const others = new Map(right.entries);
      return left.entries.every(([key, entry]) => {
        const other = others.get(key);
        return other !== undefined && valuesEqual(entry, other);
      });
    }
    default:
      return false;
  }
}
