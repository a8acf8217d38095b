/**
 * Collection Qualifiers
 *
 * Named reducers over a decoded value. Each one answers with exactly one of a
 * computed value or a human-readable error.
 *
 * @module collection/qualifiers
 */

import type { QualifierDescriptor } from '../protocol.js';
import {
  float,
  integer,
  isNumeric,
  list,
  text,
  valuesEqual,
  withNaturalOrder,
  type CollectionValue,
  type NumericValue,
} from './value.js';

export type QualifierOutcome =
  | { ok: true; value: CollectionValue }
  | { ok: false; error: string };

/** Uniform random number in [0, 1). */
export type RandomSource = () => number;

export interface QualifierContext {
  /** Declared element type from the request; informational only. */
  type: string;
  random: RandomSource;
}

export type Qualifier = (value: CollectionValue, context: QualifierContext) => QualifierOutcome;

export interface QualifierDefinition extends QualifierDescriptor {
  apply: Qualifier;
}

const success = (value: CollectionValue): QualifierOutcome => ({ ok: true, value });
const failure = (error: string): QualifierOutcome => ({ ok: false, error });

/** Guard for qualifiers that only accept a list. */
function overList(name: string, body: (items: CollectionValue[], context: QualifierContext) => QualifierOutcome): Qualifier {
  return (value, context) => (value.kind === 'list' ? body(value.items, context) : failure(`${name} requires a list`));
}

function numericItems(items: CollectionValue[]): NumericValue[] {
  return items.filter(isNumeric);
}

function total(values: NumericValue[]): number {
  return values.reduce((acc, item) => acc + item.value, 0);
}

function extreme(items: CollectionValue[], wins: (order: number) => boolean): CollectionValue {
  return withNaturalOrder((compare) =>
    items.reduce((best, item) => (wins(compare(item, best)) ? item : best)),
  );
}

function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

// ─── Reducers ────────────────────────────────────────────────────────────────

export const sort = overList('sort', (items) =>
  success(list(withNaturalOrder((compare) => [...items].sort(compare)))),
);

export const unique = overList('unique', (items) => {
  const kept: CollectionValue[] = [];
  for (const item of items) {
    if (!kept.some((seen) => valuesEqual(seen, item))) kept.push(item);
  }
  return success(list(kept));
});

export const sum = overList('sum', (items) => {
  const numbers = numericItems(items);
  if (numbers.length === 0) return failure('sum requires numeric list elements');
  const result = total(numbers);
  return success(numbers.every((item) => item.kind === 'integer') ? integer(result) : float(result));
});

export const avg = overList('avg', (items) => {
  const numbers = numericItems(items);
  if (numbers.length === 0) return failure('avg requires numeric list elements');
  return success(float(total(numbers) / numbers.length));
});

export const min = overList('min', (items) =>
  items.length === 0 ? failure('min requires a non-empty list') : success(extreme(items, (order) => order < 0)),
);

export const max = overList('max', (items) =>
  items.length === 0 ? failure('max requires a non-empty list') : success(extreme(items, (order) => order > 0)),
);

export const first = overList('first', (items) =>
  items.length === 0 ? failure('first requires a non-empty list') : success(items[0]),
);

export const last = overList('last', (items) =>
  items.length === 0 ? failure('last requires a non-empty list') : success(items[items.length - 1]),
);

export const reverse: Qualifier = (value) => {
  if (value.kind === 'list') return success(list([...value.items].reverse()));
  if (value.kind === 'string') return success(text(Array.from(value.value).reverse().join('')));
  return failure('reverse requires a list or string');
};

export const shuffle: Qualifier = (value, { random }) => {
  if (value.kind === 'list') return success(list(shuffleInPlace([...value.items], random)));
  if (value.kind === 'string') return success(text(shuffleInPlace(Array.from(value.value), random).join('')));
  return failure('shuffle requires a list or string');
};

export const pickRandom: Qualifier = (value, { random }) => {
  if (value.kind !== 'list' || value.items.length === 0) return failure('pick-random requires a non-empty list');
  return success(value.items[Math.floor(random() * value.items.length)]);
};

export const size: Qualifier = (value) => {
  if (value.kind === 'list') return success(integer(value.items.length));
  if (value.kind === 'string') return success(integer(Array.from(value.value).length));
  return failure('size requires List or String');
};

// ─── Registry ────────────────────────────────────────────────────────────────

export const QUALIFIERS: readonly QualifierDefinition[] = [
  { name: 'sort', inputTypes: ['List'], description: 'Sorts a list in ascending order', apply: sort },
  { name: 'unique', inputTypes: ['List'], description: 'Returns unique elements from a list', apply: unique },
  { name: 'sum', inputTypes: ['List'], description: 'Returns the sum of numeric list elements', apply: sum },
  { name: 'avg', inputTypes: ['List'], description: 'Returns the average of numeric list elements', apply: avg },
  { name: 'min', inputTypes: ['List'], description: 'Returns the minimum element', apply: min },
  { name: 'max', inputTypes: ['List'], description: 'Returns the maximum element', apply: max },
  { name: 'first', inputTypes: ['List'], description: 'Returns the first element of a list', apply: first },
  { name: 'last', inputTypes: ['List'], description: 'Returns the last element of a list', apply: last },
  { name: 'reverse', inputTypes: ['List', 'String'], description: 'Reverses elements in a list or characters in a string', apply: reverse },
  { name: 'shuffle', inputTypes: ['List', 'String'], description: 'Shuffles elements in a list or characters in a string', apply: shuffle },
  { name: 'pick-random', inputTypes: ['List'], description: 'Picks a random element from a list', apply: pickRandom },
  { name: 'size', inputTypes: ['List', 'String'], description: 'Returns the number of elements in a list or characters in a string', apply: size },
];

const BY_NAME = new Map(QUALIFIERS.map((definition) => [definition.name, definition]));

export function findQualifier(name: string): QualifierDefinition | undefined {
  return BY_NAME.get(name);
}

export function applyQualifier(name: string, value: CollectionValue, context: QualifierContext): QualifierOutcome {
  const definition = findQualifier(name);
  if (!definition) return failure(`Unknown qualifier: ${name}`);
  return definition.apply(value, context);
}
