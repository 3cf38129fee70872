/**
 * Style inputs accepted by `Styler` and their flattening into the two tables
 * the renderer works with: the positional list and the always-mapping.
 *
 * @module config/styleSpec
 */

import { FlagError } from '../errors';
import {
  parseFlagExpression,
  validateCombination,
  type FlagCombination,
  type FlagTable,
} from '../flags/flagTable';

/** A flag name or `+` expression (`"bold+red"`), or a bit combination. */
export type FlagValue = string | bigint | number;

/**
 * Phrase text → style. A `Map` may also key a group of equivalent texts that
 * share one style: `new Map([[['WARN', 'WARNING'], 'yellow']])`.
 */
export type AlwaysStyleMap =
  | { readonly [text: string]: FlagValue }
  | ReadonlyMap<string | readonly string[], FlagValue>;

export type StyleInput = FlagValue | AlwaysStyleMap | readonly StyleInput[];

export interface CompiledStyles {
  positional: FlagCombination[];
  always: Map<string, FlagCombination>;
}

export function toCombination(table: FlagTable, value: FlagValue): FlagCombination {
  if (typeof value === 'string') return parseFlagExpression(table, value);
  return validateCombination(table, value);
}

function isFlagValue(input: StyleInput): input is FlagValue {
  return typeof input === 'string' || typeof input === 'bigint' || typeof input === 'number';
}

function isStyleList(input: StyleInput): input is readonly StyleInput[] {
  return Array.isArray(input);
}

function addAlways(
  table: FlagTable,
  always: Map<string, FlagCombination>,
  key: unknown,
  value: FlagValue,
): void {
  if (typeof key === 'string') {
    always.set(key, toCombination(table, value));
    return;
  }
  if (Array.isArray(key) && key.every((k): k is string => typeof k === 'string')) {
    const combination = toCombination(table, value);
    for (const text of key) always.set(text, combination);
    return;
  }
  throw new TypeError(
    `Key '${String(key)}' in always-style mapping is neither a string nor an array of strings!`,
  );
}

/**
 * Validate and flatten style inputs, in order.
 *
 * Nested arrays are flattened depth-first into the positional list; later
 * always entries for the same text overwrite earlier ones.
 */
export function compileStyles(inputs: readonly StyleInput[], table: FlagTable): CompiledStyles {
  const compiled: CompiledStyles = { positional: [], always: new Map() };

  const visit = (input: StyleInput): void => {
    if (isFlagValue(input)) {
      compiled.positional.push(toCombination(table, input));
    } else if (isStyleList(input)) {
      input.forEach(visit);
    } else if (input instanceof Map) {
      for (const [key, value] of input) addAlways(table, compiled.always, key, value);
    } else if (typeof input === 'object' && input !== null) {
      for (const [key, value] of Object.entries(input)) addAlways(table, compiled.always, key, value);
    } else {
      throw new FlagError(`Style '${String(input)}' is neither a flag, a combination, a mapping nor a list!`);
    }
  };

  inputs.forEach(visit);
  return compiled;
}
