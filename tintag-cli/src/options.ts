/**
 * Turns CLI option values into style inputs for a `Styler`.
 */

import { FlagError } from 'tintag-core';
import type { FlagValue, StyleInput } from 'tintag-core';
import type { TintagConfig } from './config/loadConfig';

/** commander hands variadic options over as `string[] | undefined`. */
export function stringList(value: unknown): string[] {
  if (value === undefined) return [];
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  throw new TypeError(`Expected a list of strings, got ${JSON.stringify(value)}`);
}

/** Split `text=expr` at the last `=`, so the phrase text may contain one. */
export function parseAlwaysOption(option: string): [string, string] {
  const at = option.lastIndexOf('=');
  if (at <= 0 || at === option.length - 1) {
    throw new FlagError(`Always-style '${option}' must look like text=flags!`);
  }
  return [option.slice(0, at), option.slice(at + 1)];
}

/**
 * Merge config and command-line styles. Positional styles from the config
 * come first; `--always` entries override config entries for the same text.
 */
export function buildStyleInputs(
  config: TintagConfig,
  styleOptions: readonly string[],
  alwaysOptions: readonly string[],
): StyleInput[] {
  const always: Record<string, FlagValue> = { ...config.always };
  for (const option of alwaysOptions) {
    const [text, expr] = parseAlwaysOption(option);
    always[text] = expr;
  }
  return [...config.styles, ...styleOptions, always];
}
