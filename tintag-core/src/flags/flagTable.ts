/**
 * Style flags and their SGR render codes.
 *
 * A flag table is an ordered list of categories, each an ordered list of
 * flags. Bits are handed out in declaration order, so the table also fixes
 * the order in which codes are written by `codify()`.
 *
 * Combinations are bigints: the default table has more flags than a 32-bit
 * bitwise operator can hold.
 *
 * @module flags/flagTable
 */

import { FlagError, InternalError } from '../errors';

export type FlagCombination = bigint;

export interface FlagSpec {
  name: string;
  /** SGR parameter written into `ESC[<code>m`. */
  code: number;
}

export interface FlagCategorySpec {
  name: string;
  flags: readonly FlagSpec[];
}

export interface FlagDefinition extends FlagSpec {
  bit: FlagCombination;
}

export interface FlagCategory {
  name: string;
  flags: readonly FlagDefinition[];
}

export interface FlagTable {
  categories: readonly FlagCategory[];
  /** Bit of every flag, by name. */
  bits: ReadonlyMap<string, FlagCombination>;
  /** Exclusive upper bound of a valid combination. */
  limit: FlagCombination;
}

export function createFlagTable(specs: readonly FlagCategorySpec[]): FlagTable {
  const bits = new Map<string, FlagCombination>();
  const codes = new Set<number>();
  let next = 0n;

  const categories = specs.map((category): FlagCategory => ({
    name: category.name,
    flags: category.flags.map((flag): FlagDefinition => {
      if (bits.has(flag.name)) {
        throw new FlagError(`Duplicate flag name '${flag.name}' in flag table!`);
      }
      if (codes.has(flag.code)) {
        throw new FlagError(`Duplicate render code ${flag.code} for flag '${flag.name}'!`);
      }
      const bit = 1n << next++;
      bits.set(flag.name, bit);
      codes.add(flag.code);
      return { name: flag.name, code: flag.code, bit };
    }),
  }));

  return { categories, bits, limit: 1n << next };
}

// ── Default table ──

const FORMAT_FLAGS = [
  { name: 'bold', code: 1 },
  { name: 'dim', code: 2 },
  { name: 'italic', code: 3 },
  { name: 'underline', code: 4 },
  { name: 'blink', code: 5 },
  { name: 'inverse', code: 7 },
  { name: 'hidden', code: 8 },
  { name: 'strikethrough', code: 9 },
] as const;

const COLOR_FLAGS = [
  { name: 'default', code: 39 },
  { name: 'black', code: 30 },
  { name: 'red', code: 31 },
  { name: 'green', code: 32 },
  { name: 'yellow', code: 33 },
  { name: 'blue', code: 34 },
  { name: 'magenta', code: 35 },
  { name: 'cyan', code: 36 },
  { name: 'white', code: 37 },
  { name: 'gray', code: 90 },
  { name: 'redBright', code: 91 },
  { name: 'greenBright', code: 92 },
  { name: 'yellowBright', code: 93 },
  { name: 'blueBright', code: 94 },
  { name: 'magentaBright', code: 95 },
  { name: 'cyanBright', code: 96 },
  { name: 'whiteBright', code: 97 },
] as const;

const FILL_FLAGS = [
  { name: 'bgDefault', code: 49 },
  { name: 'bgBlack', code: 40 },
  { name: 'bgRed', code: 41 },
  { name: 'bgGreen', code: 42 },
  { name: 'bgYellow', code: 43 },
  { name: 'bgBlue', code: 44 },
  { name: 'bgMagenta', code: 45 },
  { name: 'bgCyan', code: 46 },
  { name: 'bgWhite', code: 47 },
  { name: 'bgGray', code: 100 },
  { name: 'bgRedBright', code: 101 },
  { name: 'bgGreenBright', code: 102 },
  { name: 'bgYellowBright', code: 103 },
  { name: 'bgBlueBright', code: 104 },
  { name: 'bgMagentaBright', code: 105 },
  { name: 'bgCyanBright', code: 106 },
  { name: 'bgWhiteBright', code: 107 },
] as const;

export type DefaultFlagName =
  | (typeof FORMAT_FLAGS)[number]['name']
  | (typeof COLOR_FLAGS)[number]['name']
  | (typeof FILL_FLAGS)[number]['name'];

export const defaultFlagTable: FlagTable = createFlagTable([
  { name: 'format', flags: FORMAT_FLAGS },
  { name: 'color', flags: COLOR_FLAGS },
  { name: 'fill', flags: FILL_FLAGS },
]);

const DEFAULT_FLAG_NAMES: readonly DefaultFlagName[] = [
  ...FORMAT_FLAGS,
  ...COLOR_FLAGS,
  ...FILL_FLAGS,
].map(flag => flag.name);

function hasEveryDefaultFlag(
  bits: Partial<Record<DefaultFlagName, FlagCombination>>,
): bits is Record<DefaultFlagName, FlagCombination> {
  return DEFAULT_FLAG_NAMES.every(name => bits[name] !== undefined);
}

function buildFlagConstants(table: FlagTable): Readonly<Record<DefaultFlagName, FlagCombination>> {
  const bits: Partial<Record<DefaultFlagName, FlagCombination>> = {};
  for (const name of DEFAULT_FLAG_NAMES) {
    bits[name] = lookupFlag(table, name);
  }
  if (!hasEveryDefaultFlag(bits)) {
    throw new InternalError('Default flag table is missing flags!');
  }
  return Object.freeze(bits);
}

// ── Lookups ──

/** Bit of a named flag. */
export function lookupFlag(table: FlagTable, name: string): FlagCombination {
  const bit = table.bits.get(name);
  if (bit === undefined) {
    throw new FlagError(`Unknown flag '${name}'!`);
  }
  return bit;
}

/** Parse a `+`-joined flag expression such as `bold+red`. */
export function parseFlagExpression(table: FlagTable, expr: string): FlagCombination {
  const parts = expr.split('+').map(p => p.trim());
  if (parts.some(p => p.length === 0)) {
    throw new FlagError(`Malformed flag expression '${expr}'!`);
  }
  return parts.reduce((acc, name) => acc | lookupFlag(table, name), 0n);
}

/** Range-check a bit combination given as a bigint or an integer number. */
export function validateCombination(table: FlagTable, value: bigint | number): FlagCombination {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new FlagError(`Flag value '${value}' is not an integer!`);
  }
  const combination = BigInt(value);
  if (combination < 0n || combination >= table.limit) {
    throw new FlagError(`Flag value '${value}' is out of range!`);
  }
  return combination;
}

/**
 * Convert a combination into its `;`-joined render codes.
 *
 * Codes come out grouped by category, in the table's declared order.
 */
export function codify(table: FlagTable, combination: FlagCombination): string {
  const codes: number[] = [];
  for (const category of table.categories) {
    for (const flag of category.flags) {
      if (combination & flag.bit) codes.push(flag.code);
    }
  }
  return codes.join(';');
}

/** Bits of the default table, e.g. `Flag.bold | Flag.red`. */
export const Flag = buildFlagConstants(defaultFlagTable);
