/**
 * Reader for the CLI's JSON style configuration.
 *
 * ```json
 * {
 *   "styles": ["bold", "red+underline"],
 *   "always": { "ERROR": "bold+red", "OK": "green" }
 * }
 * ```
 */

import * as fs from 'fs';
import { FlagError } from 'tintag-core';
import type { FlagValue } from 'tintag-core';

export interface TintagConfig {
  styles: FlagValue[];
  always: Record<string, FlagValue>;
}

/**
 * Reads and parses a JSON file. Returns null if file missing or malformed.
 */
export async function readJsonStore(filePath: string): Promise<unknown> {
  try {
    const content = await fs.promises.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch {
    return null;
  }
}

function isFlagValue(value: unknown): value is FlagValue {
  return typeof value === 'string' || typeof value === 'number';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate the shape of a parsed config file. */
export function parseConfig(raw: unknown, source: string): TintagConfig {
  if (!isRecord(raw)) {
    throw new FlagError(`Config ${source} must be a JSON object!`);
  }

  const styles: FlagValue[] = [];
  if (raw.styles !== undefined) {
    if (!Array.isArray(raw.styles)) {
      throw new FlagError(`Config ${source}: 'styles' must be an array!`);
    }
    raw.styles.forEach((value: unknown, i) => {
      if (!isFlagValue(value)) {
        throw new FlagError(`Config ${source}: 'styles[${i}]' is neither a flag expression nor a number!`);
      }
      styles.push(value);
    });
  }

  const always: Record<string, FlagValue> = {};
  if (raw.always !== undefined) {
    if (!isRecord(raw.always)) {
      throw new FlagError(`Config ${source}: 'always' must be an object!`);
    }
    for (const [text, value] of Object.entries(raw.always)) {
      if (!isFlagValue(value)) {
        throw new FlagError(`Config ${source}: 'always.${text}' is neither a flag expression nor a number!`);
      }
      always[text] = value;
    }
  }

  return { styles, always };
}

/**
 * Load the config at `filePath`. A missing or unreadable file is no config.
 */
export async function loadConfig(filePath: string): Promise<TintagConfig> {
  const raw = await readJsonStore(filePath);
  if (raw === null) return { styles: [], always: {} };
  return parseConfig(raw, filePath);
}
