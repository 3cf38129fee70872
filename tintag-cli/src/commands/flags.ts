/**
 * `tintag flags` — List the flags of the default table, each in its own style.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { defaultFlagTable, wrapCodes } from 'tintag-core';
import type { FlagDefinition, FlagTable } from 'tintag-core';

/** One listing line: the name rendered with its own code, then the code. */
export function formatFlagLine(flag: FlagDefinition, width: number): string {
  const padding = ' '.repeat(Math.max(1, width - flag.name.length + 1));
  return `  ${wrapCodes(String(flag.code), flag.name, '')}${padding}${flag.code}`;
}

/** Flags and codes as plain data, bits as decimal strings. */
export function flagTableToJson(table: FlagTable): Record<string, Array<{ name: string; code: number; bit: string }>> {
  const out: Record<string, Array<{ name: string; code: number; bit: string }>> = {};
  for (const category of table.categories) {
    out[category.name] = category.flags.map(f => ({ name: f.name, code: f.code, bit: f.bit.toString() }));
  }
  return out;
}

function printFlagTable(table: FlagTable): void {
  const width = Math.max(...table.categories.flatMap(c => c.flags.map(f => f.name.length)));

  for (const category of table.categories) {
    process.stdout.write(chalk.bold(`${category.name} (${category.flags.length})\n`));
    process.stdout.write(chalk.dim('─'.repeat(width + 8) + '\n'));
    for (const flag of category.flags) {
      process.stdout.write(formatFlagLine(flag, width) + '\n');
    }
    process.stdout.write('\n');
  }
}

export async function flagsAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const jsonOutput = !!cmd.opts().json;

  if (jsonOutput) {
    process.stdout.write(JSON.stringify(flagTableToJson(defaultFlagTable), null, 2) + '\n');
  } else {
    printFlagTable(defaultFlagTable);
  }
}
