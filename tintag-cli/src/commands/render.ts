/**
 * `tintag render` — Render markup to ANSI-styled text.
 */

import type { Command, OptionValues } from 'commander';
import chalk from 'chalk';
import { Styler } from 'tintag-core';
import type { Diagnostic } from 'tintag-core';
import { getDefaultConfigPath } from '../config/paths';
import { loadConfig } from '../config/loadConfig';
import { buildStyleInputs, stringList } from '../options';
import { exitWithError } from '../fatal';

export async function readStdin(input: AsyncIterable<unknown> = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  // A trailing newline belongs to the pipe, not to the markup.
  return Buffer.concat(chunks).toString('utf-8').replace(/\r?\n$/, '');
}

function printDiagnostic(diagnostic: Diagnostic): void {
  process.stderr.write(chalk.yellow(`Warning: ${diagnostic.message}\n`));
}

export async function renderAction(
  markupWords: string[],
  _opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  const globalOpts: OptionValues = cmd.parent?.opts() ?? {};
  const opts = cmd.opts();
  const jsonOutput = !!opts.json;

  try {
    const configPath = typeof globalOpts.config === 'string' ? globalOpts.config : getDefaultConfigPath();
    const config = await loadConfig(configPath);
    const styles = buildStyleInputs(config, stringList(opts.style), stringList(opts.always));
    const markup = markupWords.length > 0 ? markupWords.join(' ') : await readStdin();

    if (opts.strip) {
      const styler = new Styler(styles, { onDiagnostic: printDiagnostic });
      process.stdout.write(styler.strip(markup) + '\n');
      return;
    }

    if (jsonOutput) {
      const result = new Styler(styles).renderWithDiagnostics(markup);
      process.stdout.write(JSON.stringify(result, null, 2) + '\n');
      return;
    }

    const styler = new Styler(styles, { onDiagnostic: printDiagnostic });
    process.stdout.write(styler.render(markup) + '\n');
  } catch (err) {
    exitWithError(err);
  }
}
