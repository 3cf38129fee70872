#!/usr/bin/env tsx
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { exitWithError } from './fatal';

function readVersion(): string {
  const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('tintag')
  .description('Render tag markup as ANSI-styled terminal text')
  .version(readVersion())
  .option('--config <path>', 'Style config file (default: ~/.config/tintag/config.json)');

// Commands are lazy-loaded to keep startup cheap
const renderCmd = new Command('render')
  .description('Render markup given as arguments, or read from stdin')
  .argument('[markup...]', 'Markup to render, e.g. "<0>Hello> <world>"')
  .option('-s, --style <expr...>', 'Positional styles, e.g. bold red+underline')
  .option('-a, --always <text=expr...>', 'Always-styles, e.g. ERROR=bold+red')
  .option('--strip', 'Print the plain text without any styling')
  .option('--json', 'Output rendered text and diagnostics as JSON')
  .action(async (markup: string[], _opts: Record<string, unknown>, cmd: Command) => {
    const { renderAction } = await import('./commands/render');
    return renderAction(markup, _opts, cmd);
  });
program.addCommand(renderCmd);

const flagsCmd = new Command('flags')
  .description('List available style flags and their codes')
  .option('--json', 'Output as JSON')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { flagsAction } = await import('./commands/flags');
    return flagsAction(_opts, cmd);
  });
program.addCommand(flagsCmd);

program.parseAsync().catch(exitWithError);
