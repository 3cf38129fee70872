/**
 * Public entry point: markup in, ANSI-styled text out.
 */

import { compileStyles, type CompiledStyles, type StyleInput } from './config/styleSpec';
import { defaultFlagTable, type FlagTable } from './flags/flagTable';
import { parsePhrases } from './parsers/phraseParser';
import { renderPhrases, stripPhrases } from './render/renderer';
import { createRenderContext } from './render/styleResolver';
import type { Diagnostic, DiagnosticListener } from './types/diagnostic';

export interface StylerOptions {
  flagTable?: FlagTable;
  /** Receives non-fatal diagnostics. Defaults to `console.warn`. */
  onDiagnostic?: DiagnosticListener;
}

export interface RenderResult {
  output: string;
  diagnostics: Diagnostic[];
  /** Positional styles consumed in order by phrases without arguments. */
  sequentialStylesUsed: number;
}

function warnToConsole(diagnostic: Diagnostic): void {
  console.warn(`tintag: ${diagnostic.message}`);
}

export class Styler {
  private readonly table: FlagTable;
  private readonly styles: CompiledStyles;
  private readonly onDiagnostic: DiagnosticListener;

  /**
   * @param styles Positional styles and always-mappings, validated here.
   * @throws FlagError for an unknown flag or an out-of-range combination
   */
  constructor(styles: readonly StyleInput[] = [], options: StylerOptions = {}) {
    this.table = options.flagTable ?? defaultFlagTable;
    this.styles = compileStyles(styles, this.table);
    this.onDiagnostic = options.onDiagnostic ?? warnToConsole;
  }

  /**
   * Render markup. Throws on any fatal error rather than returning partial
   * output.
   */
  render(markup: string): string {
    return this.run(markup, this.onDiagnostic).output;
  }

  /** Like `render()`, but collects diagnostics instead of forwarding them. */
  renderWithDiagnostics(markup: string): RenderResult {
    const diagnostics: Diagnostic[] = [];
    const result = this.run(markup, d => diagnostics.push(d));
    return { ...result, diagnostics };
  }

  /** Plain text of the markup: escapes resolved, markers and specifiers removed. */
  strip(markup: string): string {
    const { text, phrases } = parsePhrases(markup, this.onDiagnostic);
    return stripPhrases(text, phrases);
  }

  private run(markup: string, onDiagnostic: DiagnosticListener): Omit<RenderResult, 'diagnostics'> {
    const { text, phrases } = parsePhrases(markup, onDiagnostic);
    if (phrases.length === 0) {
      return { output: text, sequentialStylesUsed: 0 };
    }

    const context = createRenderContext(this.styles);
    const output = renderPhrases(text, phrases, context, this.table);
    return { output, sequentialStylesUsed: context.sequentialCounter };
  }
}

/** One-shot render on the default flag table. */
export function beautify(markup: string, ...styles: StyleInput[]): string {
  return new Styler(styles).render(markup);
}

/** One-shot strip on the default flag table. */
export function strip(markup: string): string {
  return new Styler().strip(markup);
}
