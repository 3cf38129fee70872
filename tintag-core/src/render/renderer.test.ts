import { describe, it, expect } from 'vitest';
import { renderPhrases, stripPhrases, walkPhrases, wrapCodes } from './renderer';
import { createRenderContext } from './styleResolver';
import { parsePhrases } from '../parsers/phraseParser';
import { Flag, defaultFlagTable } from '../flags/flagTable';

function render(markup: string, positional: bigint[]): string {
  const { text, phrases } = parsePhrases(markup);
  const ctx = createRenderContext({ positional, always: new Map() });
  return renderPhrases(text, phrases, ctx, defaultFlagTable);
}

describe('wrapCodes', () => {
  it('wraps the body in a start code and a reset to the given codes', () => {
    expect(wrapCodes('1', 'x', '')).toBe('\x1b[1mx\x1b[0;m');
    expect(wrapCodes('31', 'x', '1')).toBe('\x1b[31mx\x1b[0;1m');
  });
});

describe('renderPhrases', () => {
  it('keeps literal text around phrases', () => {
    expect(render('a <b> c', [Flag.bold])).toBe('a \x1b[1mb\x1b[0;m c');
  });

  it('resets a nested phrase to its parent style', () => {
    expect(render('<a <b> c>', [Flag.bold, Flag.red])).toBe('\x1b[1ma \x1b[31mb\x1b[0;1m c\x1b[0;m');
  });

  it('resolves phrases in document order, parents first', () => {
    expect(render('<<x> y> <z>', [Flag.bold, Flag.red, Flag.green])).toBe(
      '\x1b[1m\x1b[31mx\x1b[0;1m y\x1b[0;m \x1b[32mz\x1b[0;m',
    );
  });

  it('emits an empty start code for an empty combination', () => {
    expect(render('<x>', [0n])).toBe('\x1b[mx\x1b[0;m');
  });
});

describe('stripPhrases', () => {
  it('removes markers at every level', () => {
    const { text, phrases } = parsePhrases('<0>a <b> c> d');
    expect(stripPhrases(text, phrases)).toBe('a b c d');
  });
});

describe('walkPhrases', () => {
  it('enters phrases in document order before wrapping them', () => {
    const { text, phrases } = parsePhrases('<a <b>> <c>');
    const entered: string[] = [];
    const out = walkPhrases(text, phrases, {
      enter: p => { entered.push(p.text); },
      wrap: (_p, body) => `[${body}]`,
    });
    expect(entered).toEqual(['a <b>', 'b', 'c']);
    expect(out).toBe('[a [b]] [c]');
  });
});
