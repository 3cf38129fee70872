import { describe, it, expect, vi } from 'vitest';
import { parsePhrases } from './phraseParser';
import { ParseError } from '../errors';
import type { Phrase } from '../types/phrase';

function depth(phrases: Phrase[]): number {
  let d = 0;
  let level = phrases;
  while (level.length > 0) {
    d++;
    level = level[0].children;
  }
  return d;
}

describe('parsePhrases', () => {
  it('returns text without markers unchanged and no phrases', () => {
    expect(parsePhrases('plain text')).toEqual({ text: 'plain text', phrases: [] });
  });

  it('parses a single phrase with its indices', () => {
    const { text, phrases } = parsePhrases('<hi> there');
    expect(text).toBe('<hi> there');
    expect(phrases).toEqual([
      { text: 'hi', openIndex: 0, closeIndex: 3, children: [], argumentIndices: [], overrideAlways: false },
    ]);
  });

  it('reads an argument specifier and removes it from the text', () => {
    const { text, phrases } = parsePhrases('x <0,2!>warn> y');
    expect(text).toBe('x <warn> y');
    expect(phrases[0]).toMatchObject({
      text: 'warn',
      openIndex: 2,
      closeIndex: 7,
      argumentIndices: [0, 2],
      overrideAlways: true,
    });
  });

  it('keeps negative-looking arguments for the resolver to reject', () => {
    const { phrases } = parsePhrases('<-1>x>');
    expect(phrases[0].argumentIndices).toEqual([-1]);
  });

  it('does not treat a trailing comma as an argument specifier', () => {
    const onDiagnostic = vi.fn();
    const { text, phrases } = parsePhrases('<0,>x>', onDiagnostic);
    expect(text).toBe('<0,>x>');
    expect(phrases).toEqual([
      { text: '0,', openIndex: 0, closeIndex: 3, children: [], argumentIndices: [], overrideAlways: false },
    ]);
    expect(onDiagnostic).toHaveBeenCalledWith({
      kind: 'unmatched-close',
      message: "Un-escaped '>' character at position 5",
      index: 5,
      position: '5',
    });
  });

  it('does not treat text with digits as an argument specifier', () => {
    const { phrases } = parsePhrases('<1-2>');
    expect(phrases[0]).toMatchObject({ text: '1-2', argumentIndices: [] });
  });

  it('nests phrases with indices relative to the parent text', () => {
    const { text, phrases } = parsePhrases('<0>outer <1>inner>>');
    expect(text).toBe('<outer <inner>>');

    const [outer] = phrases;
    expect(outer).toMatchObject({ text: 'outer <inner>', openIndex: 0, closeIndex: 14, argumentIndices: [0] });
    expect(outer.children).toHaveLength(1);
    expect(outer.children[0]).toMatchObject({ text: 'inner', openIndex: 6, closeIndex: 12, argumentIndices: [1] });
  });

  it('keeps siblings in document order', () => {
    const { phrases } = parsePhrases('<a> and <b>');
    expect(phrases.map(p => p.text)).toEqual(['a', 'b']);
    expect(phrases.map(p => p.openIndex)).toEqual([0, 8]);
  });

  describe('escaping', () => {
    it('treats singly escaped markers as literal text', () => {
      const onDiagnostic = vi.fn();
      const { text, phrases } = parsePhrases('a \\<b\\> c', onDiagnostic);
      expect(text).toBe('a <b> c');
      expect(phrases).toEqual([]);
      expect(onDiagnostic).not.toHaveBeenCalled();
    });

    it('keeps an escaped closing marker inside a phrase', () => {
      const { text, phrases } = parsePhrases('<a\\>b>');
      expect(text).toBe('<a>b>');
      expect(phrases[0]).toMatchObject({ text: 'a>b', openIndex: 0, closeIndex: 4 });
    });

    it('closes on a double-escaped marker, keeping one literal backslash', () => {
      const { text, phrases } = parsePhrases('<a\\\\>');
      expect(text).toBe('<a\\>');
      expect(phrases[0]).toMatchObject({ text: 'a\\', openIndex: 0, closeIndex: 3 });
      expect(text[phrases[0].closeIndex ?? -1]).toBe('>');
    });

    it('escapes a marker right after a closed phrase', () => {
      const onDiagnostic = vi.fn();
      const { text, phrases } = parsePhrases('<x>\\<y>', onDiagnostic);
      expect(text).toBe('<x><y>');
      expect(phrases.map(p => p.text)).toEqual(['x']);
      expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({ index: 5, position: '5' }));
    });

    it('opens on a double-escaped marker, keeping one literal backslash', () => {
      const { text, phrases } = parsePhrases('x\\\\<y>');
      expect(text).toBe('x\\<y>');
      expect(phrases[0]).toMatchObject({ text: 'y', openIndex: 2, closeIndex: 4 });
    });
  });

  describe('unmatched closing markers', () => {
    it('reports a stray > and keeps it as text', () => {
      const onDiagnostic = vi.fn();
      const { text, phrases } = parsePhrases('a > b', onDiagnostic);
      expect(text).toBe('a > b');
      expect(phrases).toEqual([]);
      expect(onDiagnostic).toHaveBeenCalledTimes(1);
      expect(onDiagnostic).toHaveBeenCalledWith({
        kind: 'unmatched-close',
        message: "Un-escaped '>' character at position 2",
        index: 2,
        position: '2',
      });
    });

    it('reports line:column in multi-line markup', () => {
      const onDiagnostic = vi.fn();
      parsePhrases('ab\n>c', onDiagnostic);
      expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({ position: '2:1' }));
    });

    it('does not report an escaped stray >', () => {
      const onDiagnostic = vi.fn();
      expect(parsePhrases('a \\> b', onDiagnostic).text).toBe('a > b');
      expect(onDiagnostic).not.toHaveBeenCalled();
    });

    it('still parses phrases after a stray >', () => {
      const onDiagnostic = vi.fn();
      const { text, phrases } = parsePhrases('> <x>', onDiagnostic);
      expect(text).toBe('> <x>');
      expect(phrases[0]).toMatchObject({ text: 'x', openIndex: 2, closeIndex: 4 });
    });
  });

  describe('unclosed phrases', () => {
    it('throws ParseError naming where the phrase opened', () => {
      expect(() => parsePhrases('<abc')).toThrow(ParseError);
      expect(() => parsePhrases('<abc')).toThrow("No closing tag found for opening tag at position 0, before 'abc'!");
    });

    it('points at the innermost unclosed phrase', () => {
      expect(() => parsePhrases('ok <a <b')).toThrow("No closing tag found for opening tag at position 6, before 'b'!");
    });

    it('fails when only an argument specifier was closed', () => {
      expect(() => parsePhrases('<5>')).toThrow('No closing tag found for opening tag at position 0!');
    });
  });

  it('handles deeply nested markup', () => {
    const n = 10_000;
    const { phrases } = parsePhrases('<'.repeat(n) + 'x' + '>'.repeat(n));
    expect(depth(phrases)).toBe(n);
  });

  it('parses a large flat document in linear time', () => {
    const n = 100_000;
    const markup = '<a> '.repeat(n);
    const started = performance.now();
    const { text, phrases } = parsePhrases(markup);
    const elapsed = performance.now() - started;

    expect(text).toBe(markup);
    expect(phrases).toHaveLength(n);
    expect(phrases[n - 1]).toMatchObject({ openIndex: 4 * (n - 1), closeIndex: 4 * (n - 1) + 2 });
    expect(elapsed).toBeLessThan(2000);
  });

  it('reports line:column for a stray > after many lines', () => {
    const onDiagnostic = vi.fn();
    parsePhrases('<a>\n'.repeat(3) + 'xy>', onDiagnostic);
    expect(onDiagnostic).toHaveBeenCalledWith(expect.objectContaining({ index: 14, position: '4:3' }));
  });
});
