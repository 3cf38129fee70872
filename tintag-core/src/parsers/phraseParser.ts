/**
 * Builds the phrase forest from markup.
 *
 * Scanning keeps an explicit stack of open scopes instead of recursing, so
 * nesting depth is not limited by the call stack. The bottom scope is the
 * document itself; every other scope is a phrase waiting for its `>`.
 *
 * Each scope accumulates its escape-resolved text as a list of chunks that is
 * joined once, when the scope closes. When a phrase closes, it is written back
 * into its parent as `<` + text + `>` with its argument specifier dropped,
 * which is what `openIndex`/`closeIndex` point into.
 *
 * @module parsers/phraseParser
 */

import { ParseError } from '../errors';
import { position } from '../diagnostics/position';
import type { Diagnostic, DiagnosticListener } from '../types/diagnostic';
import type { Phrase } from '../types/phrase';
import { ESCAPE, findNextMarker, resolveEscape, type MarkerMatch } from './tagScanner';

/** Comma-separated integers, optionally suffixed with `!`. */
const ARGUMENT_RE = /^-?\d+(?:,-?\d+)*!?$/;

/** How much of an unclosed phrase is quoted in a ParseError. */
const CONTEXT_LENGTH = 20;

export interface ParseResult {
  /** The document with escapes resolved and argument specifiers removed. */
  text: string;
  phrases: Phrase[];
}

interface Scope {
  /** Undefined for the document scope. */
  phrase?: Phrase;
  /** Non-empty pieces of the scope's text, in order. */
  chunks: string[];
  length: number;
  newlines: number;
  /** Offset just past the last newline in the scope's text. */
  lineStart: number;
  children: Phrase[];
}

function createScope(children: Phrase[], phrase?: Phrase): Scope {
  return { phrase, chunks: [], length: 0, newlines: 0, lineStart: 0, children };
}

function append(scope: Scope, s: string): void {
  if (!s) return;
  const lastNewline = s.lastIndexOf('\n');
  if (lastNewline >= 0) {
    scope.newlines += s.split('\n').length - 1;
    scope.lineStart = scope.length + lastNewline + 1;
  }
  scope.chunks.push(s);
  scope.length += s.length;
}

function textOf(scope: Scope): string {
  return scope.chunks.join('');
}

/**
 * Apply one level of escaping to the end of the scope's text.
 *
 * Only the last chunk is inspected, plus the one before it when the escape
 * character was a chunk of its own.
 *
 * @returns true when the marker that follows is literal text
 */
function consumeEscape(scope: Scope): boolean {
  const last = scope.chunks.pop();
  if (last === undefined) return false;

  const { text, literal } = resolveEscape(last);
  if (text.length === last.length) {
    scope.chunks.push(last);
    return false;
  }

  scope.length -= 1;
  if (text) {
    scope.chunks.push(text);
    return literal;
  }
  const previous = scope.chunks[scope.chunks.length - 1];
  return previous === undefined || !previous.endsWith(ESCAPE);
}

function createPhrase(openIndex: number): Phrase {
  return {
    text: '',
    openIndex,
    children: [],
    argumentIndices: [],
    overrideAlways: false,
  };
}

function parseArguments(phrase: Phrase, spec: string): void {
  if (spec.endsWith('!')) {
    phrase.overrideAlways = true;
    spec = spec.slice(0, -1);
  }
  phrase.argumentIndices = spec.split(',').map(Number);
}

/**
 * Parse markup into a forest of phrases.
 *
 * Stray `>` characters at document level are reported through
 * `onDiagnostic` and kept as literal text.
 *
 * @throws ParseError when an opening marker is never closed
 */
export function parsePhrases(markup: string, onDiagnostic?: DiagnosticListener): ParseResult {
  const document = createScope([]);
  const stack: Scope[] = [document];
  const lastNewline = markup.lastIndexOf('\n');
  let cursor = 0;

  const current = (): Scope => stack[stack.length - 1];

  const open = (scope: Scope): void => {
    if (consumeEscape(scope)) {
      append(scope, '<');
      return;
    }
    const phrase = createPhrase(scope.length);
    stack.push(createScope(phrase.children, phrase));
  };

  // Same result as position() over the resolved text followed by the
  // unscanned markup, without joining the document text on every stray `>`.
  const locate = (scope: Scope, match: MarkerMatch): string => {
    const index = scope.length;
    if (scope.newlines === 0 && lastNewline < match.index) return String(index);
    return `${scope.newlines + 1}:${index - scope.lineStart + 1}`;
  };

  const closeDocument = (scope: Scope, match: MarkerMatch): void => {
    if (!consumeEscape(scope) && onDiagnostic) {
      const pos = locate(scope, match);
      const diagnostic: Diagnostic = {
        kind: 'unmatched-close',
        message: `Un-escaped '>' character at position ${pos}`,
        index: scope.length,
        position: pos,
      };
      onDiagnostic(diagnostic);
    }
    append(scope, '>');
  };

  const closePhrase = (scope: Scope, phrase: Phrase): void => {
    // More than one chunk means the text holds a marker, so it cannot be a
    // specifier.
    if (scope.chunks.length === 1 && ARGUMENT_RE.test(scope.chunks[0])) {
      parseArguments(phrase, scope.chunks[0]);
      scope.chunks = [];
      scope.length = 0;
      return;
    }

    if (consumeEscape(scope)) {
      append(scope, '>');
      return;
    }

    stack.pop();
    phrase.text = textOf(scope);
    phrase.closeIndex = phrase.openIndex + 1 + phrase.text.length;

    const parent = current();
    parent.children.push(phrase);
    append(parent, `<${phrase.text}>`);
  };

  for (let match = findNextMarker(markup, 0); match; match = findNextMarker(markup, cursor)) {
    const scope = current();
    append(scope, markup.slice(cursor, match.index));
    cursor = match.index + 1;

    if (match.marker === '<') {
      open(scope);
    } else if (scope.phrase) {
      closePhrase(scope, scope.phrase);
    } else {
      closeDocument(scope, match);
    }
  }

  append(current(), markup.slice(cursor));

  if (stack.length > 1) {
    throw unclosedPhraseError(stack);
  }

  return { text: textOf(document), phrases: document.children };
}

function unclosedPhraseError(stack: readonly Scope[]): ParseError {
  const texts = stack.map(textOf);
  const innermost = texts[texts.length - 1];
  const before = texts.slice(0, -1).join('<');
  const resolved = `${before}<${innermost}`;
  const pos = position(resolved, before.length);

  const context = innermost.slice(0, CONTEXT_LENGTH);
  const after = context ? `, before '${context}'` : '';
  return new ParseError(`No closing tag found for opening tag at position ${pos}${after}!`);
}
