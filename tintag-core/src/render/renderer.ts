/**
 * Writes a phrase forest back out as text.
 *
 * The walk uses an explicit stack, one frame per open phrase, and visits
 * phrases in document order: a phrase is entered before its children and
 * wrapped after them.
 *
 * @module render/renderer
 */

import { InternalError } from '../errors';
import type { FlagTable } from '../flags/flagTable';
import type { Phrase } from '../types/phrase';
import { resolveStyle, type RenderContext } from './styleResolver';

export const ESC = '\x1b';

export interface PhraseVisitor {
  /** Called once per phrase, before any of its children. */
  enter?(phrase: Phrase, parent: Phrase | undefined): void;
  /** Decorate a phrase whose children are already rendered into `body`. */
  wrap(phrase: Phrase, body: string, parent: Phrase | undefined): string;
}

interface Frame {
  owner?: Phrase;
  text: string;
  phrases: readonly Phrase[];
  next: number;
  last: number;
  out: string;
}

function closeIndexOf(phrase: Phrase): number {
  if (phrase.closeIndex === undefined) {
    throw new InternalError(`Phrase '${phrase.text}' reached the renderer unclosed!`);
  }
  return phrase.closeIndex;
}

/**
 * Walk `phrases` (siblings inside `text`), emitting literal text unchanged and
 * each phrase through `visitor.wrap`.
 */
export function walkPhrases(
  text: string,
  phrases: readonly Phrase[],
  visitor: PhraseVisitor,
  parent?: Phrase,
): string {
  const stack: Frame[] = [{ owner: parent, text, phrases, next: 0, last: 0, out: '' }];

  for (;;) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.phrases.length) {
      const phrase = frame.phrases[frame.next++];
      frame.out += frame.text.slice(frame.last, phrase.openIndex);
      frame.last = closeIndexOf(phrase) + 1;
      visitor.enter?.(phrase, frame.owner);
      stack.push({ owner: phrase, text: phrase.text, phrases: phrase.children, next: 0, last: 0, out: '' });
      continue;
    }

    frame.out += frame.text.slice(frame.last);
    stack.pop();

    const outer = stack[stack.length - 1];
    if (!outer) return frame.out;
    if (!frame.owner) {
      throw new InternalError('Nested render frame without a phrase!');
    }
    outer.out += visitor.wrap(frame.owner, frame.out, outer.owner);
  }
}

/** `ESC[<code>m` + body + `ESC[0;<resetTo>m`. */
export function wrapCodes(code: string, body: string, resetTo: string): string {
  return `${ESC}[${code}m${body}${ESC}[0;${resetTo}m`;
}

/**
 * Render phrases with their resolved styles.
 *
 * A phrase's reset falls back to its parent's codes rather than a bare reset,
 * so closing a nested phrase keeps the enclosing style active.
 */
export function renderPhrases(
  text: string,
  phrases: readonly Phrase[],
  context: RenderContext,
  table: FlagTable,
  parent?: Phrase,
): string {
  return walkPhrases(text, phrases, {
    enter: phrase => {
      resolveStyle(phrase, context, table);
    },
    wrap: (phrase, body, enclosing) =>
      wrapCodes(phrase.styleCode ?? '', body, enclosing?.styleCode ?? ''),
  }, parent);
}

/** The text a render would produce, without any codes. */
export function stripPhrases(text: string, phrases: readonly Phrase[]): string {
  return walkPhrases(text, phrases, { wrap: (_phrase, body) => body });
}
