/**
 * Resolves a phrase's flag combination and render codes.
 *
 * @module render/styleResolver
 */

import { ArgumentError, InternalError } from '../errors';
import { ordinal } from '../diagnostics/position';
import { codify, type FlagCombination, type FlagTable } from '../flags/flagTable';
import type { CompiledStyles } from '../config/styleSpec';
import type { Phrase } from '../types/phrase';

/**
 * Per-render state. A fresh context is created for every render call so the
 * sequential counter never leaks between calls.
 */
export interface RenderContext {
  readonly positionalStyles: readonly FlagCombination[];
  readonly alwaysStyles: ReadonlyMap<string, FlagCombination>;
  /** Next positional slot handed to a phrase without arguments. */
  sequentialCounter: number;
}

export function createRenderContext(styles: CompiledStyles): RenderContext {
  return {
    positionalStyles: styles.positional,
    alwaysStyles: styles.always,
    sequentialCounter: 0,
  };
}

function combineArguments(phrase: Phrase, context: RenderContext): FlagCombination {
  const { positionalStyles, alwaysStyles } = context;
  let combination = 0n;

  phrase.argumentIndices.forEach((i, n) => {
    const style = i >= 0 ? positionalStyles[i] : undefined;
    if (style === undefined) {
      throw new ArgumentError(
        `Positional argument '${i}' (index ${n}) is out of range, ` +
          `only ${positionalStyles.length} positional styles were supplied!`,
      );
    }
    combination |= style;
  });

  const always = alwaysStyles.get(phrase.text);
  if (always !== undefined && !phrase.overrideAlways) {
    combination |= always;
  }
  return combination;
}

function nextSequential(phrase: Phrase, context: RenderContext): FlagCombination {
  const style = context.positionalStyles[context.sequentialCounter];
  if (style === undefined) {
    const requested = ordinal(context.sequentialCounter + 1);
    const available = context.positionalStyles.length;
    throw new ArgumentError(
      `Requested ${requested} formatting argument for '${phrase.text}' ` +
        `but only ${available} were supplied!`,
    );
  }
  context.sequentialCounter++;
  return style;
}

/** The combination a phrase renders with. Consumes a sequential slot if needed. */
export function resolveCombination(phrase: Phrase, context: RenderContext): FlagCombination {
  if (phrase.argumentIndices.length > 0) {
    return combineArguments(phrase, context);
  }
  return context.alwaysStyles.get(phrase.text) ?? nextSequential(phrase, context);
}

/**
 * Set `phrase.styleCode`. Must run on a parent before its children so the
 * sequential counter follows document order.
 */
export function resolveStyle(phrase: Phrase, context: RenderContext, table: FlagTable): string {
  if (phrase.styleCode !== undefined) {
    throw new InternalError(`Phrase '${phrase.text}' was styled twice!`);
  }
  phrase.styleCode = codify(table, resolveCombination(phrase, context));
  return phrase.styleCode;
}
