/**
 * Public API for tintag-core.
 */

// Facade
export { Styler, beautify, strip } from './styler';
export type { StylerOptions, RenderResult } from './styler';

// Errors
export {
  TintagError,
  FlagError,
  ParseError,
  ArgumentError,
  InternalError,
} from './errors';

// Flags
export {
  Flag,
  defaultFlagTable,
  createFlagTable,
  lookupFlag,
  parseFlagExpression,
  validateCombination,
  codify,
} from './flags/flagTable';
export type {
  FlagCombination,
  FlagSpec,
  FlagCategorySpec,
  FlagDefinition,
  FlagCategory,
  FlagTable,
  DefaultFlagName,
} from './flags/flagTable';

// Style configuration
export { compileStyles, toCombination } from './config/styleSpec';
export type { FlagValue, AlwaysStyleMap, StyleInput, CompiledStyles } from './config/styleSpec';

// Parsing
export { findNextMarker, resolveEscape, ESCAPE } from './parsers/tagScanner';
export type { Marker, MarkerMatch, EscapeResolution } from './parsers/tagScanner';
export { parsePhrases } from './parsers/phraseParser';
export type { ParseResult } from './parsers/phraseParser';

// Rendering
export { renderPhrases, stripPhrases, walkPhrases, wrapCodes, ESC } from './render/renderer';
export type { PhraseVisitor } from './render/renderer';
export { createRenderContext, resolveCombination, resolveStyle } from './render/styleResolver';
export type { RenderContext } from './render/styleResolver';

// Diagnostics
export { position, ordinal } from './diagnostics/position';
export type { Diagnostic, DiagnosticKind, DiagnosticListener } from './types/diagnostic';
export type { Phrase } from './types/phrase';
