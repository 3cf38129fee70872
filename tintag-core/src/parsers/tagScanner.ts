/**
 * Marker scanning and escape resolution.
 *
 * Markers are `<` (open) and `>` (close). A backslash escapes a marker; two
 * backslashes are a literal backslash followed by a real marker.
 *
 * @module parsers/tagScanner
 */

export type Marker = '<' | '>';

export const ESCAPE = '\\';

export interface MarkerMatch {
  marker: Marker;
  index: number;
}

export interface EscapeResolution {
  /** The preceding text with at most one escape character removed. */
  text: string;
  /** True when the marker is a literal character, not structure. */
  literal: boolean;
}

const MARKER_RE = /[<>]/g;

function isMarker(s: string): s is Marker {
  return s === '<' || s === '>';
}

/** Next `<` or `>` at or after `from`, or null. */
export function findNextMarker(text: string, from: number): MarkerMatch | null {
  MARKER_RE.lastIndex = from;
  const match = MARKER_RE.exec(text);
  if (!match || !isMarker(match[0])) return null;
  return { marker: match[0], index: match.index };
}

/**
 * Resolve one level of escaping for a marker preceded by `preceding`.
 *
 * `preceding` is the already-resolved text of the current scope, so any
 * index computed against it before this call is stale afterwards when an
 * escape was removed.
 */
export function resolveEscape(preceding: string): EscapeResolution {
  if (!preceding.endsWith(ESCAPE)) {
    return { text: preceding, literal: false };
  }
  const text = preceding.slice(0, -1);
  return { text, literal: !text.endsWith(ESCAPE) };
}
