/**
 * A tagged region of markup.
 *
 * Indices are relative to the enclosing scope: the parent's `text`, or the
 * escape-resolved document for top-level phrases.
 */
export interface Phrase {
  /** Escape-resolved text between the markers. Children appear as `<text>`. */
  text: string;
  openIndex: number;
  /** Index of the closing `>`; undefined while the phrase is still open. */
  closeIndex?: number;
  /** Resolved render codes, e.g. `1;31`. Set once per render. */
  styleCode?: string;
  children: Phrase[];
  /** Positional style slots named by the argument specifier (`<0,2>...>`). */
  argumentIndices: number[];
  /** The specifier ended in `!`: arguments win over the always-mapping. */
  overrideAlways: boolean;
}
