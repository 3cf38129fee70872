/**
 * Error taxonomy for tintag.
 *
 * Every fatal condition raised by the core is a `TintagError`. Callers that
 * only care about "bad markup or bad styles" can catch the base class.
 */

export class TintagError extends Error {
  /** Short description of what went wrong, without any prefix. */
  readonly what: string;

  constructor(what: string) {
    super(what);
    this.name = new.target.name;
    this.what = what;
  }
}

/** A flag, flag expression or bit combination is unknown or out of range. */
export class FlagError extends TintagError {}

/** The markup is ill-formed, e.g. an opening marker is never closed. */
export class ParseError extends TintagError {}

/**
 * A phrase asked for a positional style that was not supplied, either by
 * index in its argument specifier or by running out of sequential styles.
 */
export class ArgumentError extends TintagError {}

/** A condition the core guarantees itself was violated. Always a bug. */
export class InternalError extends TintagError {}
