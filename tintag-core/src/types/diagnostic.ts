export type DiagnosticKind = 'unmatched-close';

/** Non-fatal finding reported while parsing. */
export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  /** Index in the escape-resolved text at the time it was reported. */
  index: number;
  /** `line:column` or a bare index, see `position()`. */
  position?: string;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;
