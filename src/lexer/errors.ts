import { error, type Diagnostic, type Span } from "../errors/diagnostic.js";

export type LexerErrorKind =
  | "UnmatchedCharacter"
  | "InvalidEscape"
  | "InvalidNumericLiteral"
  | "InvalidUtf8";

const HELP: Record<LexerErrorKind, string | undefined> = {
  UnmatchedCharacter: undefined,
  InvalidEscape: 'Supported escapes are \\" \\\\ \\\' \\n \\t \\r \\b \\f \\v \\a and \\0',
  InvalidNumericLiteral: undefined,
  InvalidUtf8: "Source files must be encoded as UTF-8",
};

/**
 * A fatal tokenization failure. Scanning stops at the first one; the lexer
 * that raised it rethrows it on every later request.
 */
export class LexerError extends Error {
  readonly kind: LexerErrorKind;
  readonly span: Span;
  /** Source text at the failure point. */
  readonly fragment: string;
  /** The unmatched byte, for `UnmatchedCharacter`. */
  readonly byte: number | undefined;

  constructor(kind: LexerErrorKind, message: string, span: Span, fragment: string, byte?: number) {
    super(message);
    this.name = "LexerError";
    this.kind = kind;
    this.span = span;
    this.fragment = fragment;
    this.byte = byte;
  }

  get line(): number {
    return this.span.start.line;
  }

  get column(): number {
    return this.span.start.column;
  }

  toDiagnostic(): Diagnostic {
    return error(this.message, this.span, HELP[this.kind]);
  }
}

export function isLexerError(value: unknown): value is LexerError {
  return value instanceof LexerError;
}
