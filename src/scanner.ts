import { Lexer } from "./lexer/lexer.js";
import { TokenKind, type Token } from "./lexer/tokens.js";
import { isLexerError } from "./lexer/errors.js";
import type { Diagnostic } from "./errors/diagnostic.js";

export interface ScanOptions {
  /** Keep the trailing EOF token. Defaults to true. */
  includeEof?: boolean;
}

export interface ScanResult {
  /** Tokens read before scanning stopped. */
  tokens: Token[];
  /** At most one entry: lexical errors stop the scan. */
  errors: Diagnostic[];
}

/**
 * Tokenize a source held in memory. Lexical errors are reported as
 * diagnostics rather than thrown.
 */
export function scan(
  source: string | Uint8Array,
  filename: string,
  options: ScanOptions = {},
): ScanResult {
  const includeEof = options.includeEof ?? true;
  const lexer = new Lexer(source, filename);
  const tokens: Token[] = [];

  try {
    for (const token of lexer) {
      if (token.kind === TokenKind.EOF && !includeEof) break;
      tokens.push(token);
    }
  } catch (e) {
    if (!isLexerError(e)) throw e;
    return { tokens, errors: [e.toDiagnostic()] };
  }

  return { tokens, errors: [] };
}
