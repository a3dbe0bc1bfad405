import type { LexerErrorKind } from "./errors.js";

export interface DecodeFailure {
  kind: LexerErrorKind;
  message: string;
  /** Byte index into the decoded lexeme where the failure starts. */
  index: number;
  fragment: string;
}

export type Decoded<T> = { ok: true; value: T } | { ok: false; failure: DecodeFailure };

const DIGITS = /^[0-9]+$/;
const DOUBLE = /^[0-9]+(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/;

export const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ["\\", "\\"],
  ["'", "'"],
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["b", "\b"],
  ["f", "\f"],
  ["v", "\v"],
  ["a", "\x07"],
  ["0", "\0"],
]);

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

function ok<T>(value: T): Decoded<T> {
  return { ok: true, value };
}

function fail<T>(kind: LexerErrorKind, message: string, index: number, fragment: string): Decoded<T> {
  return { ok: false, failure: { kind, message, index, fragment } };
}

export function decodeUtf8(bytes: Uint8Array): Decoded<string> {
  try {
    return ok(utf8Decoder.decode(bytes));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return fail("InvalidUtf8", `Invalid UTF-8 sequence (${reason})`, 0, "");
  }
}

/** Unbounded non-negative integer from a run of decimal digits. */
export function decodeNatural(digits: string): Decoded<bigint> {
  if (!DIGITS.test(digits)) {
    return fail("InvalidNumericLiteral", `Invalid natural number literal '${digits}'`, 0, digits);
  }
  return ok(BigInt(digits));
}

export function decodeDouble(text: string): Decoded<number> {
  if (!DOUBLE.test(text)) {
    return fail("InvalidNumericLiteral", `Invalid double literal '${text}'`, 0, text);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    return fail("InvalidNumericLiteral", `Double literal '${text}' is out of range`, 0, text);
  }
  return ok(value);
}

/**
 * Decodes a quoted text literal. `lexeme` includes both quotes; the
 * failure index of a bad escape points at its backslash.
 */
export function decodeText(lexeme: string): Decoded<string> {
  const body = lexeme.slice(1, -1);
  let value = "";
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch !== "\\") {
      value += ch;
      i++;
      continue;
    }
    const next = body.codePointAt(i + 1);
    const escaped = next === undefined ? undefined : String.fromCodePoint(next);
    const replacement = escaped === undefined ? undefined : ESCAPES.get(escaped);
    if (escaped === undefined || replacement === undefined) {
      // +1 for the opening quote
      const index = utf8Encoder.encode(lexeme.slice(0, i + 1)).length;
      const fragment = "\\" + (escaped ?? "");
      const message = escaped === undefined
        ? "Unterminated escape sequence in text literal"
        : `Invalid escape sequence '${fragment}' in text literal`;
      return fail("InvalidEscape", message, index, fragment);
    }
    value += replacement;
    i += 1 + escaped.length;
  }
  return ok(value);
}
