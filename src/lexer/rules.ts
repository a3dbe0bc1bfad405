import { TokenKind, type FixedKind, type TokenValue } from "./tokens.js";
import { FIXED_TEXT } from "./keywords.js";
import {
  decodeDouble,
  decodeNatural,
  decodeText,
  decodeUtf8,
  type Decoded,
} from "./decoders.js";

/** `skip` consumes the match without producing a token. */
export type RuleAction = "skip" | ((lexeme: Uint8Array) => Decoded<TokenValue>);

/**
 * One entry of the rule table. The position of a rule in `RULES` is its
 * priority when two rules match prefixes of the same length.
 */
export interface LexRule {
  readonly name: string;
  /** Length in bytes of the longest prefix accepted at `offset`, or 0. */
  match(input: Uint8Array, offset: number): number;
  readonly action: RuleAction;
}

export interface RuleMatch {
  rule: LexRule;
  length: number;
}

const TAB = 0x09;
const LF = 0x0a;
const VT = 0x0b;
const FF = 0x0c;
const CR = 0x0d;
const SPACE = 0x20;
const QUOTE = 0x22;
const LPAREN = 0x28;
const RPAREN = 0x29;
const PLUS = 0x2b;
const MINUS = 0x2d;
const DOT = 0x2e;
const BACKSLASH = 0x5c;
const UNDERSCORE = 0x5f;

const encoder = new TextEncoder();
const OPERATOR_CHARS = new Set(Array.from(encoder.encode("!#$%&*+./<=>?@\\^|-~")));

export function isWhitespace(b: number): boolean {
  return b === SPACE || b === TAB || b === LF || b === VT || b === FF || b === CR;
}

function isDigit(b: number): boolean {
  return b >= 0x30 && b <= 0x39;
}

function isLabelStart(b: number): boolean {
  return (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a) || b === UNDERSCORE;
}

function isLabelChar(b: number): boolean {
  return isLabelStart(b) || isDigit(b);
}

function runOf(input: Uint8Array, offset: number, accept: (b: number) => boolean): number {
  let i = offset;
  while (i < input.length && accept(input[i])) i++;
  return i - offset;
}

function startsWith(input: Uint8Array, offset: number, prefix: Uint8Array): boolean {
  if (offset + prefix.length > input.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (input[offset + i] !== prefix[i]) return false;
  }
  return true;
}

// ---- matchers ----

function matchComment(input: Uint8Array, offset: number): number {
  if (input[offset] !== MINUS || input[offset + 1] !== MINUS) return 0;
  return 2 + runOf(input, offset + 2, (b) => b !== LF);
}

/**
 * `" ( [^"] | \ any-but-LF )* "`. A backslash may be read either as a plain
 * body byte or as the start of an escape, so both readings are tracked and
 * the furthest closing quote wins.
 */
function matchTextLiteral(input: Uint8Array, offset: number): number {
  if (input[offset] !== QUOTE) return 0;
  let longest = 0;
  let inBody = true;
  let afterBackslash = false;
  for (let i = offset + 1; i < input.length && (inBody || afterBackslash); i++) {
    const b = input[i];
    let nextInBody = false;
    let nextAfterBackslash = false;
    if (inBody) {
      if (b === QUOTE) {
        longest = i + 1 - offset;
      } else {
        nextInBody = true;
        nextAfterBackslash = b === BACKSLASH;
      }
    }
    if (afterBackslash && b !== LF) nextInBody = true;
    inBody = nextInBody;
    afterBackslash = nextAfterBackslash;
  }
  return longest;
}

function matchNatural(input: Uint8Array, offset: number): number {
  if (input[offset] !== PLUS) return 0;
  const digits = runOf(input, offset + 1, isDigit);
  return digits > 0 ? 1 + digits : 0;
}

function matchNumber(input: Uint8Array, offset: number): number {
  return runOf(input, offset, isDigit);
}

function matchDouble(input: Uint8Array, offset: number): number {
  let end = offset + runOf(input, offset, isDigit);
  if (end === offset) return 0;
  if (input[end] === DOT) {
    const fraction = runOf(input, end + 1, isDigit);
    if (fraction > 0) end += 1 + fraction;
  }
  if (input[end] === 0x65 || input[end] === 0x45) {
    let exponent = end + 1;
    if (input[exponent] === PLUS || input[exponent] === MINUS) exponent++;
    const digits = runOf(input, exponent, isDigit);
    if (digits > 0) end = exponent + digits;
  }
  return end - offset;
}

function matchLabel(input: Uint8Array, offset: number): number {
  if (isLabelStart(input[offset])) {
    return 1 + runOf(input, offset + 1, isLabelChar);
  }
  if (input[offset] === LPAREN) {
    const symbol = runOf(input, offset + 1, (b) => OPERATOR_CHARS.has(b));
    if (symbol > 0 && input[offset + 1 + symbol] === RPAREN) return symbol + 2;
  }
  return 0;
}

function prefixedRun(...prefixes: string[]): (input: Uint8Array, offset: number) => number {
  const encoded = prefixes.map((p) => encoder.encode(p));
  return (input, offset) => {
    let longest = 0;
    for (const prefix of encoded) {
      if (!startsWith(input, offset, prefix)) continue;
      const rest = runOf(input, offset + prefix.length, (b) => !isWhitespace(b));
      if (rest > 0) longest = Math.max(longest, prefix.length + rest);
    }
    return longest;
  };
}

// ---- actions ----

function withText<T>(lexeme: Uint8Array, decode: (text: string) => Decoded<T>): Decoded<T> {
  const text = decodeUtf8(lexeme);
  return text.ok ? decode(text.value) : text;
}

function emitPayload(
  kind: TokenKind.Label | TokenKind.File | TokenKind.URL,
  drop = 0,
): (lexeme: Uint8Array) => Decoded<TokenValue> {
  return (lexeme) => {
    const text = decodeUtf8(lexeme.subarray(drop));
    if (!text.ok) {
      return { ok: false, failure: { ...text.failure, index: drop } };
    }
    return { ok: true, value: { kind, value: text.value } };
  };
}

function fixed(spelling: string, kind: FixedKind): LexRule {
  const bytes = encoder.encode(spelling);
  return {
    name: spelling,
    match: (input, offset) => (startsWith(input, offset, bytes) ? bytes.length : 0),
    action: (): Decoded<TokenValue> => ({ ok: true, value: { kind } }),
  };
}

export const RULES: readonly LexRule[] = [
  { name: "whitespace", match: (input, offset) => runOf(input, offset, isWhitespace), action: "skip" },
  { name: "comment", match: matchComment, action: "skip" },
  ...FIXED_TEXT.map(([spelling, kind]) => fixed(spelling, kind)),
  {
    name: "text",
    match: matchTextLiteral,
    action: (lexeme) =>
      withText(lexeme, (text): Decoded<TokenValue> => {
        const decoded = decodeText(text);
        return decoded.ok ? { ok: true, value: { kind: TokenKind.TextLiteral, value: decoded.value } } : decoded;
      }),
  },
  {
    name: "natural",
    match: matchNatural,
    action: (lexeme) =>
      withText(lexeme, (text): Decoded<TokenValue> => {
        const decoded = decodeNatural(text.slice(1));
        return decoded.ok ? { ok: true, value: { kind: TokenKind.NaturalLiteral, value: decoded.value } } : decoded;
      }),
  },
  {
    name: "number",
    match: matchNumber,
    action: (lexeme) =>
      withText(lexeme, (text): Decoded<TokenValue> => {
        const decoded = decodeNatural(text);
        return decoded.ok ? { ok: true, value: { kind: TokenKind.Number, value: decoded.value } } : decoded;
      }),
  },
  {
    name: "double",
    match: matchDouble,
    action: (lexeme) =>
      withText(lexeme, (text): Decoded<TokenValue> => {
        const decoded = decodeDouble(text);
        return decoded.ok ? { ok: true, value: { kind: TokenKind.DoubleLiteral, value: decoded.value } } : decoded;
      }),
  },
  { name: "label", match: matchLabel, action: emitPayload(TokenKind.Label) },
  { name: "absolute path", match: prefixedRun("/"), action: emitPayload(TokenKind.File) },
  { name: "here path", match: prefixedRun("./"), action: emitPayload(TokenKind.File, 2) },
  { name: "parent path", match: prefixedRun("../"), action: emitPayload(TokenKind.File) },
  { name: "url", match: prefixedRun("http://", "https://"), action: emitPayload(TokenKind.URL) },
];

/**
 * Maximal munch over `rules`: the longest match wins and, among equally
 * long matches, the rule declared first. Undefined when nothing matches a
 * non-empty prefix.
 */
export function longestMatch(
  input: Uint8Array,
  offset: number,
  rules: readonly LexRule[] = RULES,
): RuleMatch | undefined {
  let best: RuleMatch | undefined;
  for (const rule of rules) {
    const length = rule.match(input, offset);
    if (length > 0 && (best === undefined || length > best.length)) {
      best = { rule, length };
    }
  }
  return best;
}
