import { TokenKind, type TokenValue } from "./tokens.js";
import { ESCAPES } from "./decoders.js";

const REVERSE_ESCAPES: ReadonlyMap<string, string> = new Map(
  [...ESCAPES]
    // a bare ' needs no escape inside double quotes
    .filter(([escape]) => escape !== "'")
    .map(([escape, ch]): [string, string] => [ch, "\\" + escape]),
);

/** Quotes `value` so that decoding the result gives `value` back. */
export function escapeText(value: string): string {
  let out = '"';
  for (const ch of value) {
    out += REVERSE_ESCAPES.get(ch) ?? ch;
  }
  return out + '"';
}

function renderDouble(value: number): string {
  const text = String(value);
  return /[.eE]|Infinity|NaN/.test(text) ? text : text + ".0";
}

/** Canonical surface text of a token, for diagnostics. EOF renders as "". */
export function renderToken(token: TokenValue): string {
  switch (token.kind) {
    case TokenKind.TextLiteral:
      return escapeText(token.value);
    case TokenKind.NaturalLiteral:
      return `+${token.value}`;
    case TokenKind.Number:
      return token.value.toString();
    case TokenKind.DoubleLiteral:
      return renderDouble(token.value);
    case TokenKind.Label:
    case TokenKind.File:
    case TokenKind.URL:
      return token.value;
    case TokenKind.EOF:
      return "";
    default:
      return token.kind;
  }
}

export function renderTokens(tokens: readonly TokenValue[]): string {
  return tokens
    .filter((t) => t.kind !== TokenKind.EOF)
    .map(renderToken)
    .join(" ");
}
