import type { Span } from "../errors/diagnostic.js";

export enum TokenKind {
  // Literals
  TextLiteral = "TextLiteral",
  NaturalLiteral = "NaturalLiteral",
  DoubleLiteral = "DoubleLiteral",
  Number = "Number",

  // Names and imports
  Label = "Label",
  File = "File",
  URL = "URL",

  // Keywords
  Let = "let",
  In = "in",
  Type = "Type",
  Kind = "Kind",
  Forall = "forall",
  Bool = "Bool",
  True = "True",
  False = "False",
  If = "if",
  Then = "then",
  Else = "else",
  Natural = "Natural",
  NaturalFold = "Natural/fold",
  Integer = "Integer",
  Text = "Text",
  Double = "Double",
  Maybe = "Maybe",
  Nothing = "Nothing",
  Just = "Just",
  ListBuild = "List/build",
  ListFold = "List/fold",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBrace = "{",
  RBrace = "}",
  LDoubleBrace = "{{",
  RDoubleBrace = "}}",
  LBracket = "[",
  RBracket = "]",

  // Operators
  AndAnd = "&&",
  OrOr = "||",
  EqEq = "==",
  NotEq = "/=",
  Plus = "+",
  PlusPlus = "++",
  Minus = "-",
  Star = "*",

  // Punctuation
  Arrow = "->",
  Lambda = "\\",
  At = "@",
  Colon = ":",
  Comma = ",",
  Dot = ".",
  Eq = "=",

  // Special
  EOF = "EOF",
}

/** Kinds that carry a decoded payload. */
export type PayloadKind =
  | TokenKind.TextLiteral
  | TokenKind.NaturalLiteral
  | TokenKind.DoubleLiteral
  | TokenKind.Number
  | TokenKind.Label
  | TokenKind.File
  | TokenKind.URL;

/** Kinds whose surface text is always the same; the enum value is that text. */
export type FixedKind = Exclude<TokenKind, PayloadKind | TokenKind.EOF>;

export type TokenValue =
  | { kind: FixedKind }
  | { kind: TokenKind.TextLiteral; value: string }
  | { kind: TokenKind.NaturalLiteral; value: bigint }
  | { kind: TokenKind.DoubleLiteral; value: number }
  | { kind: TokenKind.Number; value: bigint }
  | { kind: TokenKind.Label; value: string }
  | { kind: TokenKind.File; value: string }
  | { kind: TokenKind.URL; value: string }
  | { kind: TokenKind.EOF };

export type Token = TokenValue & { span: Span };

/** The decoded payload of a token, or undefined for fixed-text tokens and EOF. */
export function payloadOf(token: TokenValue): string | bigint | number | undefined {
  return "value" in token ? token.value : undefined;
}
