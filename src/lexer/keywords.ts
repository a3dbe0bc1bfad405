import { TokenKind, type FixedKind } from "./tokens.js";

export const KEYWORDS: Map<string, FixedKind> = new Map([
  ["let", TokenKind.Let],
  ["in", TokenKind.In],
  ["Type", TokenKind.Type],
  ["Kind", TokenKind.Kind],
  ["forall", TokenKind.Forall],
  ["Bool", TokenKind.Bool],
  ["True", TokenKind.True],
  ["False", TokenKind.False],
  ["if", TokenKind.If],
  ["then", TokenKind.Then],
  ["else", TokenKind.Else],
  ["Natural", TokenKind.Natural],
  ["Natural/fold", TokenKind.NaturalFold],
  ["Integer", TokenKind.Integer],
  ["Text", TokenKind.Text],
  ["Double", TokenKind.Double],
  ["Maybe", TokenKind.Maybe],
  ["Nothing", TokenKind.Nothing],
  ["Just", TokenKind.Just],
  ["List/build", TokenKind.ListBuild],
  ["List/fold", TokenKind.ListFold],
]);

export const PUNCTUATION: Map<string, FixedKind> = new Map([
  ["(", TokenKind.LParen],
  [")", TokenKind.RParen],
  ["{", TokenKind.LBrace],
  ["}", TokenKind.RBrace],
  ["{{", TokenKind.LDoubleBrace],
  ["}}", TokenKind.RDoubleBrace],
  ["[", TokenKind.LBracket],
  ["]", TokenKind.RBracket],
  [":", TokenKind.Colon],
  [",", TokenKind.Comma],
  [".", TokenKind.Dot],
  ["=", TokenKind.Eq],
  ["&&", TokenKind.AndAnd],
  ["||", TokenKind.OrOr],
  ["==", TokenKind.EqEq],
  ["/=", TokenKind.NotEq],
  ["+", TokenKind.Plus],
  ["++", TokenKind.PlusPlus],
  ["-", TokenKind.Minus],
  ["*", TokenKind.Star],
  ["@", TokenKind.At],
  ["->", TokenKind.Arrow],
  ["\\", TokenKind.Lambda],
]);

// Unicode spellings of ASCII tokens; rendering always uses the ASCII form.
export const ALTERNATE_SPELLINGS: Map<string, FixedKind> = new Map([
  ["→", TokenKind.Arrow],
  ["∀", TokenKind.Forall],
  ["λ", TokenKind.Lambda],
]);

/** Every fixed spelling in rule declaration order: punctuation, keywords, then alternates. */
export const FIXED_TEXT: ReadonlyArray<readonly [string, FixedKind]> = [
  ...PUNCTUATION,
  ...KEYWORDS,
  ...ALTERNATE_SPELLINGS,
];
