import { describe, it, expect } from "vitest";
import { Lexer } from "../../src/lexer/lexer.js";
import { LexerError } from "../../src/lexer/errors.js";
import { TokenKind, payloadOf } from "../../src/lexer/tokens.js";

describe("Lexer", () => {
  function tokenKinds(source: string): TokenKind[] {
    const lexer = new Lexer(source, "test.cfl");
    return lexer.tokenize().map((t) => t.kind);
  }

  function tokenValues(source: string): unknown[] {
    const lexer = new Lexer(source, "test.cfl");
    return lexer.tokenize().map(payloadOf);
  }

  function lexError(source: string | Uint8Array): LexerError {
    try {
      new Lexer(source, "test.cfl").tokenize();
    } catch (e) {
      if (e instanceof LexerError) return e;
      throw e;
    }
    throw new Error("expected a LexerError");
  }

  it("tokenizes empty input", () => {
    expect(tokenKinds("")).toEqual([TokenKind.EOF]);
  });

  it("tokenizes whitespace-only input", () => {
    expect(tokenKinds(" \t\r\n\f\v ")).toEqual([TokenKind.EOF]);
  });

  describe("numeric literals", () => {
    it("reads a natural literal with its leading plus", () => {
      expect(tokenKinds("+42")).toEqual([TokenKind.NaturalLiteral, TokenKind.EOF]);
      expect(tokenValues("+42")[0]).toBe(42n);
    });

    it("reads naturals of arbitrary length", () => {
      expect(tokenValues("+123456789012345678901234567890")[0]).toBe(123456789012345678901234567890n);
    });

    it("reads bare digits as a number", () => {
      expect(tokenKinds("42")).toEqual([TokenKind.Number, TokenKind.EOF]);
      expect(tokenValues("42")[0]).toBe(42n);
    });

    it("reads doubles with fraction and exponent", () => {
      expect(tokenKinds("3.14e2")).toEqual([TokenKind.DoubleLiteral, TokenKind.EOF]);
      expect(tokenValues("3.14e2")[0]).toBe(314);
      expect(tokenValues("3.14")[0]).toBe(3.14);
      expect(tokenValues("1e5")[0]).toBe(100000);
      expect(tokenValues("0.5e-3")[0]).toBe(0.0005);
      expect(tokenValues("2E+2")[0]).toBe(200);
    });

    it("does not take an incomplete fraction or exponent", () => {
      expect(tokenKinds("1.")).toEqual([TokenKind.Number, TokenKind.Dot, TokenKind.EOF]);
      expect(tokenKinds("1e")).toEqual([TokenKind.Number, TokenKind.Label, TokenKind.EOF]);
    });

    it("separates plus from a following space", () => {
      expect(tokenKinds("+ 1")).toEqual([TokenKind.Plus, TokenKind.Number, TokenKind.EOF]);
      expect(tokenKinds("x+1")).toEqual([TokenKind.Label, TokenKind.NaturalLiteral, TokenKind.EOF]);
    });

    it("rejects doubles that overflow", () => {
      const err = lexError("1e400");
      expect(err.kind).toBe("InvalidNumericLiteral");
      expect(err.message).toBe("Double literal '1e400' is out of range");
      expect(err.column).toBe(1);
    });
  });

  describe("text literals", () => {
    it("decodes an escaped quote", () => {
      const tokens = new Lexer('"a\\"b"', "test").tokenize();
      expect(tokens[0].kind).toBe(TokenKind.TextLiteral);
      expect(payloadOf(tokens[0])).toBe('a"b');
      expect(tokens[0].span.end.offset).toBe(6);
    });

    it("handles escapes", () => {
      expect(tokenValues('"x\\ny\\t\\\\"')[0]).toBe("x\ny\t\\");
    });

    it("keeps raw newlines and tracks them", () => {
      const tokens = new Lexer('"a\nb" x', "test").tokenize();
      expect(payloadOf(tokens[0])).toBe("a\nb");
      expect(tokens[1].span.start.line).toBe(2);
      expect(tokens[1].span.start.column).toBe(4);
    });

    it("reports an invalid escape at its backslash", () => {
      const err = lexError('"ab\\q"');
      expect(err.kind).toBe("InvalidEscape");
      expect(err.fragment).toBe("\\q");
      expect(err.line).toBe(1);
      expect(err.column).toBe(4);
      expect(err.message).toBe("Invalid escape sequence '\\q' in text literal");
    });

    it("reports a backslash right before the closing quote", () => {
      const err = lexError('"a\\"');
      expect(err.kind).toBe("InvalidEscape");
      expect(err.column).toBe(3);
      expect(err.message).toBe("Unterminated escape sequence in text literal");
    });

    it("reports an unterminated literal as an unmatched quote", () => {
      const err = lexError('"abc');
      expect(err.kind).toBe("UnmatchedCharacter");
      expect(err.fragment).toBe('"');
      expect(err.column).toBe(1);
    });
  });

  describe("keywords and labels", () => {
    it("prefers keywords over labels of the same length", () => {
      expect(tokenKinds("let in Type Kind forall")).toEqual([
        TokenKind.Let, TokenKind.In, TokenKind.Type, TokenKind.Kind, TokenKind.Forall,
        TokenKind.EOF,
      ]);
    });

    it("tokenizes the built-in type and value names", () => {
      expect(tokenKinds("Bool True False if then else Natural Integer Text Double Maybe Nothing Just")).toEqual([
        TokenKind.Bool, TokenKind.True, TokenKind.False, TokenKind.If, TokenKind.Then,
        TokenKind.Else, TokenKind.Natural, TokenKind.Integer, TokenKind.Text,
        TokenKind.Double, TokenKind.Maybe, TokenKind.Nothing, TokenKind.Just,
        TokenKind.EOF,
      ]);
    });

    it("reads slash builtins as one token", () => {
      expect(tokenKinds("Natural/fold List/build List/fold")).toEqual([
        TokenKind.NaturalFold, TokenKind.ListBuild, TokenKind.ListFold, TokenKind.EOF,
      ]);
    });

    it("splits an unknown slash name into keyword and path", () => {
      expect(tokenKinds("Natural/foo")).toEqual([TokenKind.Natural, TokenKind.File, TokenKind.EOF]);
      expect(tokenValues("Natural/foo")[1]).toBe("/foo");
    });

    it("reads longer names as labels", () => {
      expect(tokenKinds("letter")).toEqual([TokenKind.Label, TokenKind.EOF]);
      expect(tokenValues("letter _x1 Types")).toEqual(["letter", "_x1", "Types", undefined]);
    });

    it("reads a parenthesized operator as a label", () => {
      expect(tokenKinds("(+)")).toEqual([TokenKind.Label, TokenKind.EOF]);
      expect(tokenValues("(==)")[0]).toBe("(==)");
      expect(tokenKinds("(x)")).toEqual([TokenKind.LParen, TokenKind.Label, TokenKind.RParen, TokenKind.EOF]);
    });
  });

  describe("punctuation and operators", () => {
    it("tokenizes every fixed symbol", () => {
      expect(tokenKinds("( ) { } {{ }} [ ] : , . = && || == /= + ++ - * -> \\ @")).toEqual([
        TokenKind.LParen, TokenKind.RParen, TokenKind.LBrace, TokenKind.RBrace,
        TokenKind.LDoubleBrace, TokenKind.RDoubleBrace, TokenKind.LBracket, TokenKind.RBracket,
        TokenKind.Colon, TokenKind.Comma, TokenKind.Dot, TokenKind.Eq,
        TokenKind.AndAnd, TokenKind.OrOr, TokenKind.EqEq, TokenKind.NotEq,
        TokenKind.Plus, TokenKind.PlusPlus, TokenKind.Minus, TokenKind.Star,
        TokenKind.Arrow, TokenKind.Lambda, TokenKind.At,
        TokenKind.EOF,
      ]);
    });

    it("accepts unicode spellings and counts them as one column", () => {
      const tokens = new Lexer("λ → ∀", "test").tokenize();
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.Lambda, TokenKind.Arrow, TokenKind.Forall, TokenKind.EOF,
      ]);
      expect(tokens.map((t) => t.span.start.column)).toEqual([1, 3, 5, 6]);
      expect(tokens.map((t) => t.span.start.offset)).toEqual([0, 3, 7, 10]);
    });

    it("tokenizes a lambda", () => {
      expect(tokenKinds("\\(x : Natural) -> x")).toEqual([
        TokenKind.Lambda, TokenKind.LParen, TokenKind.Label, TokenKind.Colon,
        TokenKind.Natural, TokenKind.RParen, TokenKind.Arrow, TokenKind.Label,
        TokenKind.EOF,
      ]);
    });
  });

  describe("imports", () => {
    it("strips ./ from here paths", () => {
      expect(tokenKinds("./foo/bar")).toEqual([TokenKind.File, TokenKind.EOF]);
      expect(tokenValues("./foo/bar")[0]).toBe("foo/bar");
    });

    it("keeps absolute and parent paths verbatim", () => {
      expect(tokenValues("/foo/bar")[0]).toBe("/foo/bar");
      expect(tokenValues("../x/y")[0]).toBe("../x/y");
    });

    it("reads URLs", () => {
      expect(tokenKinds("https://example.com/a http://example.com/b")).toEqual([
        TokenKind.URL, TokenKind.URL, TokenKind.EOF,
      ]);
      expect(tokenValues("https://example.com/a")[0]).toBe("https://example.com/a");
    });

    it("rejects invalid UTF-8 inside a path", () => {
      const err = lexError(new Uint8Array([0x2f, 0x61, 0xff]));
      expect(err.kind).toBe("InvalidUtf8");
      expect(err.column).toBe(1);
    });
  });

  it("skips line comments", () => {
    expect(tokenKinds("-- comment\nlet")).toEqual([TokenKind.Let, TokenKind.EOF]);
    expect(tokenKinds("42 -- trailing")).toEqual([TokenKind.Number, TokenKind.EOF]);
  });

  it("tracks line and column numbers", () => {
    const tokens = new Lexer("foo\nbar", "test").tokenize();
    expect(tokens[0].span.start.line).toBe(1);
    expect(tokens[0].span.start.column).toBe(1);
    expect(tokens[0].span.end).toEqual({ offset: 3, line: 1, column: 4 });
    expect(tokens[1].span.start.line).toBe(2);
    expect(tokens[1].span.start.column).toBe(1);
    expect(tokens[1].span.source).toBe("test");
  });

  it("reads from a byte buffer", () => {
    const lexer = new Lexer(new TextEncoder().encode("Type"), "test");
    expect(lexer.next().kind).toBe(TokenKind.Type);
  });

  describe("unmatched characters", () => {
    it("reports the byte and its position", () => {
      const lexer = new Lexer("let\n  `", "test");
      expect(lexer.next().kind).toBe(TokenKind.Let);
      let caught: unknown;
      try {
        lexer.next();
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(LexerError);
      if (caught instanceof LexerError) {
        expect(caught.kind).toBe("UnmatchedCharacter");
        expect(caught.byte).toBe(0x60);
        expect(caught.fragment).toBe("`");
        expect(caught.line).toBe(2);
        expect(caught.column).toBe(3);
        expect(caught.span.start.offset).toBe(6);
        expect(caught.message).toBe("Unexpected character '`' (byte 0x60)");
      }
    });

    it("keeps failing after an error", () => {
      const lexer = new Lexer("`", "test");
      const errors: unknown[] = [];
      for (let i = 0; i < 2; i++) {
        try {
          lexer.next();
        } catch (e) {
          errors.push(e);
        }
      }
      expect(errors).toHaveLength(2);
      expect(errors[1]).toBe(errors[0]);
    });
  });

  describe("end of input", () => {
    it("keeps returning EOF", () => {
      const lexer = new Lexer("x", "test");
      expect(lexer.next().kind).toBe(TokenKind.Label);
      const first = lexer.next();
      const second = lexer.next();
      const third = lexer.next();
      expect([first.kind, second.kind, third.kind]).toEqual([TokenKind.EOF, TokenKind.EOF, TokenKind.EOF]);
      expect(third.span).toEqual(first.span);
      expect(first.span.start).toEqual({ offset: 1, line: 1, column: 2 });
    });

    it("stops iteration after EOF", () => {
      const kinds = [...new Lexer("a b", "test")].map((t) => t.kind);
      expect(kinds).toEqual([TokenKind.Label, TokenKind.Label, TokenKind.EOF]);
    });

    it("exposes the cursor", () => {
      const lexer = new Lexer("ab\ncd", "test");
      lexer.next();
      expect(lexer.position).toEqual({ offset: 2, line: 1, column: 3 });
      lexer.next();
      expect(lexer.position).toEqual({ offset: 5, line: 2, column: 3 });
    });
  });
});
