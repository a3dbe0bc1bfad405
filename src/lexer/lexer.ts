import { TokenKind, type Token, type TokenValue } from "./tokens.js";
import { longestMatch } from "./rules.js";
import { decodeUtf8, type DecodeFailure } from "./decoders.js";
import { LexerError } from "./errors.js";
import { makeSpan, type Position } from "../errors/diagnostic.js";

const LF = 0x0a;
const encoder = new TextEncoder();

function isContinuationByte(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

function sequenceLength(lead: number): number {
  if (lead >= 0xf0 && lead <= 0xf7) return 4;
  if (lead >= 0xe0) return lead <= 0xef ? 3 : 1;
  if (lead >= 0xc0) return 2;
  return 1;
}

function hexByte(b: number): string {
  return "0x" + b.toString(16).padStart(2, "0");
}

/**
 * Pull-based tokenizer over one immutable UTF-8 buffer. Each call to
 * `next()` returns exactly one token; after the end of input it keeps
 * returning EOF.
 */
export class Lexer implements Iterable<Token> {
  private readonly input: Uint8Array;
  private readonly filename: string;
  private cursor: Position = { offset: 0, line: 1, column: 1 };
  private failure: LexerError | undefined;

  constructor(source: string | Uint8Array, filename: string = "<stdin>") {
    this.input = typeof source === "string" ? encoder.encode(source) : source;
    this.filename = filename;
  }

  get position(): Position {
    return { ...this.cursor };
  }

  next(): Token {
    if (this.failure) throw this.failure;

    while (this.cursor.offset < this.input.length) {
      const found = longestMatch(this.input, this.cursor.offset);
      if (!found) throw this.fail(this.unmatchedCharacter());

      const start = this.cursor;
      const lexeme = this.input.subarray(start.offset, start.offset + found.length);
      this.cursor = this.positionAfter(start, found.length);

      const action = found.rule.action;
      if (action === "skip") continue;

      const result = action(lexeme);
      if (!result.ok) throw this.fail(this.decodeError(result.failure, start));
      return this.makeToken(result.value, start);
    }

    return this.makeToken({ kind: TokenKind.EOF }, this.cursor);
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (const token of this) {
      tokens.push(token);
    }
    return tokens;
  }

  *[Symbol.iterator](): Generator<Token, void, undefined> {
    while (true) {
      const token = this.next();
      yield token;
      if (token.kind === TokenKind.EOF) return;
    }
  }

  private fail(err: LexerError): LexerError {
    this.failure = err;
    return err;
  }

  private unmatchedCharacter(): LexerError {
    const start = this.cursor;
    const byte = this.input[start.offset];
    const length = Math.min(sequenceLength(byte), this.input.length - start.offset);
    const decoded = decodeUtf8(this.input.subarray(start.offset, start.offset + length));
    const fragment = decoded.ok ? decoded.value : hexByte(byte);
    const span = makeSpan(this.filename, start, this.positionAfter(start, decoded.ok ? length : 1));
    return new LexerError(
      "UnmatchedCharacter",
      `Unexpected character '${fragment}' (byte ${hexByte(byte)})`,
      span,
      fragment,
      byte,
    );
  }

  private decodeError(failure: DecodeFailure, tokenStart: Position): LexerError {
    const start = this.positionAfter(tokenStart, failure.index);
    const end = failure.fragment
      ? this.positionAfter(start, encoder.encode(failure.fragment).length)
      : this.cursor;
    return new LexerError(failure.kind, failure.message, makeSpan(this.filename, start, end), failure.fragment);
  }

  /** Position reached by consuming `length` bytes from `from`. */
  private positionAfter(from: Position, length: number): Position {
    const end = Math.min(from.offset + length, this.input.length);
    let { line, column } = from;
    for (let i = from.offset; i < end; i++) {
      const b = this.input[i];
      if (b === LF) {
        line++;
        column = 1;
      } else if (!isContinuationByte(b)) {
        column++;
      }
    }
    return { offset: end, line, column };
  }

  private makeToken(value: TokenValue, start: Position): Token {
    return { ...value, span: makeSpan(this.filename, start, this.cursor) };
  }
}
