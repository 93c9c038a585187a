import type { LexicalError } from "./diagnostics";
import { type Result, ok, err } from "./result";
import {
  OPERATOR_KINDS,
  isOperatorSymbol,
  type Token,
} from "./tokens";

const isWhitespace = (ch: string) => /\s/.test(ch);
const isDigit = (ch: string) => ch >= "0" && ch <= "9";

/**
 * Pull-based scanner over a single line. Tokens are produced one per
 * `nextToken()` call; there is no way to rewind.
 */
export class Tokenizer {
  private i = 0;

  constructor(private readonly src: string) {}

  nextToken(): Result<Token, LexicalError> {
    this.skipWhitespace();

    if (this.isEOF()) {
      const eof: Token = {
        kind: "eof",
        start: this.src.length,
        end: this.src.length,
      };
      return ok(eof);
    }

    const start = this.i;
    const ch = this.peek();

    if (isDigit(ch)) return this.readInteger(start);

    if (isOperatorSymbol(ch)) {
      this.i++;
      const op: Token = { kind: OPERATOR_KINDS[ch], text: ch, start, end: this.i };
      return ok(op);
    }

    const error: LexicalError = {
      kind: "lexical",
      reason: "unexpected_character",
      char: this.peekCodePoint(),
      offset: start,
    };
    return err(error);
  }

  private readInteger(start: number): Result<Token, LexicalError> {
    while (!this.isEOF() && isDigit(this.peek())) this.i++;

    const digits = this.src.slice(start, this.i);
    const value = Number(digits);
    if (!Number.isSafeInteger(value)) {
      const error: LexicalError = {
        kind: "lexical",
        reason: "integer_too_large",
        char: digits,
        offset: start,
      };
      return err(error);
    }
    const token: Token = { kind: "integer", value, start, end: this.i };
    return ok(token);
  }

  private skipWhitespace() {
    while (!this.isEOF() && isWhitespace(this.peek())) this.i++;
  }

  private peek(): string {
    return this.src[this.i];
  }

  /** Whole character at the cursor, surrogate pairs included. */
  private peekCodePoint(): string {
    const cp = this.src.codePointAt(this.i);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }
}

/** Scans the whole line, up to and including the `eof` token. */
export function tokenizeAll(line: string): Result<Token[], LexicalError> {
  const tokenizer = new Tokenizer(line);
  const tokens: Token[] = [];
  for (;;) {
    const next = tokenizer.nextToken();
    if (!next.ok) return next;
    tokens.push(next.value);
    if (next.value.kind === "eof") return ok(tokens);
  }
}
