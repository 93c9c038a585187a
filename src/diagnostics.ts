import type { TokenKind } from "./tokens";

export type LexicalReason = "unexpected_character" | "integer_too_large";

export type LexicalError = {
  kind: "lexical";
  reason: LexicalReason;
  /** The offending character, or the whole digit run for `integer_too_large`. */
  char: string;
  offset: number;
};

export type CalcSyntaxError = {
  kind: "syntax";
  expected: "operand" | "operator";
  found: TokenKind;
  offset: number;
};

export type DivisionByZeroError = {
  kind: "division_by_zero";
  offset: number;
};

export type CalcError = LexicalError | CalcSyntaxError | DivisionByZeroError;

const FOUND_NAMES: Record<TokenKind, string> = {
  integer: "integer",
  plus: "'+'",
  minus: "'-'",
  times: "'*'",
  divide: "'/'",
  eof: "end of input",
};

export function errorMessage(error: CalcError): string {
  switch (error.kind) {
    case "lexical":
      return error.reason === "integer_too_large"
        ? `Integer literal is too large: ${error.char}`
        : `Unexpected character '${error.char}'`;
    case "syntax":
      return `Expected ${error.expected}, found ${FOUND_NAMES[error.found]}`;
    case "division_by_zero":
      return "Division by zero";
  }
}
