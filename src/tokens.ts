export type OperatorKind = "plus" | "minus" | "times" | "divide";

export type TokenKind = "integer" | OperatorKind | "eof";

export type OperatorSymbol = "+" | "-" | "*" | "/";

type Span = {
  start: number;
  end: number;
};

export type IntegerToken = Span & {
  kind: "integer";
  value: number;
};

export type OperatorToken = Span & {
  kind: OperatorKind;
  text: OperatorSymbol;
};

export type EofToken = Span & {
  kind: "eof";
};

export type Token = IntegerToken | OperatorToken | EofToken;

export const OPERATOR_KINDS: Readonly<Record<OperatorSymbol, OperatorKind>> = {
  "+": "plus",
  "-": "minus",
  "*": "times",
  "/": "divide",
};

export function isOperatorSymbol(ch: string): ch is OperatorSymbol {
  return Object.prototype.hasOwnProperty.call(OPERATOR_KINDS, ch);
}

export function isOperator(token: Token): token is OperatorToken {
  return token.kind !== "integer" && token.kind !== "eof";
}

/**
 * Debug rendering, e.g. `Token(INTEGER, 3)`, `Token(PLUS, '+')`,
 * `Token(EOF, None)`.
 */
export function describeToken(token: Token): string {
  const name = token.kind.toUpperCase();
  switch (token.kind) {
    case "integer":
      return `Token(${name}, ${token.value})`;
    case "eof":
      return `Token(${name}, None)`;
    default:
      return `Token(${name}, '${token.text}')`;
  }
}
