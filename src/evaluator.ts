import type { CalcError, CalcSyntaxError } from "./diagnostics";
import { type Result, ok, err } from "./result";
import { isOperator, type OperatorKind, type Token } from "./tokens";
import { applyOperator, int, type Value } from "./value";

/** Anything that hands out tokens one at a time (see `Tokenizer`). */
export interface TokenSource {
  nextToken(): Result<Token, CalcError>;
}

type EvalState =
  | { kind: "start" }
  | { kind: "expect_operator"; acc: Value }
  | { kind: "expect_operand"; acc: Value; op: OperatorKind }
  | { kind: "done"; acc: Value };

function unexpected(
  expected: CalcSyntaxError["expected"],
  token: Token
): CalcSyntaxError {
  return { kind: "syntax", expected, found: token.kind, offset: token.start };
}

function step(state: EvalState, token: Token): Result<EvalState, CalcError> {
  switch (state.kind) {
    case "start":
      if (token.kind !== "integer") return err(unexpected("operand", token));
      return ok<EvalState>({ kind: "expect_operator", acc: int(token.value) });

    case "expect_operator":
      if (token.kind === "eof")
        return ok<EvalState>({ kind: "done", acc: state.acc });
      if (!isOperator(token)) return err(unexpected("operator", token));
      return ok<EvalState>({
        kind: "expect_operand",
        acc: state.acc,
        op: token.kind,
      });

    case "expect_operand": {
      if (token.kind !== "integer") return err(unexpected("operand", token));
      const applied = applyOperator(state.op, state.acc, int(token.value));
      if (!applied.ok) {
        return err<CalcError>({ kind: "division_by_zero", offset: token.start });
      }
      return ok<EvalState>({ kind: "expect_operator", acc: applied.value });
    }

    case "done":
      return ok(state);
  }
}

/**
 * Folds the token stream strictly left to right: `2 + 3 * 4` is
 * `(2 + 3) * 4`. Stops at the first error without returning a partial value.
 */
export function evaluate(tokens: TokenSource): Result<Value, CalcError> {
  let state: EvalState = { kind: "start" };
  while (state.kind !== "done") {
    const next = tokens.nextToken();
    if (!next.ok) return next;
    const stepped = step(state, next.value);
    if (!stepped.ok) return stepped;
    state = stepped.value;
  }
  return ok(state.acc);
}
