import type { CalcError } from "./diagnostics";
import { evaluate } from "./evaluator";
import { Tokenizer } from "./lexer";
import type { Result } from "./result";
import type { Value } from "./value";

/** Evaluates one line with a fresh tokenizer; nothing is shared between calls. */
export function evaluateLine(line: string): Result<Value, CalcError> {
  return evaluate(new Tokenizer(line));
}

export const isBlankLine = (line: string): boolean => line.trim() === "";
