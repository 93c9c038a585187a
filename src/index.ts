export { evaluateLine, isBlankLine } from "./calc";
export { errorMessage } from "./diagnostics";
export type {
  CalcError,
  CalcSyntaxError,
  DivisionByZeroError,
  LexicalError,
} from "./diagnostics";
export { evaluate } from "./evaluator";
export type { TokenSource } from "./evaluator";
export { Tokenizer, tokenizeAll } from "./lexer";
export { formatCalcError } from "./pretty_diagnostics";
export { ok, err } from "./result";
export type { Err, Ok, Result } from "./result";
export {
  DEFAULT_PROMPT,
  arrayLineSource,
  consoleSink,
  readlineLineSource,
  runCalculator,
  runSession,
  tokenDumpSink,
} from "./session";
export type { LineSource, ResultSink, SessionSummary } from "./session";
export { describeToken } from "./tokens";
export type { Token, TokenKind } from "./tokens";
export { formatValue } from "./value";
export type { Value } from "./value";
