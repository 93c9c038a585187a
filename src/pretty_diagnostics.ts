import { errorMessage, type CalcError } from "./diagnostics";

export type FormatCalcErrorOptions = {
  /** Append the input line with a caret under the offending column. */
  codeFrame?: boolean;
};

// tabs in the line prefix are kept so the caret lines up under them
function caretLine(line: string, col: number, gutterWidth: number): string {
  let pad = "";
  for (let i = 0; i < Math.max(1, col) - 1; i++) {
    pad += line[i] === "\t" ? "\t" : " ";
  }
  return `${" ".repeat(gutterWidth)} | ${pad}^`;
}

/**
 * Formats an evaluation error for display, e.g.
 *
 * ```
 * error: Unexpected character '@' (at column 3)
 * 1 | 3 @ 5
 *   |   ^
 * ```
 */
export function formatCalcError(
  error: CalcError,
  line: string,
  opts: FormatCalcErrorOptions = {}
): string {
  const col = error.offset + 1;
  const header = `error: ${errorMessage(error)} (at column ${col})`;
  if (opts.codeFrame === false) return header;

  const gutter = "1";
  const frame = `${gutter} | ${line}`;
  return [header, frame, caretLine(line, col, gutter.length)].join("\n");
}
