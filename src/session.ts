import readline from "node:readline";
import { evaluateLine, isBlankLine } from "./calc";
import type { CalcError } from "./diagnostics";
import { formatCalcError } from "./pretty_diagnostics";
import type { Result } from "./result";
import { describeToken, type Token } from "./tokens";
import { formatValue, type Value } from "./value";

export const DEFAULT_PROMPT = "calc> ";

export interface LineSource {
  /** Resolves to `undefined` once input is exhausted. */
  readLine(): Promise<string | undefined>;
}

export interface ResultSink<T> {
  result(line: string, value: T): void;
  error(line: string, error: CalcError): void;
}

export type SessionSummary = {
  evaluated: number;
  failed: number;
};

/** Minimal writable surface; `process.stdout` satisfies it. */
export type TextOutput = {
  write(chunk: string): unknown;
};

export async function runSession<T>(
  source: LineSource,
  sink: ResultSink<T>,
  evaluate: (line: string) => Result<T, CalcError>
): Promise<SessionSummary> {
  const summary: SessionSummary = { evaluated: 0, failed: 0 };
  for (;;) {
    const line = await source.readLine();
    if (line === undefined) return summary;
    if (isBlankLine(line)) continue;

    summary.evaluated++;
    const res = evaluate(line);
    if (res.ok) {
      sink.result(line, res.value);
    } else {
      summary.failed++;
      sink.error(line, res.error);
    }
  }
}

export function runCalculator(
  source: LineSource,
  sink: ResultSink<Value>
): Promise<SessionSummary> {
  return runSession(source, sink, evaluateLine);
}

export function arrayLineSource(lines: readonly string[]): LineSource {
  let i = 0;
  return {
    readLine: async () => (i < lines.length ? lines[i++] : undefined),
  };
}

export type ReadlineLineSource = LineSource & { close(): void };

export function readlineLineSource(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  prompt: string = DEFAULT_PROMPT
): ReadlineLineSource {
  // one prompt per read, including the read that sees end of input
  const rl = readline.createInterface({ input, terminal: false });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });
  const lines = rl[Symbol.asyncIterator]();
  return {
    async readLine() {
      output.write(prompt);
      const next = await lines.next();
      if (next.done) return undefined;
      return next.value;
    },
    close: () => {
      if (!closed) rl.close();
    },
  };
}

export type ConsoleSinkOptions = {
  codeFrame?: boolean;
};

export function consoleSink(
  out: TextOutput,
  errOut: TextOutput,
  opts: ConsoleSinkOptions = {}
): ResultSink<Value> {
  return {
    result: (_line, value) => {
      out.write(formatValue(value) + "\n");
    },
    error: (line, error) => {
      errOut.write(
        formatCalcError(error, line, { codeFrame: opts.codeFrame }) + "\n"
      );
    },
  };
}

export function tokenDumpSink(
  out: TextOutput,
  errOut: TextOutput,
  opts: ConsoleSinkOptions = {}
): ResultSink<Token[]> {
  return {
    result: (_line, tokens) => {
      out.write(tokens.map(describeToken).join(" ") + "\n");
    },
    error: (line, error) => {
      errOut.write(
        formatCalcError(error, line, { codeFrame: opts.codeFrame }) + "\n"
      );
    },
  };
}
