import { describe, it, expect } from "vitest";
import { tokenizeAll } from "../src/lexer";
import {
  arrayLineSource,
  consoleSink,
  readlineLineSource,
  runCalculator,
  runSession,
  tokenDumpSink,
  type ResultSink,
} from "../src/session";
import type { Value } from "../src/value";
import { captureStream, inputStream } from "./helpers";

describe("session", () => {
  it("skips blank lines and keeps going after an error", async () => {
    const out = captureStream();
    const errOut = captureStream();
    const summary = await runCalculator(
      arrayLineSource(["3 + 5", "", "   ", "10 / 0", "8 / 2"]),
      consoleSink(out.stream, errOut.stream)
    );

    expect(summary).toEqual({ evaluated: 3, failed: 1 });
    expect(out.text()).toBe("8\n4.0\n");
    expect(errOut.text()).toBe(
      [
        "error: Division by zero (at column 6)",
        "1 | 10 / 0",
        "  |      ^",
        "",
      ].join("\n")
    );
  });

  it("hands each line and its outcome to the sink", async () => {
    const seen: string[] = [];
    const sink: ResultSink<Value> = {
      result: (line, value) => seen.push(`${line} => ${value.value}`),
      error: (line, error) => seen.push(`${line} !! ${error.kind}`),
    };
    await runCalculator(arrayLineSource(["1 + 1", "1 +", "\t"]), sink);
    expect(seen).toEqual(["1 + 1 => 2", "1 + !! syntax"]);
  });

  it("dumps tokens instead of evaluating", async () => {
    const out = captureStream();
    const errOut = captureStream();
    const summary = await runSession(
      arrayLineSource(["1+2", "1 + +"]),
      tokenDumpSink(out.stream, errOut.stream, { codeFrame: false }),
      tokenizeAll
    );

    expect(summary).toEqual({ evaluated: 2, failed: 0 });
    expect(out.text()).toBe(
      "Token(INTEGER, 1) Token(PLUS, '+') Token(INTEGER, 2) Token(EOF, None)\n" +
        "Token(INTEGER, 1) Token(PLUS, '+') Token(PLUS, '+') Token(EOF, None)\n"
    );
    expect(errOut.text()).toBe("");
  });

  it("reads lines from a stream with a prompt", async () => {
    const prompts = captureStream();
    const out = captureStream();
    const errOut = captureStream();
    const source = readlineLineSource(
      inputStream("1 + 1\n\n2 * 3\n"),
      prompts.stream
    );
    const summary = await runCalculator(
      source,
      consoleSink(out.stream, errOut.stream)
    );
    source.close();

    expect(summary).toEqual({ evaluated: 2, failed: 0 });
    expect(out.text()).toBe("2\n6\n");
    expect(prompts.text()).toBe("calc> calc> calc> calc> ");
  });
});
