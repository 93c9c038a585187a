import { describe, it, expect } from "vitest";
import { parseOptions } from "../src/options";

describe("parseOptions", () => {
  it("defaults to an interactive session", () => {
    expect(parseOptions([])).toEqual({
      ok: true,
      value: {
        mode: { kind: "interactive" },
        prompt: "calc> ",
        tokens: false,
        codeFrame: true,
      },
    });
  });

  it("reads mode and flags", () => {
    const r = parseOptions(["--expr", "1+2", "--no-code-frame", "--tokens"]);
    expect(r).toEqual({
      ok: true,
      value: {
        mode: { kind: "expr", expr: "1+2" },
        prompt: "calc> ",
        tokens: true,
        codeFrame: false,
      },
    });
  });

  it("reads a file path and a custom prompt", () => {
    const r = parseOptions(["--prompt", ">> ", "--file", "sums.txt"]);
    expect(r.ok && r.value.mode).toEqual({ kind: "file", path: "sums.txt" });
    expect(r.ok && r.value.prompt).toBe(">> ");
  });

  it("lets --help win over other modes", () => {
    const r = parseOptions(["--expr", "1", "-h"]);
    expect(r.ok && r.value.mode).toEqual({ kind: "help" });
  });

  it("rejects bad usage", () => {
    expect(parseOptions(["--file", "a", "--expr", "1"])).toEqual({
      ok: false,
      error: "Only one of --expr or --file may be given",
    });
    expect(parseOptions(["--expr", "1", "--expr", "2"])).toEqual({
      ok: false,
      error: "Only one of --expr or --file may be given",
    });
    expect(parseOptions(["--prompt"])).toEqual({
      ok: false,
      error: "Missing value for --prompt",
    });
    expect(parseOptions(["--bogus"])).toEqual({
      ok: false,
      error: "Unknown option: --bogus",
    });
  });
});
