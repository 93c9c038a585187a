import { type Result, ok, err } from "./result";
import { DEFAULT_PROMPT } from "./session";

export type RunMode =
  | { kind: "interactive" }
  | { kind: "expr"; expr: string }
  | { kind: "file"; path: string }
  | { kind: "help" };

export type CliOptions = {
  mode: RunMode;
  prompt: string;
  /** Print the token stream instead of evaluating. */
  tokens: boolean;
  codeFrame: boolean;
};

export const USAGE = [
  "Usage: linecalc [options]",
  "",
  "Evaluates + - * / over non-negative integers, strictly left to right.",
  "",
  "Options:",
  "  --expr <text>     evaluate a single expression and exit",
  "  --file <path>     evaluate every line of a file",
  `  --prompt <text>   interactive prompt (default "${DEFAULT_PROMPT}")`,
  "  --tokens          print tokens instead of results",
  "  --no-code-frame   omit the source line and caret from errors",
  "  -h, --help        show this help",
].join("\n");

export function parseOptions(
  argv: readonly string[]
): Result<CliOptions, string> {
  const opts: CliOptions = {
    mode: { kind: "interactive" },
    prompt: DEFAULT_PROMPT,
    tokens: false,
    codeFrame: true,
  };

  const setMode = (mode: RunMode): Result<null, string> => {
    if (opts.mode.kind !== "interactive" && opts.mode.kind !== "help")
      return err("Only one of --expr or --file may be given");
    if (opts.mode.kind !== "help") opts.mode = mode;
    return ok(null);
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        opts.mode = { kind: "help" };
        continue;
      case "--tokens":
        opts.tokens = true;
        continue;
      case "--no-code-frame":
        opts.codeFrame = false;
        continue;
      case "--expr":
      case "--file":
      case "--prompt": {
        const value = argv[i + 1];
        if (value === undefined) return err(`Missing value for ${arg}`);
        i++;
        if (arg === "--prompt") {
          opts.prompt = value;
          continue;
        }
        const set = setMode(
          arg === "--expr"
            ? { kind: "expr", expr: value }
            : { kind: "file", path: value }
        );
        if (!set.ok) return set;
        continue;
      }
      default:
        return err(`Unknown option: ${arg}`);
    }
  }
  return ok(opts);
}
