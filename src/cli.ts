import { readFile } from "node:fs/promises";
import { tokenizeAll } from "./lexer";
import { parseOptions, USAGE, type CliOptions } from "./options";
import {
  arrayLineSource,
  consoleSink,
  readlineLineSource,
  runCalculator,
  runSession,
  tokenDumpSink,
  type LineSource,
  type SessionSummary,
  type TextOutput,
} from "./session";

export type CliIO = {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: TextOutput;
  readTextFile?: (path: string) => Promise<string>;
};

function runLines(
  source: LineSource,
  opts: CliOptions,
  io: CliIO
): Promise<SessionSummary> {
  const sinkOpts = { codeFrame: opts.codeFrame };
  if (opts.tokens) {
    return runSession(
      source,
      tokenDumpSink(io.stdout, io.stderr, sinkOpts),
      tokenizeAll
    );
  }
  return runCalculator(source, consoleSink(io.stdout, io.stderr, sinkOpts));
}

/** Returns the process exit code: 0 ok, 1 a line failed, 2 bad usage. */
export async function main(
  argv: readonly string[],
  io: CliIO
): Promise<number> {
  const parsed = parseOptions(argv);
  if (!parsed.ok) {
    io.stderr.write(`${parsed.error}\n\n${USAGE}\n`);
    return 2;
  }
  const opts = parsed.value;

  switch (opts.mode.kind) {
    case "help":
      io.stdout.write(USAGE + "\n");
      return 0;

    case "expr": {
      const source = arrayLineSource([opts.mode.expr]);
      const summary = await runLines(source, opts, io);
      return summary.failed > 0 ? 1 : 0;
    }

    case "file": {
      const read = io.readTextFile ?? ((p: string) => readFile(p, "utf8"));
      const text = await read(opts.mode.path);
      const lines = text.split(/\r?\n/);
      const summary = await runLines(arrayLineSource(lines), opts, io);
      return summary.failed > 0 ? 1 : 0;
    }

    case "interactive": {
      const source = readlineLineSource(io.stdin, io.stdout, opts.prompt);
      try {
        await runLines(source, opts, io);
      } finally {
        source.close();
      }
      return 0;
    }
  }
}

// Running via: tsx src/cli.ts
const entry = process.argv[1]?.replace(/\\/g, "/");
if (entry && entry.endsWith("src/cli.ts")) {
  main(process.argv.slice(2), process)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 1;
    });
}
