import { parseArgs } from "node:util";

export function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      recipe: { type: "string" },
      tag: { type: "string", short: "t" },
      "no-cache": { type: "boolean" },
      "skip-preflight": { type: "boolean" },
      verify: { type: "boolean" },
      quiet: { type: "boolean", short: "q" },
      write: { type: "boolean", short: "w" },
      offline: { type: "boolean" },
      force: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
  });
}

export type ParsedCliArgs = ReturnType<typeof parseCliArgs>;
