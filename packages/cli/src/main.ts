#!/usr/bin/env tsx
import { error } from "@slipway/lib/ui.ts";
import { run } from "./cli.ts";

async function main(): Promise<void> {
  try {
    await run(process.argv.slice(2), { cwd: process.cwd(), env: process.env });
  } catch (err) {
    if (err instanceof Error) {
      error(err.message);
    } else {
      error(String(err));
    }
    process.exit(1);
  }
}

await main();
