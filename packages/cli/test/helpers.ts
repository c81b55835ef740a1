import { chmodSync, mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

export const MANIFEST = "Django>=4.2,<5.0\npsycopg2>=2.9\n";

/** A build context with a manifest, an executable entrypoint and one application file. */
export function createSiteContext(): string {
  const dir = mkdtempSync(join(tmpdir(), "slipway-cli-"));
  writeFileSync(join(dir, "requirements.txt"), MANIFEST);
  mkdirSync(join(dir, "scripts"));
  writeFileSync(join(dir, "scripts", "run.sh"), "#!/bin/sh\nexec python manage.py runserver 0.0.0.0:8020\n");
  chmodSync(join(dir, "scripts", "run.sh"), 0o755);
  mkdirSync(join(dir, "app"));
  writeFileSync(join(dir, "app", "manage.py"), "print('ok')\n");
  return dir;
}

export type CapturedOutput = {
  stdout: string[];
  stderr: string[];
};

/** Collect console output; structured log lines land here too. */
export function captureConsole(): CapturedOutput {
  const output: CapturedOutput = { stdout: [], stderr: [] };
  const collect = (into: string[]) => (...args: unknown[]): void => {
    into.push(args.map(String).join(" "));
  };
  vi.spyOn(console, "log").mockImplementation(collect(output.stdout));
  vi.spyOn(console, "warn").mockImplementation(collect(output.stderr));
  vi.spyOn(console, "error").mockImplementation(collect(output.stderr));
  return output;
}

/** Lines that are not structured JSON log entries. */
export function humanLines(lines: readonly string[]): string[] {
  return lines.filter((line) => !line.startsWith("{\"ts\":"));
}
