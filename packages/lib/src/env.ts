import { readFile } from "node:fs/promises";

/** Parse `KEY=value` lines, skipping blanks and `#` comments. Split on the first `=` only. */
export function parseEnvContent(content: string): Record<string, string> {
  const env: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;

    const key = trimmed.substring(0, eqIndex).trim();
    let value = trimmed.substring(eqIndex + 1).trim();
    if (value.length >= 2 && (value[0] === "\"" || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    env[key] = value;
  }

  return env;
}

export async function readEnvFile(path: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }
  return parseEnvContent(content);
}
