import { join, resolve } from "node:path";
import type { BuildConfig } from "./types.ts";
import { readEnvFile } from "./env.ts";

export const DEFAULT_RECIPE_FILE = "slipway.yml";
export const DEFAULT_DOCKERFILE = "Dockerfile";

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return 0;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new Error(`invalid_build_timeout:${raw}`);
  return value;
}

/**
 * Load build configuration for a context directory.
 * The context's optional `.env` supplies defaults; the process environment wins over it.
 */
export async function loadBuildConfig(
  contextDir: string,
  env: Record<string, string | undefined> = process.env,
): Promise<BuildConfig> {
  const root = resolve(contextDir);
  const fileEnv = await readEnvFile(join(root, ".env"));
  const pick = (key: string): string | undefined => env[key] ?? fileEnv[key];

  return {
    dockerBin: pick("SLIPWAY_DOCKER_BIN") ?? "docker",
    contextDir: root,
    recipePath: resolve(root, pick("SLIPWAY_RECIPE") ?? DEFAULT_RECIPE_FILE),
    dockerfilePath: resolve(root, pick("SLIPWAY_DOCKERFILE") ?? DEFAULT_DOCKERFILE),
    buildTimeoutMs: parseTimeout(pick("SLIPWAY_BUILD_TIMEOUT_MS")),
  };
}
