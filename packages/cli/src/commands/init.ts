import { existsSync } from "node:fs";
import { createDefaultRecipe, writeRecipe } from "@slipway/lib/image/recipe.ts";
import { confirm, info } from "@slipway/lib/ui.ts";
import { loadProjectConfig } from "../lib/project.ts";
import type { CommandEnv, InitOptions } from "../types.ts";

async function mayOverwrite(path: string, force: boolean): Promise<boolean> {
  if (!existsSync(path) || force) return true;
  return process.stdin.isTTY === true && (await confirm(`Overwrite ${path}?`));
}

export async function init(options: InitOptions, env: CommandEnv): Promise<void> {
  const config = await loadProjectConfig(options, env);
  if (!(await mayOverwrite(config.recipePath, options.force === true))) {
    throw new Error(`Recipe already exists at ${config.recipePath}. Use --force to overwrite it.`);
  }
  writeRecipe(config.recipePath, createDefaultRecipe());
  info(`Wrote ${config.recipePath}`);
}
