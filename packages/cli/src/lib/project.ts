import { basename, resolve } from "node:path";
import { loadBuildConfig } from "@slipway/lib/config.ts";
import { readRecipe, type ImageRecipe } from "@slipway/lib/image/recipe.ts";
import type { BuildConfig } from "@slipway/lib/types.ts";
import type { CommandEnv, ProjectOptions } from "../types.ts";

export type Project = {
  config: BuildConfig;
  recipe: ImageRecipe;
};

/** Config for the context directory, with `--recipe` applied over the environment. */
export async function loadProjectConfig(options: ProjectOptions, env: CommandEnv): Promise<BuildConfig> {
  const config = await loadBuildConfig(resolve(env.cwd, options.dir ?? "."), env.env);
  if (options.recipe === undefined) return config;
  return { ...config, recipePath: resolve(env.cwd, options.recipe) };
}

/** Load config and recipe. A context without a recipe file gets the defaults. */
export async function loadProject(options: ProjectOptions, env: CommandEnv): Promise<Project> {
  const config = await loadProjectConfig(options, env);
  return { config, recipe: readRecipe(config.recipePath) };
}

/** `<context directory name>:latest`, reduced to characters an image reference allows. */
export function defaultTag(config: BuildConfig): string {
  const name = basename(config.contextDir)
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, "");
  return `${name || "app"}:latest`;
}
