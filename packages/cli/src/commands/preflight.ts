import { runPreflightChecks } from "@slipway/lib/preflight.ts";
import type { ImageRecipe } from "@slipway/lib/image/recipe.ts";
import type { BuildConfig } from "@slipway/lib/types.ts";
import { info } from "@slipway/lib/ui.ts";
import { loadProject } from "../lib/project.ts";
import { printPreflightIssues } from "../lib/report.ts";
import type { CommandEnv, ProjectOptions } from "../types.ts";

/** Print preflight issues and throw when any of them is fatal. */
export async function ensurePreflight(config: BuildConfig, recipe: ImageRecipe, env: CommandEnv): Promise<void> {
  const result = await runPreflightChecks(config.contextDir, recipe, config.dockerBin, env.spawn);
  printPreflightIssues(result.issues);
  if (!result.ok) throw new Error("Preflight checks failed.");
}

export async function preflight(options: ProjectOptions, env: CommandEnv): Promise<void> {
  const { config, recipe } = await loadProject(options, env);
  await ensurePreflight(config, recipe, env);
  info("Preflight checks passed.");
}
