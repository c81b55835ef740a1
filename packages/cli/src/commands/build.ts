import { buildImage, type BuildImageResult } from "@slipway/lib/docker-runner.ts";
import { createProvisionPlan } from "@slipway/lib/image/pipeline.ts";
import { green, log, spinner } from "@slipway/lib/ui.ts";
import { defaultTag, loadProject } from "../lib/project.ts";
import type { BuildOptions, CommandEnv } from "../types.ts";
import { ensurePreflight } from "./preflight.ts";
import { verify } from "./verify.ts";

export async function build(options: BuildOptions, env: CommandEnv): Promise<void> {
  const { config, recipe } = await loadProject(options, env);
  if (!options.skipPreflight) await ensurePreflight(config, recipe, env);

  const tag = options.tag ?? defaultTag(config);
  const progress = options.quiet ? spinner(`Building ${tag}`) : null;
  let result: BuildImageResult;
  try {
    result = await buildImage(createProvisionPlan(recipe), {
      config,
      tag,
      noCache: options.noCache,
      stream: options.quiet !== true,
      spawn: env.spawn,
    });
  } finally {
    progress?.stop();
  }
  if (!result.ok) {
    const where = result.failedStep === null ? "" : ` at ${result.failedStep}`;
    throw new Error(`Build of ${tag} failed${where} (${result.code}, exit code ${result.exitCode}).`);
  }
  log(`${green("✔")} Built ${tag}`);

  if (options.verify) await verify({ dir: options.dir, recipe: options.recipe, tag }, env);
}
