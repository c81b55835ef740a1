import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { renderDockerfile } from "@slipway/lib/image/dockerfile.ts";
import { createProvisionPlan } from "@slipway/lib/image/pipeline.ts";
import { info, log } from "@slipway/lib/ui.ts";
import { loadProject } from "../lib/project.ts";
import type { CommandEnv, RenderOptions } from "../types.ts";

export async function render(options: RenderOptions, env: CommandEnv): Promise<void> {
  const { config, recipe } = await loadProject(options, env);
  const dockerfile = renderDockerfile(createProvisionPlan(recipe));
  if (!options.write) {
    log(dockerfile.replace(/\n$/, ""));
    return;
  }
  mkdirSync(dirname(config.dockerfilePath), { recursive: true });
  writeFileSync(config.dockerfilePath, dockerfile, "utf8");
  info(`Wrote ${config.dockerfilePath}`);
}
