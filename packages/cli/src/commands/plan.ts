import { createProvisionPlan } from "@slipway/lib/image/pipeline.ts";
import { bold, dim, log } from "@slipway/lib/ui.ts";
import { loadProject } from "../lib/project.ts";
import type { CommandEnv, ProjectOptions } from "../types.ts";

export async function plan(options: ProjectOptions, env: CommandEnv): Promise<void> {
  const { recipe } = await loadProject(options, env);
  const { steps } = createProvisionPlan(recipe);
  const idWidth = Math.max(...steps.map((step) => step.id.length));

  log(bold(`Provisioning plan for ${recipe.baseImage}`));
  steps.forEach((step, index) => {
    const flags = [step.privileged ? "root" : "", step.network ? "net" : ""].filter((flag) => flag !== "").join(",");
    const number = String(index + 1).padStart(2);
    log(`${number}. ${step.id.padEnd(idWidth)}  ${step.phase.padEnd(12)}  ${flags.padEnd(8)}  ${dim(step.describe)}`);
  });
  log("");
  log(dim("root: needs superuser rights   net: needs network access"));
}
