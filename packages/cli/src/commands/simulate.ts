import { loadBuildContext } from "@slipway/lib/context.ts";
import { parseManifest } from "@slipway/lib/image/manifest.ts";
import { simulateBuild } from "@slipway/lib/image/pipeline.ts";
import { verifyImageState } from "@slipway/lib/image/verify.ts";
import { green, log } from "@slipway/lib/ui.ts";
import { loadProject } from "../lib/project.ts";
import { printVerificationReport } from "../lib/report.ts";
import type { CommandEnv, SimulateOptions } from "../types.ts";

/** Provision a simulated image from the build context and check it against every invariant. */
export async function simulate(options: SimulateOptions, env: CommandEnv): Promise<void> {
  const { config, recipe } = await loadProject(options, env);
  const build = await loadBuildContext(config.contextDir, recipe);
  const result = simulateBuild(recipe, build, { network: options.offline !== true });
  if (!result.ok) {
    throw new Error(`Simulation stopped at ${result.failedStep} (${result.code}): ${result.message}`);
  }

  const report = verifyImageState(result.state, recipe, parseManifest(build.manifest ?? ""));
  printVerificationReport(report);
  if (!report.ok) throw new Error(`Simulated image fails ${report.issues.length} check(s).`);

  const packages = result.state.runtime === null ? 0 : Object.keys(result.state.runtime.packages).length;
  log(`${green("✔")} ${result.completed.length} steps applied; ${packages} packages installed; runs as ${result.state.identity.user}.`);
}
