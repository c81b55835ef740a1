import { loadBuildContext } from "@slipway/lib/context.ts";
import { parseManifest } from "@slipway/lib/image/manifest.ts";
import { verifyBuiltImage } from "@slipway/lib/image-verifier.ts";
import { green, log } from "@slipway/lib/ui.ts";
import { loadProject } from "../lib/project.ts";
import { printVerificationReport } from "../lib/report.ts";
import type { CommandEnv, VerifyOptions } from "../types.ts";

export async function verify(options: VerifyOptions, env: CommandEnv): Promise<void> {
  const { config, recipe } = await loadProject(options, env);
  const build = await loadBuildContext(config.contextDir, recipe);
  if (build.manifest === null) {
    throw new Error(`Dependency manifest ${recipe.manifest.source} not found in ${config.contextDir}.`);
  }

  const report = await verifyBuiltImage(options.tag, recipe, parseManifest(build.manifest), {
    bin: config.dockerBin,
    spawn: env.spawn,
  });
  printVerificationReport(report);
  if (!report.ok) throw new Error(`${options.tag} fails ${report.issues.length} check(s).`);
  log(`${green("✔")} ${options.tag} passes every image check.`);
}
