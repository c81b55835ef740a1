import { readFileSync } from "node:fs";
import { bold, dim, log } from "@slipway/lib/ui.ts";
import { build } from "./commands/build.ts";
import { init } from "./commands/init.ts";
import { plan } from "./commands/plan.ts";
import { preflight } from "./commands/preflight.ts";
import { render } from "./commands/render.ts";
import { simulate } from "./commands/simulate.ts";
import { verify } from "./commands/verify.ts";
import { parseCliArgs } from "./lib/args.ts";
import type { CommandEnv } from "./types.ts";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") return pkg.version;
  return "0.0.0";
}

export const VERSION = readVersion();

export function printHelp(): void {
  log(bold("slipway") + dim(` v${VERSION}`));
  log("");
  log(bold("Usage:"));
  log("  slipway <command> [dir] [options]");
  log("");
  log(bold("Commands:"));
  log("  init           Write the default recipe (slipway.yml) into a build context");
  log("  render         Print the Dockerfile the recipe produces");
  log("  plan           List the provisioning steps in order");
  log("  simulate       Provision a simulated image and check every invariant");
  log("  preflight      Check the build context and the container engine");
  log("  build          Render the Dockerfile and build the image");
  log("  verify <tag>   Check a built image against the recipe");
  log("  version        Print version");
  log("  help           Show this help");
  log("");
  log(bold("Options:"));
  log("  --recipe <path>        Recipe file (default: <dir>/slipway.yml)");
  log("  --force                init: overwrite an existing recipe");
  log("  -w, --write            render: write the Dockerfile instead of printing it");
  log("  --offline              simulate: run without network access");
  log("  -t, --tag <name>       build: image tag (default: <dir>:latest)");
  log("  --no-cache             build: ignore the layer cache");
  log("  --skip-preflight       build: do not run preflight checks first");
  log("  --verify               build: verify the image once it is built");
  log("  -q, --quiet            build: do not echo engine output");
  log("");
  log(bold("Environment:"));
  log("  SLIPWAY_DOCKER_BIN, SLIPWAY_RECIPE, SLIPWAY_DOCKERFILE, SLIPWAY_BUILD_TIMEOUT_MS");
  log("  (also read from <dir>/.env)");
}

/** Dispatch one command line. Errors propagate to the caller. */
export async function run(argv: string[], env: CommandEnv): Promise<void> {
  const { values, positionals } = parseCliArgs(argv);
  const [command, ...rest] = positionals;

  if (command === "version" || (command === undefined && values.version)) {
    log(`slipway v${VERSION}`);
    return;
  }
  if (command === undefined || command === "help" || values.help) {
    printHelp();
    return;
  }

  const project = { dir: rest[0], recipe: values.recipe };

  switch (command) {
    case "init":
      await init({ ...project, force: values.force }, env);
      break;

    case "render":
      await render({ ...project, write: values.write }, env);
      break;

    case "plan":
      await plan(project, env);
      break;

    case "simulate":
      await simulate({ ...project, offline: values.offline }, env);
      break;

    case "preflight":
      await preflight(project, env);
      break;

    case "build":
      await build(
        {
          ...project,
          tag: values.tag,
          noCache: values["no-cache"],
          skipPreflight: values["skip-preflight"],
          verify: values.verify,
          quiet: values.quiet,
        },
        env,
      );
      break;

    case "verify": {
      const [tag, dir] = rest;
      if (!tag) throw new Error("Missing image tag. Usage: slipway verify <tag> [dir]");
      await verify({ tag, dir, recipe: values.recipe }, env);
      break;
    }

    default:
      throw new Error(`Unknown command: ${command}. Run 'slipway help' for usage information.`);
  }
}
