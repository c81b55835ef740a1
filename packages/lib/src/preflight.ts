import { join } from "node:path";
import { loadBuildContext } from "./context.ts";
import { runDocker } from "./docker-runner.ts";
import { parseManifest, resolveConstraints } from "./image/manifest.ts";
import type { ImageRecipe } from "./image/recipe.ts";
import type { PreflightIssue, PreflightResult, SpawnFn } from "./types.ts";

function toResult(issues: PreflightIssue[]): PreflightResult {
  return { ok: !issues.some((i) => i.severity === "fatal"), issues };
}

function manifestIssue(err: unknown, path: string): PreflightIssue {
  const message = err instanceof Error ? err.message : String(err);
  const [code, detail] = message.split(":");
  if (code === "manifest_malformed") {
    const line = Number(detail);
    return {
      code: "manifest_malformed",
      severity: "fatal",
      message: `Dependency manifest line ${line} is not a valid requirement.`,
      detail: "Each line must be a package name with optional version constraints; installer options are not allowed.",
      meta: { path, line },
    };
  }
  if (code === "unresolvable_constraint") {
    return {
      code: "unresolvable_constraint",
      severity: "fatal",
      message: `No version of ${detail} satisfies every constraint in the manifest.`,
      meta: { path },
    };
  }
  return {
    code: "manifest_malformed",
    severity: "fatal",
    message: `Dependency manifest could not be read: ${message}`,
    meta: { path },
  };
}

/**
 * Check that the build context holds everything the recipe copies into the image.
 * Catches the failures `docker build` would otherwise report minutes in.
 */
export async function checkBuildContext(contextDir: string, recipe: ImageRecipe): Promise<PreflightResult> {
  const context = await loadBuildContext(contextDir, recipe);
  const issues: PreflightIssue[] = [];
  const manifestPath = join(contextDir, recipe.manifest.source);

  if (context.manifest === null) {
    issues.push({
      code: "manifest_missing",
      severity: "fatal",
      message: `Dependency manifest ${recipe.manifest.source} not found in the build context.`,
      meta: { path: manifestPath },
    });
  } else {
    try {
      resolveConstraints(parseManifest(context.manifest));
    } catch (err) {
      issues.push(manifestIssue(err, manifestPath));
    }
  }

  if (context.app === null) {
    issues.push({
      code: "app_missing",
      severity: "fatal",
      message: `Application directory ${recipe.app.source} not found in the build context.`,
      meta: { path: join(contextDir, recipe.app.source) },
    });
  }

  if (context.scripts === null) {
    issues.push({
      code: "scripts_missing",
      severity: "fatal",
      message: `Scripts directory ${recipe.scripts.source} not found in the build context.`,
      meta: { path: join(contextDir, recipe.scripts.source) },
    });
    return toResult(issues);
  }

  const entrypointPath = join(contextDir, recipe.scripts.source, recipe.entrypoint);
  const entrypoint = context.scripts.find((file) => file.path === recipe.entrypoint);
  if (!entrypoint) {
    issues.push({
      code: "entrypoint_missing",
      severity: "warning",
      message: `Entrypoint ${recipe.entrypoint} is not in ${recipe.scripts.source}.`,
      detail: `The container will only start if ${recipe.entrypoint} is on the search path of the base image.`,
      meta: { path: entrypointPath },
    });
  } else if (!entrypoint.executable) {
    issues.push({
      code: "entrypoint_not_executable",
      severity: "warning",
      message: `Entrypoint ${recipe.entrypoint} is not executable in the build context.`,
      detail: "The image marks every script executable, but the file should be committed with its executable bit set.",
      meta: { path: entrypointPath },
    });
  }

  return toResult(issues);
}

/**
 * Check if the Docker daemon is actually running.
 * Returns a typed issue if the daemon is unreachable.
 */
export async function checkDaemonRunning(bin: string, spawn?: SpawnFn): Promise<PreflightIssue | null> {
  const result = await runDocker(["info"], { bin, spawn, timeoutMs: 10_000 });
  if (result.ok) return null;
  if (result.code === "daemon_unreachable") {
    return {
      code: "daemon_unavailable",
      severity: "fatal",
      message: "Docker is installed but the daemon is not running.",
      detail:
        process.platform === "darwin"
          ? "Open Docker Desktop and wait for it to start, then rerun."
          : "Start the Docker service:\n  sudo systemctl start docker",
      meta: { command: `${bin} info` },
    };
  }
  return {
    code: "daemon_check_failed",
    severity: "fatal",
    message: `Could not verify that the ${bin} daemon is running.`,
    detail: result.stderr.trim() || undefined,
    meta: { command: `${bin} info` },
  };
}

/**
 * Run all preflight checks and return a structured result with typed issues.
 */
export async function runPreflightChecks(
  contextDir: string,
  recipe: ImageRecipe,
  bin: string,
  spawn?: SpawnFn,
): Promise<PreflightResult> {
  const [context, daemon] = await Promise.all([
    checkBuildContext(contextDir, recipe),
    checkDaemonRunning(bin, spawn),
  ]);
  const issues = daemon === null ? context.issues : [...context.issues, daemon];
  return toResult(issues);
}
