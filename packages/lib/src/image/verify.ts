import type { VerificationCheck, VerificationIssue, VerificationReport } from "../types.ts";
import {
  describePythonPackage,
  loadAptCatalog,
  loadPythonCatalog,
  packagesWithRole,
  resolvePackageClosure,
  type AptCatalog,
  type PythonCatalog,
} from "./catalog.ts";
import { SUPERUSER } from "./identity.ts";
import { formatMode, parseMode, subtreePaths, type ImageState } from "./image-state.ts";
import { resolveConstraints, type DependencyManifest } from "./manifest.ts";
import { NON_LOGIN_SHELLS, type ImageRecipe } from "./recipe.ts";

export type VerifyCatalogs = {
  apt: AptCatalog;
  python: PythonCatalog;
};

/** Language packages the image must contain: the manifest's entries plus what they pull in. */
export function expectedRuntimePackages(manifest: DependencyManifest, catalog: PythonCatalog): string[] {
  return resolvePackageClosure(
    catalog,
    resolveConstraints(manifest).map((requirement) => requirement.name),
  );
}

export function createReport(issues: VerificationIssue[]): VerificationReport {
  return { ok: issues.length === 0, issues };
}

function issue(check: VerificationCheck, message: string, detail?: string): VerificationIssue {
  return detail === undefined ? { check, message } : { check, message, detail };
}

/** Compare two package sets; returns a detail string or null when they match. */
export function diffPackageSets(expected: readonly string[], actual: readonly string[]): string | null {
  const missing = expected.filter((name) => !actual.includes(name));
  const extra = actual.filter((name) => !expected.includes(name));
  if (missing.length === 0 && extra.length === 0) return null;
  const parts: string[] = [];
  if (missing.length > 0) parts.push(`missing: ${missing.join(", ")}`);
  if (extra.length > 0) parts.push(`unexpected: ${extra.join(", ")}`);
  return parts.join("; ");
}

function checkPackages(state: ImageState, manifest: DependencyManifest, catalogs: VerifyCatalogs): VerificationIssue[] {
  const issues: VerificationIssue[] = [];
  const installed = Object.keys(state.systemPackages);

  const toolchain = packagesWithRole(catalogs.apt, installed, ["toolchain"]);
  if (toolchain.length > 0) issues.push(issue("toolchain_absent", "build toolchain is still installed", toolchain.join(", ")));

  const headers = packagesWithRole(catalogs.apt, installed, ["db-headers"]);
  if (headers.length > 0) issues.push(issue("db_headers_absent", "database client headers are still installed", headers.join(", ")));

  if (state.runtime === null) {
    issues.push(issue("runtime_packages_match", "runtime environment does not exist"));
    return issues;
  }

  const actual = Object.keys(state.runtime.packages);
  const diff = diffPackageSets(expectedRuntimePackages(manifest, catalogs.python), actual);
  if (diff !== null) issues.push(issue("runtime_packages_match", "installed packages differ from the manifest", diff));

  for (const pkg of actual) {
    const missing = describePythonPackage(catalogs.python, pkg).runtime.filter((lib) => state.systemPackages[lib] === undefined);
    if (missing.length > 0) {
      issues.push(issue("runtime_libraries_present", `${pkg} is missing shared libraries`, missing.join(", ")));
    }
  }
  return issues;
}

function checkAccount(state: ImageState, recipe: ImageRecipe): VerificationIssue[] {
  const account = state.accounts[recipe.serviceUser];
  if (account === undefined) return [issue("service_account", `account ${recipe.serviceUser} does not exist`)];
  const issues: VerificationIssue[] = [];
  if (account.uid === 0) issues.push(issue("service_account", `${recipe.serviceUser} has uid 0`));
  if (!account.passwordDisabled) issues.push(issue("service_account", `${recipe.serviceUser} can log in with a password`));
  if (!NON_LOGIN_SHELLS.has(account.shell)) {
    issues.push(issue("service_account", `${recipe.serviceUser} has an interactive shell`, account.shell));
  }
  return issues;
}

function checkFilesystem(state: ImageState, recipe: ImageRecipe): VerificationIssue[] {
  const issues: VerificationIssue[] = [];
  const roots = [recipe.volumes.root, ...recipe.volumes.directories, recipe.scripts.target, recipe.app.target];
  const reported = new Set<string>();

  for (const root of roots) {
    const paths = subtreePaths(state, root);
    if (paths.length === 0) {
      issues.push(issue("path_ownership", `${root} does not exist`));
      continue;
    }
    const foreign = paths.find((path) => state.entries[path].owner !== recipe.serviceUser);
    if (foreign !== undefined && !reported.has(foreign)) {
      reported.add(foreign);
      issues.push(issue("path_ownership", `${foreign} is not owned by ${recipe.serviceUser}`, state.entries[foreign].owner));
    }
  }

  const volumeRoot = state.entries[recipe.volumes.root];
  const expectedMode = parseMode(recipe.volumes.mode);
  if (volumeRoot !== undefined && volumeRoot.mode !== expectedMode) {
    issues.push(issue("volume_mode", `${recipe.volumes.root} has mode ${formatMode(volumeRoot.mode)}`, `expected ${recipe.volumes.mode}`));
  }
  if (volumeRoot !== undefined && volumeRoot.owner !== recipe.serviceUser) {
    issues.push(issue("volume_mode", `${recipe.volumes.root} is owned by ${volumeRoot.owner}`));
  }
  return issues;
}

function checkCaches(state: ImageState, recipe: ImageRecipe): VerificationIssue[] {
  const issues: VerificationIssue[] = [];
  if (state.aptLists || subtreePaths(state, "/var/lib/apt/lists").length > 1) {
    issues.push(issue("installer_cache_absent", "package index lists remain in the image"));
  }
  if (state.pipCache) issues.push(issue("installer_cache_absent", "package download cache remains in the image"));
  if (state.entries[recipe.manifest.stagedPath] !== undefined) {
    issues.push(issue("installer_cache_absent", `${recipe.manifest.stagedPath} remains in the image`));
  }
  return issues;
}

function checkIdentity(state: ImageState, recipe: ImageRecipe): VerificationIssue[] {
  const { identity } = state;
  if (identity.phase !== "running") {
    return [issue("process_identity", `image never handed off to the entrypoint (${identity.phase})`)];
  }
  if (identity.user === SUPERUSER || identity.user !== recipe.serviceUser || state.config.user !== recipe.serviceUser) {
    return [issue("process_identity", `entrypoint runs as ${identity.user}`, `expected ${recipe.serviceUser}`)];
  }
  return [];
}

/** Check a simulated image against every least-privilege and leanness invariant. */
export function verifyImageState(
  state: ImageState,
  recipe: ImageRecipe,
  manifest: DependencyManifest,
  catalogs: VerifyCatalogs = { apt: loadAptCatalog(), python: loadPythonCatalog() },
): VerificationReport {
  return createReport([
    ...checkPackages(state, manifest, catalogs),
    ...checkAccount(state, recipe),
    ...checkFilesystem(state, recipe),
    ...checkCaches(state, recipe),
    ...checkIdentity(state, recipe),
  ]);
}
