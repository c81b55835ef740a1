import { runDocker } from "./docker-runner.ts";
import {
  aptDependencyClosure,
  describePythonPackage,
  loadAptCatalog,
  loadPythonCatalog,
  packagesWithRole,
  type AptCatalog,
  type PythonCatalog,
} from "./image/catalog.ts";
import { SUPERUSER } from "./image/identity.ts";
import { normalizePackageName, resolveConstraints, type DependencyManifest } from "./image/manifest.ts";
import { NON_LOGIN_SHELLS, type ImageRecipe } from "./image/recipe.ts";
import { createReport, diffPackageSets, expectedRuntimePackages } from "./image/verify.ts";
import type { DockerRunResult, SpawnFn, VerificationCheck, VerificationIssue, VerificationReport } from "./types.ts";

export type ImageVerifierOptions = {
  bin: string;
  spawn?: SpawnFn;
  timeoutMs?: number;
  aptCatalog?: AptCatalog;
  pythonCatalog?: PythonCatalog;
};

type RunInImage = (command: string[], user?: string) => Promise<DockerRunResult>;

function issue(check: VerificationCheck, message: string, detail?: string): VerificationIssue {
  return detail === undefined ? { check, message } : { check, message, detail };
}

/** Parse `pip freeze` output into normalized name → version. */
export function parseFreezeOutput(output: string): Map<string, string> {
  const installed = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const match = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*(?:==|\s@\s)\s*(.+)$/.exec(line.trim());
    if (match) installed.set(normalizePackageName(match[1]), match[2].trim());
  }
  return installed;
}

async function checkIdentity(run: RunInImage, recipe: ImageRecipe): Promise<VerificationIssue[]> {
  const name = await run(["id", "-un"]);
  const uid = await run(["id", "-u"]);
  const user = name.stdout.trim();
  if (!name.ok || !uid.ok) return [issue("process_identity", "could not determine the default user", name.stderr.trim() || undefined)];
  if (user === SUPERUSER || uid.stdout.trim() === "0") return [issue("process_identity", "image runs as the superuser")];
  if (user !== recipe.serviceUser) return [issue("process_identity", `image runs as ${user}`, `expected ${recipe.serviceUser}`)];
  return [];
}

async function checkAccount(run: RunInImage, recipe: ImageRecipe): Promise<VerificationIssue[]> {
  const passwd = await run(["getent", "passwd", recipe.serviceUser]);
  if (!passwd.ok) return [issue("service_account", `account ${recipe.serviceUser} does not exist`)];
  const issues: VerificationIssue[] = [];
  const fields = passwd.stdout.trim().split(":");
  if (fields[2] === "0") issues.push(issue("service_account", `${recipe.serviceUser} has uid 0`));
  if (!NON_LOGIN_SHELLS.has(fields[6] ?? "")) {
    issues.push(issue("service_account", `${recipe.serviceUser} has an interactive shell`, fields[6]));
  }
  const shadow = await run(["getent", "shadow", recipe.serviceUser], SUPERUSER);
  const hash = shadow.stdout.trim().split(":")[1] ?? "";
  if (!shadow.ok || !(hash.startsWith("!") || hash.startsWith("*"))) {
    issues.push(issue("service_account", `${recipe.serviceUser} can log in with a password`));
  }
  return issues;
}

async function checkPackages(
  run: RunInImage,
  recipe: ImageRecipe,
  manifest: DependencyManifest,
  catalogs: { apt: AptCatalog; python: PythonCatalog },
): Promise<VerificationIssue[]> {
  const issues: VerificationIssue[] = [];

  const compiler = await run(["gcc", "--version"]);
  if (compiler.ok) issues.push(issue("toolchain_absent", "a C compiler is still installed", compiler.stdout.split("\n")[0]));

  const installedClosure = aptDependencyClosure(catalogs.apt, recipe.systemPackages);
  for (const headers of packagesWithRole(catalogs.apt, installedClosure, ["db-headers"])) {
    const status = await run(["dpkg", "-s", headers]);
    if (status.ok) issues.push(issue("db_headers_absent", `${headers} is still installed`));
  }

  const freeze = await run([`${recipe.runtime.prefix}/bin/pip`, "freeze"]);
  if (!freeze.ok) {
    issues.push(issue("runtime_packages_match", "could not list installed packages", freeze.stderr.trim() || undefined));
    return issues;
  }
  const installed = parseFreezeOutput(freeze.stdout);
  const expected = expectedRuntimePackages(manifest, catalogs.python);
  const tooling = new Set(["pip", ...recipe.runtime.tooling].map(normalizePackageName));
  const actual = [...installed.keys()].filter((name) => !tooling.has(name));
  const diff = diffPackageSets(expected, actual);
  if (diff !== null) issues.push(issue("runtime_packages_match", "installed packages differ from the manifest", diff));
  for (const requirement of resolveConstraints(manifest)) {
    const version = installed.get(requirement.name);
    if (requirement.pinned !== undefined && version !== undefined && version !== requirement.pinned) {
      issues.push(issue("runtime_packages_match", `${requirement.name} ${version} is installed`, `expected ${requirement.pinned}`));
    }
  }

  const libraries = new Set(expected.flatMap((name) => describePythonPackage(catalogs.python, name).runtime));
  for (const library of libraries) {
    const status = await run(["dpkg", "-s", library]);
    if (!status.ok) issues.push(issue("runtime_libraries_present", `${library} is not installed`));
  }
  return issues;
}

async function checkFilesystem(run: RunInImage, recipe: ImageRecipe): Promise<VerificationIssue[]> {
  const issues: VerificationIssue[] = [];

  const root = await run(["stat", "-c", "%a %U", recipe.volumes.root]);
  if (!root.ok) {
    issues.push(issue("volume_mode", `${recipe.volumes.root} does not exist`));
  } else {
    const [mode, owner] = root.stdout.trim().split(/\s+/);
    if (mode !== recipe.volumes.mode) {
      issues.push(issue("volume_mode", `${recipe.volumes.root} has mode ${mode}`, `expected ${recipe.volumes.mode}`));
    }
    if (owner !== recipe.serviceUser) issues.push(issue("volume_mode", `${recipe.volumes.root} is owned by ${owner}`));
  }

  const paths = [...recipe.volumes.directories, recipe.scripts.target, recipe.app.target];
  // stat prints nothing for a missing path, so owners are keyed by name
  const owners = await run(["stat", "-c", "%n %U", ...paths]);
  const ownerOf = new Map<string, string>();
  for (const line of owners.stdout.split(/\r?\n/)) {
    const separator = line.trimEnd().lastIndexOf(" ");
    if (separator > 0) ownerOf.set(line.slice(0, separator), line.slice(separator + 1).trim());
  }
  paths.forEach((path) => {
    const owner = ownerOf.get(path);
    if (!owner) {
      issues.push(issue("path_ownership", `${path} does not exist`));
    } else if (owner !== recipe.serviceUser) {
      issues.push(issue("path_ownership", `${path} is not owned by ${recipe.serviceUser}`, owner));
    }
  });
  return issues;
}

async function checkCaches(run: RunInImage, recipe: ImageRecipe): Promise<VerificationIssue[]> {
  const issues: VerificationIssue[] = [];
  const lists = await run(["find", "/var/lib/apt/lists", "-mindepth", "1", "-print", "-quit"]);
  if (lists.stdout.trim() !== "") issues.push(issue("installer_cache_absent", "package index lists remain in the image"));

  const staged = await run(["test", "-e", recipe.manifest.stagedPath]);
  if (staged.ok) issues.push(issue("installer_cache_absent", `${recipe.manifest.stagedPath} remains in the image`));

  const cache = await run(["test", "-d", "/root/.cache/pip"], SUPERUSER);
  if (cache.ok) issues.push(issue("installer_cache_absent", "package download cache remains in the image"));
  return issues;
}

/**
 * Check a built image against the same invariants the simulation verifies,
 * by running one-shot commands in throwaway containers.
 */
export async function verifyBuiltImage(
  tag: string,
  recipe: ImageRecipe,
  manifest: DependencyManifest,
  options: ImageVerifierOptions,
): Promise<VerificationReport> {
  const catalogs = {
    apt: options.aptCatalog ?? loadAptCatalog(),
    python: options.pythonCatalog ?? loadPythonCatalog(),
  };
  const run: RunInImage = (command, user) =>
    runDocker(["run", "--rm", ...(user ? ["--user", user] : []), tag, ...command], {
      bin: options.bin,
      spawn: options.spawn,
      timeoutMs: options.timeoutMs,
    });

  const issues: VerificationIssue[] = [];
  issues.push(...(await checkIdentity(run, recipe)));
  issues.push(...(await checkAccount(run, recipe)));
  issues.push(...(await checkPackages(run, recipe, manifest, catalogs)));
  issues.push(...(await checkFilesystem(run, recipe)));
  issues.push(...(await checkCaches(run, recipe)));
  return createReport(issues);
}
