import type { BuildContext } from "../types.ts";
import {
  aptDependencyClosure,
  describePythonPackage,
  isKnownAptPackage,
  resolvePackageClosure,
  type AptCatalog,
  type PythonCatalog,
} from "./catalog.ts";
import { dropPrivileges, handOff, requirePrivilege } from "./identity.ts";
import {
  addExecutableBits,
  chmodTree,
  chownTree,
  cloneState,
  makeDirectories,
  parseMode,
  placeFile,
  removeChildren,
  type ImageState,
  type InstalledPythonPackage,
  type MutationResult,
} from "./image-state.ts";
import { parseManifest, resolveConstraints, type ResolvedRequirement } from "./manifest.ts";
import { runtimeEnvironment, type ImageRecipe } from "./recipe.ts";

export type StepId =
  | "configure_environment"
  | "stage_build_inputs"
  | "configure_service"
  | "create_runtime_environment"
  | "upgrade_package_tooling"
  | "install_system_libraries"
  | "install_manifest_packages"
  | "purge_toolchain"
  | "clean_build_caches"
  | "create_service_identity"
  | "create_volume_directories"
  | "assign_ownership"
  | "set_volume_permissions"
  | "mark_scripts_executable"
  | "drop_privileges"
  | "hand_off";

export type StepPhase = "provisioning" | "bootstrap";

/** One shell command inside a strict-mode RUN layer. */
export type ShellCommand = {
  words: string[];
  /** Arguments rendered one per continuation line after the words. */
  list?: string[];
  /** Comment line rendered above the command. */
  comment?: string;
};

export type Instruction =
  | { kind: "ENV"; key: string; value: string }
  | { kind: "COPY"; source: string; target: string }
  | { kind: "WORKDIR"; path: string }
  | { kind: "EXPOSE"; port: number }
  | { kind: "RUN"; commands: ShellCommand[]; separated: boolean }
  | { kind: "USER"; user: string }
  | { kind: "CMD"; argv: string[] };

export type StepContext = {
  recipe: ImageRecipe;
  build: BuildContext;
  aptCatalog: AptCatalog;
  pythonCatalog: PythonCatalog;
  /** Whether package indexes and registries are reachable. */
  network: boolean;
};

export type StepFailure = { ok: false; code: string; message: string };

export type StepResult = { ok: true; state: ImageState } | StepFailure;

export interface ProvisionStep {
  id: StepId;
  phase: StepPhase;
  /** Needs superuser rights; refused once privileges are dropped. */
  privileged: boolean;
  /** Talks to a package index or registry. */
  network: boolean;
  describe: string;
  instructions(recipe: ImageRecipe): Instruction[];
  apply(state: ImageState, ctx: StepContext): StepResult;
}

function fail(code: string, message: string): StepFailure {
  return { ok: false, code, message };
}

/** Errors thrown by parsers carry `code` or `code:detail` as their message. */
export function failureFromError(err: unknown): StepFailure {
  const message = err instanceof Error ? err.message : String(err);
  const separator = message.indexOf(":");
  return fail(separator === -1 ? message : message.slice(0, separator), message);
}

function run(commands: ShellCommand[], separated = false): Instruction {
  return { kind: "RUN", commands, separated };
}

function pipBin(recipe: ImageRecipe): string {
  return `${recipe.runtime.prefix}/bin/pip`;
}

/** pip keeps downloads under the invoking user's home unless told not to. */
export function leavesPipCache(command: ShellCommand): boolean {
  const [bin, subcommand] = command.words;
  return bin !== undefined && /(^|\/)pip3?$/.test(bin) && subcommand === "install" && !command.words.includes("--no-cache-dir");
}

function stepLeavesPipCache(step: ProvisionStep, recipe: ImageRecipe): boolean {
  return step.instructions(recipe).some((instruction) => instruction.kind === "RUN" && instruction.commands.some(leavesPipCache));
}

function firstFailure(results: MutationResult[]): MutationResult {
  return results.find((result) => !result.ok) ?? { ok: true };
}

function expandPath(value: string, currentPath: string): string {
  return value.replace(/\$\{PATH\}|\$PATH/g, currentPath);
}

export const configureEnvironment: ProvisionStep = {
  id: "configure_environment",
  phase: "provisioning",
  privileged: false,
  network: false,
  describe: "Set the unbuffered-output flag and put scripts and the runtime first on the search path",
  instructions: (recipe) => runtimeEnvironment(recipe).map(([key, value]): Instruction => ({ kind: "ENV", key, value })),
  apply(state, { recipe }) {
    const draft = cloneState(state);
    for (const [key, value] of runtimeEnvironment(recipe)) {
      draft.config.env[key] = expandPath(value, draft.config.env.PATH ?? "");
    }
    return { ok: true, state: draft };
  },
};

export const stageBuildInputs: ProvisionStep = {
  id: "stage_build_inputs",
  phase: "provisioning",
  privileged: false,
  network: false,
  describe: "Copy the dependency manifest, scripts and application into the image",
  instructions: (recipe) => [
    { kind: "COPY", source: recipe.manifest.source, target: recipe.manifest.stagedPath },
    { kind: "COPY", source: recipe.scripts.source, target: recipe.scripts.target },
    { kind: "COPY", source: recipe.app.source, target: recipe.app.target },
  ],
  apply(state, { recipe, build }) {
    if (build.manifest === null) return fail("manifest_missing", `${recipe.manifest.source} not found in build context`);
    if (build.scripts === null) return fail("scripts_missing", `${recipe.scripts.source} not found in build context`);
    if (build.app === null) return fail("app_missing", `${recipe.app.source} not found in build context`);

    const draft = cloneState(state);
    const copies: MutationResult[] = [placeFile(draft, recipe.manifest.stagedPath, false)];
    for (const [target, files] of [[recipe.scripts.target, build.scripts], [recipe.app.target, build.app]] as const) {
      copies.push(makeDirectories(draft, [target]));
      for (const file of files) copies.push(placeFile(draft, `${target}/${file.path}`, file.executable));
    }
    const failure = firstFailure(copies);
    if (!failure.ok) return failure;
    return { ok: true, state: draft };
  },
};

export const configureService: ProvisionStep = {
  id: "configure_service",
  phase: "provisioning",
  privileged: false,
  network: false,
  describe: "Use the application directory as working directory and declare the service port",
  instructions: (recipe) => [
    { kind: "WORKDIR", path: recipe.app.target },
    { kind: "EXPOSE", port: recipe.port },
  ],
  apply(state, { recipe }) {
    const draft = cloneState(state);
    const created = makeDirectories(draft, [recipe.app.target]);
    if (!created.ok) return created;
    draft.config.workdir = recipe.app.target;
    if (!draft.config.ports.includes(recipe.port)) draft.config.ports.push(recipe.port);
    return { ok: true, state: draft };
  },
};

export const createRuntimeEnvironment: ProvisionStep = {
  id: "create_runtime_environment",
  phase: "provisioning",
  privileged: true,
  network: false,
  describe: "Create the isolated runtime environment",
  instructions: (recipe) => [run([{ words: [recipe.runtime.interpreter, "-m", "venv", recipe.runtime.prefix] }])],
  apply(state, { recipe }) {
    const { interpreter, prefix } = recipe.runtime;
    if (state.entries[`/usr/local/bin/${interpreter}`] === undefined) {
      return fail("interpreter_missing", `${interpreter} is not installed in the base image`);
    }
    const draft = cloneState(state);
    const failure = firstFailure([
      makeDirectories(draft, [`${prefix}/bin`, `${prefix}/lib`]),
      placeFile(draft, `${prefix}/bin/${interpreter}`, true),
      placeFile(draft, `${prefix}/bin/pip`, true),
    ]);
    if (!failure.ok) return failure;
    draft.runtime = { prefix, interpreter, tooling: ["pip"], packages: {} };
    return { ok: true, state: draft };
  },
};

export const upgradePackageTooling: ProvisionStep = {
  id: "upgrade_package_tooling",
  phase: "provisioning",
  privileged: true,
  network: true,
  describe: "Upgrade the runtime's package tooling",
  instructions: (recipe) => [
    run([{ words: [pipBin(recipe), "install", "--upgrade", "--no-cache-dir", ...recipe.runtime.tooling] }]),
  ],
  apply(state, { recipe }) {
    if (state.runtime === null) return fail("runtime_missing", "runtime environment has not been created");
    const draft = cloneState(state);
    if (stepLeavesPipCache(upgradePackageTooling, recipe)) draft.pipCache = true;
    const tooling = [...state.runtime.tooling];
    for (const tool of recipe.runtime.tooling) {
      if (!tooling.includes(tool)) tooling.push(tool);
    }
    draft.runtime = { ...state.runtime, tooling };
    return { ok: true, state: draft };
  },
};

export const installSystemLibraries: ProvisionStep = {
  id: "install_system_libraries",
  phase: "provisioning",
  privileged: true,
  network: true,
  describe: "Install system shared libraries and build toolchains without recommended extras",
  instructions: (recipe) =>
    recipe.systemPackages.length === 0
      ? []
      : [
          run(
            [
              { words: ["apt-get", "update"] },
              { words: ["apt-get", "install", "-y", "--no-install-recommends"], list: recipe.systemPackages },
            ],
            true,
          ),
        ],
  apply(state, { recipe, aptCatalog }) {
    const unknown = recipe.systemPackages.find((name) => !isKnownAptPackage(aptCatalog, name));
    if (unknown !== undefined) return fail("apt_package_unavailable", `Unable to locate package ${unknown}`);

    const draft = cloneState(state);
    draft.aptLists = true;
    for (const name of recipe.systemPackages) draft.systemPackages[name] = { manual: true };
    for (const name of aptDependencyClosure(aptCatalog, recipe.systemPackages)) {
      draft.systemPackages[name] ??= { manual: false };
    }
    return { ok: true, state: draft };
  },
};

export const installManifestPackages: ProvisionStep = {
  id: "install_manifest_packages",
  phase: "provisioning",
  privileged: true,
  network: true,
  describe: "Install the manifest's packages into the runtime without keeping a download cache",
  instructions: (recipe) => [
    run([{ words: [pipBin(recipe), "install", "--no-cache-dir", "-r", recipe.manifest.stagedPath] }], true),
  ],
  apply(state, { recipe, build, pythonCatalog }) {
    if (state.runtime === null) return fail("runtime_missing", "runtime environment has not been created");
    if (build.manifest === null || state.entries[recipe.manifest.stagedPath] === undefined) {
      return fail("manifest_missing", `${recipe.manifest.stagedPath} is not in the image`);
    }

    let resolved: ResolvedRequirement[];
    try {
      resolved = resolveConstraints(parseManifest(build.manifest));
    } catch (err) {
      return failureFromError(err);
    }

    const names = resolved.map((requirement) => requirement.name);
    const closure = resolvePackageClosure(pythonCatalog, names);
    for (const name of closure) {
      const missing = describePythonPackage(pythonCatalog, name).build.find((lib) => state.systemPackages[lib] === undefined);
      if (missing !== undefined) {
        return fail("native_library_missing", `${name} needs ${missing} to build`);
      }
    }

    const packages: Record<string, InstalledPythonPackage> = { ...state.runtime.packages };
    for (const name of closure) packages[name] = {};
    for (const requirement of resolved) {
      if (requirement.pinned !== undefined) packages[requirement.name] = { version: requirement.pinned };
    }
    const draft = cloneState(state);
    draft.runtime = { ...state.runtime, packages };
    if (stepLeavesPipCache(installManifestPackages, recipe)) draft.pipCache = true;
    return { ok: true, state: draft };
  },
};

/** Installed packages reachable from a manually installed one through installed dependencies. */
function reachableFromManual(state: ImageState, catalog: AptCatalog): Set<string> {
  const installed = state.systemPackages;
  const roots = Object.keys(installed).filter((name) => installed[name].manual);
  return new Set(aptDependencyClosure(catalog, roots).filter((name) => installed[name] !== undefined));
}

/** Installed packages that depend, directly or transitively, on one being removed. */
function dependentsOf(state: ImageState, catalog: AptCatalog, removed: Set<string>): Set<string> {
  const result = new Set(removed);
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of Object.keys(state.systemPackages)) {
      if (result.has(name)) continue;
      if ((catalog.packages[name]?.depends ?? []).some((dep) => result.has(dep))) {
        result.add(name);
        changed = true;
      }
    }
  }
  return result;
}

export const purgeToolchain: ProvisionStep = {
  id: "purge_toolchain",
  phase: "provisioning",
  privileged: true,
  network: false,
  describe: "Purge build-only toolchains and their orphaned dependencies, keeping runtime libraries",
  instructions: (recipe) =>
    recipe.purgePackages.length === 0
      ? []
      : [
          run(
            [
              {
                comment: "remove build toolchain (runtime libs remain)",
                words: ["apt-get", "purge", "-y", "--auto-remove", ...recipe.purgePackages],
              },
            ],
            true,
          ),
        ],
  apply(state, { recipe, aptCatalog, pythonCatalog }) {
    const draft = cloneState(state);
    const named = new Set(recipe.purgePackages.filter((name) => draft.systemPackages[name] !== undefined));
    for (const name of dependentsOf(draft, aptCatalog, named)) delete draft.systemPackages[name];

    const keep = reachableFromManual(draft, aptCatalog);
    for (const name of Object.keys(draft.systemPackages)) {
      if (!keep.has(name)) delete draft.systemPackages[name];
    }

    for (const pkg of Object.keys(draft.runtime?.packages ?? {})) {
      const lost = describePythonPackage(pythonCatalog, pkg).runtime.find((lib) => draft.systemPackages[lib] === undefined);
      if (lost !== undefined) {
        return fail("runtime_library_purged", `${lost} was removed but ${pkg} loads it at run time`);
      }
    }
    return { ok: true, state: draft };
  },
};

export const cleanBuildCaches: ProvisionStep = {
  id: "clean_build_caches",
  phase: "provisioning",
  privileged: true,
  network: false,
  describe: "Remove package indexes and staged build inputs",
  instructions: () => [run([{ words: ["rm", "-rf", "/var/lib/apt/lists/*", "/tmp/*"] }])],
  apply(state) {
    const draft = cloneState(state);
    removeChildren(draft, "/var/lib/apt/lists");
    removeChildren(draft, "/tmp");
    draft.aptLists = false;
    return { ok: true, state: draft };
  },
};

function nextUid(state: ImageState): number {
  const uids = Object.values(state.accounts).map((account) => account.uid).filter((uid) => uid >= 1000);
  return uids.length === 0 ? 1000 : Math.max(...uids) + 1;
}

export const createServiceIdentity: ProvisionStep = {
  id: "create_service_identity",
  phase: "bootstrap",
  privileged: true,
  network: false,
  describe: "Create the unprivileged service account with no password and no login shell",
  instructions: (recipe) => [
    run(
      [{ words: ["adduser", "--disabled-password", "--gecos", "\"\"", "--shell", recipe.serviceShell, recipe.serviceUser] }],
      true,
    ),
  ],
  apply(state, { recipe }) {
    const existing = state.accounts[recipe.serviceUser];
    if (existing !== undefined) {
      if (existing.uid !== 0 && existing.passwordDisabled && existing.shell === recipe.serviceShell) {
        return { ok: true, state: cloneState(state) };
      }
      return fail("account_conflict", `account ${recipe.serviceUser} already exists with different settings`);
    }
    if (state.entries[recipe.serviceShell]?.kind !== "file") {
      return fail("shell_missing", `${recipe.serviceShell} does not exist`);
    }

    const draft = cloneState(state);
    const home = `/home/${recipe.serviceUser}`;
    const created = makeDirectories(draft, [home]);
    if (!created.ok) return created;
    draft.entries[home] = { kind: "dir", owner: recipe.serviceUser, group: recipe.serviceUser, mode: 0o700 };
    draft.accounts[recipe.serviceUser] = {
      uid: nextUid(state),
      home,
      shell: recipe.serviceShell,
      passwordDisabled: true,
    };
    return { ok: true, state: draft };
  },
};

export const createVolumeDirectories: ProvisionStep = {
  id: "create_volume_directories",
  phase: "bootstrap",
  privileged: true,
  network: false,
  describe: "Create the persistent volume directories",
  instructions: (recipe) => [run([{ words: ["mkdir", "-p", ...recipe.volumes.directories] }])],
  apply(state, { recipe }) {
    const draft = cloneState(state);
    const created = makeDirectories(draft, recipe.volumes.directories);
    if (!created.ok) return created;
    return { ok: true, state: draft };
  },
};

function ownedPaths(recipe: ImageRecipe): string[] {
  return [recipe.volumes.root, recipe.scripts.target, recipe.app.target];
}

export const assignOwnership: ProvisionStep = {
  id: "assign_ownership",
  phase: "bootstrap",
  privileged: true,
  network: false,
  describe: "Give the service account ownership of volumes, scripts and the application",
  instructions: (recipe) => [
    run([{ words: ["chown", "-R", `${recipe.serviceUser}:${recipe.serviceUser}`, ...ownedPaths(recipe)] }]),
  ],
  apply(state, { recipe }) {
    if (state.accounts[recipe.serviceUser] === undefined) {
      return fail("account_missing", `account ${recipe.serviceUser} does not exist`);
    }
    const draft = cloneState(state);
    const failure = firstFailure(
      ownedPaths(recipe).map((path) => chownTree(draft, path, recipe.serviceUser, recipe.serviceUser)),
    );
    if (!failure.ok) return failure;
    return { ok: true, state: draft };
  },
};

export const setVolumePermissions: ProvisionStep = {
  id: "set_volume_permissions",
  phase: "bootstrap",
  privileged: true,
  network: false,
  describe: "Set the volume tree's permissions",
  instructions: (recipe) => [run([{ words: ["chmod", "-R", recipe.volumes.mode, recipe.volumes.root] }])],
  apply(state, { recipe }) {
    const draft = cloneState(state);
    const changed = chmodTree(draft, recipe.volumes.root, parseMode(recipe.volumes.mode));
    if (!changed.ok) return changed;
    return { ok: true, state: draft };
  },
};

export const markScriptsExecutable: ProvisionStep = {
  id: "mark_scripts_executable",
  phase: "bootstrap",
  privileged: true,
  network: false,
  describe: "Make every script executable",
  instructions: (recipe) => [run([{ words: ["chmod", "-R", "+x", recipe.scripts.target] }])],
  apply(state, { recipe }) {
    const draft = cloneState(state);
    const changed = addExecutableBits(draft, recipe.scripts.target);
    if (!changed.ok) return changed;
    return { ok: true, state: draft };
  },
};

export const dropPrivilegesStep: ProvisionStep = {
  id: "drop_privileges",
  phase: "bootstrap",
  privileged: false,
  network: false,
  describe: "Switch to the service account for everything that follows",
  instructions: (recipe) => [{ kind: "USER", user: recipe.serviceUser }],
  apply(state, { recipe }) {
    if (state.accounts[recipe.serviceUser] === undefined) {
      return fail("account_missing", `account ${recipe.serviceUser} does not exist`);
    }
    const transition = dropPrivileges(state.identity, recipe.serviceUser);
    if (!transition.ok) return fail(transition.code, transition.message);
    const draft = cloneState(state);
    draft.identity = transition.identity;
    draft.config.user = recipe.serviceUser;
    return { ok: true, state: draft };
  },
};

export const handOffStep: ProvisionStep = {
  id: "hand_off",
  phase: "bootstrap",
  privileged: false,
  network: false,
  describe: "Hand the process over to the entrypoint",
  instructions: (recipe) => [{ kind: "CMD", argv: [recipe.entrypoint] }],
  apply(state, { recipe }) {
    const transition = handOff(state.identity, [recipe.entrypoint]);
    if (!transition.ok) return fail(transition.code, transition.message);
    const draft = cloneState(state);
    draft.identity = transition.identity;
    draft.config.cmd = [recipe.entrypoint];
    return { ok: true, state: draft };
  },
};

/** Provisioning and bootstrap steps in the only order they may run. */
export const PROVISION_STEPS: readonly ProvisionStep[] = [
  configureEnvironment,
  stageBuildInputs,
  configureService,
  createRuntimeEnvironment,
  upgradePackageTooling,
  installSystemLibraries,
  installManifestPackages,
  purgeToolchain,
  cleanBuildCaches,
  createServiceIdentity,
  createVolumeDirectories,
  assignOwnership,
  setVolumePermissions,
  markScriptsExecutable,
  dropPrivilegesStep,
  handOffStep,
];

/** Apply a step behind the privilege and network guards. */
export function applyStep(step: ProvisionStep, state: ImageState, ctx: StepContext): StepResult {
  if (step.privileged) {
    const check = requirePrivilege(state.identity, step.id);
    if (!check.ok) return fail(check.code, check.message);
  }
  if (step.network && !ctx.network) {
    return fail("network_unreachable", `${step.id} needs network access`);
  }
  return step.apply(state, ctx);
}
