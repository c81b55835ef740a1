import { describe, expect, it } from "vitest";
import type { Logger } from "../shared/logger.ts";
import type { BuildContext } from "../types.ts";
import { loadAptCatalog, loadPythonCatalog } from "./catalog.ts";
import { cloneState, createBaseImageState, type ImageState } from "./image-state.ts";
import { simulateBuild, type PipelineResult } from "./pipeline.ts";
import { createDefaultRecipe, parseRecipe, type ImageRecipe } from "./recipe.ts";
import {
  applyStep,
  assignOwnership,
  configureEnvironment,
  createServiceIdentity,
  createVolumeDirectories,
  dropPrivilegesStep,
  handOffStep,
  leavesPipCache,
  PROVISION_STEPS,
  type StepContext,
} from "./steps.ts";

const build: BuildContext = {
  manifest: "Django>=4.2,<5.0\npsycopg2>=2.9\nPillow==10.4.0\n",
  scripts: [{ path: "run.sh", executable: false }],
  app: [
    { path: "manage.py", executable: false },
    { path: "core/settings.py", executable: false },
  ],
};

const quiet: Logger = { debug: () => undefined, info: () => undefined, warn: () => undefined, error: () => undefined };

function simulate(recipe: ImageRecipe, inputs: BuildContext = build): PipelineResult {
  return simulateBuild(recipe, inputs, { logger: quiet });
}

function context(recipe: ImageRecipe = createDefaultRecipe()): StepContext {
  return { recipe, build, aptCatalog: loadAptCatalog(), pythonCatalog: loadPythonCatalog(), network: true };
}

function baseState(recipe: ImageRecipe = createDefaultRecipe()): ImageState {
  return createBaseImageState(recipe, loadAptCatalog());
}

function finalState(): ImageState {
  const result = simulate(createDefaultRecipe());
  if (!result.ok) throw new Error(`simulation failed: ${result.code}`);
  return result.state;
}

describe("step order", () => {
  it("is declared explicitly", () => {
    expect(PROVISION_STEPS.map((step) => step.id)).toEqual([
      "configure_environment",
      "stage_build_inputs",
      "configure_service",
      "create_runtime_environment",
      "upgrade_package_tooling",
      "install_system_libraries",
      "install_manifest_packages",
      "purge_toolchain",
      "clean_build_caches",
      "create_service_identity",
      "create_volume_directories",
      "assign_ownership",
      "set_volume_permissions",
      "mark_scripts_executable",
      "drop_privileges",
      "hand_off",
    ]);
  });

  it("marks exactly the filesystem and package operations as privileged", () => {
    const privileged = PROVISION_STEPS.filter((step) => step.privileged).map((step) => step.id);
    expect(privileged).toEqual(PROVISION_STEPS.slice(3, 14).map((step) => step.id));
  });

  it("only the installers need the network", () => {
    expect(PROVISION_STEPS.filter((step) => step.network).map((step) => step.id)).toEqual([
      "upgrade_package_tooling",
      "install_system_libraries",
      "install_manifest_packages",
    ]);
  });
});

describe("step application", () => {
  it("never modifies the state it is given", () => {
    const state = baseState();
    const snapshot = cloneState(state);
    const result = configureEnvironment.apply(state, context());
    expect(result.ok).toBe(true);
    expect(state).toEqual(snapshot);
  });

  it("puts scripts and the runtime ahead of the inherited search path", () => {
    const result = configureEnvironment.apply(baseState(), context());
    if (!result.ok) throw new Error(result.code);
    expect(result.state.config.env).toEqual({
      PATH: "/scripts:/py/bin:/usr/local/bin:/usr/local/sbin:/usr/sbin:/usr/bin:/sbin:/bin",
      PYTHONUNBUFFERED: "1",
    });
  });

  it("refuses privileged steps once privileges are dropped", () => {
    const state = baseState();
    state.identity = { phase: "privilege_dropped", user: "svc-user" };
    const result = applyStep(assignOwnership, state, context());
    expect(result).toEqual({
      ok: false,
      code: "privilege_escalation_denied",
      message: "assign_ownership needs superuser rights but the image runs as svc-user (privilege_dropped)",
    });
  });

  it("directory creation is idempotent on a provisioned image", () => {
    const state = finalState();
    const result = createVolumeDirectories.apply(state, context());
    expect(result).toEqual({ ok: true, state });
  });

  it("re-creating a matching service account changes nothing", () => {
    const state = finalState();
    expect(createServiceIdentity.apply(state, context())).toEqual({ ok: true, state });
  });

  it("rejects an existing account with different settings", () => {
    const state = baseState();
    state.accounts["svc-user"] = { uid: 1000, home: "/home/svc-user", shell: "/bin/bash", passwordDisabled: true };
    const result = createServiceIdentity.apply(state, context());
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe("account_conflict");
  });

  it("cannot drop privileges to an account that does not exist", () => {
    const result = dropPrivilegesStep.apply(baseState(), context());
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe("account_missing");
  });

  it("cannot hand off before privileges are dropped", () => {
    const result = handOffStep.apply(baseState(), context());
    expect(result).toEqual({ ok: false, code: "invalid_transition", message: "cannot hand off from provisioning" });
  });
});

describe("dependency installation", () => {
  it("fails when a native build library was never installed", () => {
    const recipe = parseRecipe({
      version: 1,
      systemPackages: ["curl", "build-essential", "postgresql-client", "libjpeg-dev", "zlib1g-dev", "ca-certificates", "git"],
      purgePackages: ["build-essential"],
    });
    const result = simulate(recipe);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedStep).toBe("install_manifest_packages");
    expect(result.code).toBe("native_library_missing");
    expect(result.message).toBe("psycopg2 needs libpq-dev to build");
    expect(result.completed).toHaveLength(6);
  });

  it("fails when a purge takes a runtime library with it", () => {
    const recipe = parseRecipe({ version: 1, purgePackages: ["build-essential", "libpq-dev", "libjpeg-dev"] });
    const result = simulate(recipe);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedStep).toBe("purge_toolchain");
    expect(result.code).toBe("runtime_library_purged");
    expect(result.message).toBe("libjpeg62-turbo was removed but pillow loads it at run time");
  });

  it("keeps runtime libraries reachable from packages that stay installed", () => {
    const state = finalState();
    expect(state.systemPackages.libpq5).toBeDefined();
    expect(state.systemPackages["libjpeg62-turbo"]).toBeDefined();
    expect(state.systemPackages["libpq-dev"]).toBeUndefined();
    expect(state.systemPackages.gcc).toBeUndefined();
    expect(state.systemPackages["libssl-dev"]).toBeUndefined();
  });

  it("reports packages the index does not have", () => {
    const recipe = parseRecipe({ version: 1, systemPackages: ["curl", "libfoo-dev"], purgePackages: [] });
    const result = simulate(recipe);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failedStep).toBe("install_system_libraries");
    expect(result.message).toBe("Unable to locate package libfoo-dev");
  });

  it("surfaces manifest errors with their codes", () => {
    const unresolvable = simulate(createDefaultRecipe(), { ...build, manifest: "requests==2.31.0\nrequests>=2.32\n" });
    expect(unresolvable.ok).toBe(false);
    if (!unresolvable.ok) {
      expect(unresolvable.code).toBe("unresolvable_constraint");
      expect(unresolvable.message).toBe("unresolvable_constraint:requests");
    }

    const malformed = simulate(createDefaultRecipe(), { ...build, manifest: "django\n-e .\n" });
    expect(malformed.ok).toBe(false);
    if (!malformed.ok) expect(malformed.message).toBe("manifest_malformed:2");
  });

  it("records pinned versions", () => {
    const runtime = finalState().runtime;
    expect(runtime?.packages.pillow).toEqual({ version: "10.4.0" });
    expect(runtime?.packages.django).toEqual({});
    expect(runtime?.tooling).toEqual(["pip", "setuptools", "wheel"]);
  });
});

describe("installer cache", () => {
  it("recognizes pip installs that keep a download cache", () => {
    expect(leavesPipCache({ words: ["/py/bin/pip", "install", "--upgrade", "pip"] })).toBe(true);
    expect(leavesPipCache({ words: ["/py/bin/pip", "install", "--no-cache-dir", "-r", "/tmp/requirements.txt"] })).toBe(false);
    expect(leavesPipCache({ words: ["/py/bin/pip", "freeze"] })).toBe(false);
    expect(leavesPipCache({ words: ["apt-get", "install", "-y"] })).toBe(false);
  });

  it("renders every pip install without a cache, so the simulated image has none", () => {
    const recipe = createDefaultRecipe();
    const pipCommands = PROVISION_STEPS.flatMap((step) => step.instructions(recipe))
      .flatMap((instruction) => (instruction.kind === "RUN" ? instruction.commands : []))
      .filter((command) => command.words[0] === "/py/bin/pip");
    expect(pipCommands.map((command) => command.words.slice(1, 4))).toEqual([
      ["install", "--upgrade", "--no-cache-dir"],
      ["install", "--no-cache-dir", "-r"],
    ]);
    expect(pipCommands.some(leavesPipCache)).toBe(false);
    expect(finalState().pipCache).toBe(false);
  });
});
