import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createDefaultRecipe,
  ensureRecipe,
  isPinnedImage,
  parseRecipe,
  parseRecipeYaml,
  readRecipe,
  runtimeEnvironment,
  stringifyRecipe,
} from "./recipe.ts";

describe("parseRecipe", () => {
  it("fills every omitted field with its default", () => {
    expect(parseRecipe({ version: 1 })).toEqual(createDefaultRecipe());
  });

  it("rejects unknown fields and unsupported versions", () => {
    expect(() => parseRecipe({ version: 1, extra: true })).toThrow("unknown_recipe_field_extra");
    expect(() => parseRecipe({ version: 1, volumes: { owner: "x" } })).toThrow("unknown_volumes_field_owner");
    expect(() => parseRecipe({ version: 2 })).toThrow("invalid_recipe_version");
    expect(() => parseRecipe([])).toThrow("invalid_recipe");
  });

  it("requires a pinned base image", () => {
    expect(() => parseRecipe({ version: 1, baseImage: "python" })).toThrow("base_image_unpinned");
    expect(() => parseRecipe({ version: 1, baseImage: "python:latest" })).toThrow("base_image_unpinned");
    expect(() => parseRecipe({ version: 1, baseImage: "python 3" })).toThrow("invalid_base_image_format");
    expect(parseRecipe({ version: 1, baseImage: "python@sha256:abc123" }).baseImage).toBe("python@sha256:abc123");
  });

  it("refuses superuser service accounts", () => {
    expect(() => parseRecipe({ version: 1, serviceUser: "root" })).toThrow("service_user_reserved");
    expect(() => parseRecipe({ version: 1, serviceUser: "Bad User" })).toThrow("invalid_service_user_format");
  });

  it("only purges packages that were installed", () => {
    expect(() => parseRecipe({ version: 1, purgePackages: ["gcc"] })).toThrow("purge_package_not_installed:gcc");
    expect(() => parseRecipe({ version: 1, systemPackages: ["curl", "curl"] })).toThrow("invalid_system_packages_duplicate:curl");
  });

  it("keeps volume directories under the volume root", () => {
    expect(() => parseRecipe({ version: 1, volumes: { directories: ["/data/x"] } })).toThrow(
      "volume_directory_outside_root:/data/x",
    );
    expect(() => parseRecipe({ version: 1, volumes: { directories: [] } })).toThrow("invalid_volume_directories");
    expect(() => parseRecipe({ version: 1, volumes: { root: "/vol/" } })).toThrow("invalid_absolute_path_volume_root");
  });

  it("accepts numeric and string modes but only octal digits", () => {
    expect(parseRecipe({ version: 1, volumes: { mode: 775 } }).volumes.mode).toBe("775");
    expect(() => parseRecipe({ version: 1, volumes: { mode: "9" } })).toThrow("invalid_mode");
  });

  it("reserves PATH and the unbuffered flag", () => {
    expect(() => parseRecipe({ version: 1, env: { PATH: "/bin" } })).toThrow("env_path_reserved");
    expect(() => parseRecipe({ version: 1, env: { PYTHONUNBUFFERED: "0" } })).toThrow("env_reserved:PYTHONUNBUFFERED");
  });

  it("validates ports", () => {
    expect(() => parseRecipe({ version: 1, port: 70000 })).toThrow("invalid_port");
    expect(() => parseRecipe({ version: 1, port: "8020" })).toThrow("invalid_port");
  });

  it("normalizes copy sources and rejects escapes from the context", () => {
    const recipe = parseRecipe({ version: 1, scripts: { source: "./bin/", target: "/opt/bin" } });
    expect(recipe.scripts).toEqual({ source: "bin", target: "/opt/bin" });
    expect(() => parseRecipe({ version: 1, app: { source: "../app" } })).toThrow("invalid_source_app");
  });

  it("only accepts shells that refuse logins for the service account", () => {
    expect(() => parseRecipe({ version: 1, serviceShell: "/bin/bash" })).toThrow(/^service_shell_interactive:\/bin\/bash$/);
    expect(parseRecipe({ version: 1, serviceShell: "/bin/false" }).serviceShell).toBe("/bin/false");
  });

  it("stages the manifest under /tmp only", () => {
    expect(() => parseRecipe({ version: 1, manifest: { stagedPath: "/opt/requirements.txt" } })).toThrow(
      "manifest_staged_outside_tmp",
    );
  });
});

describe("isPinnedImage", () => {
  it("looks at the tag of the last path segment", () => {
    expect(isPinnedImage("registry.example.invalid:5000/python")).toBe(false);
    expect(isPinnedImage("registry.example.invalid:5000/python:3.13-slim")).toBe(true);
  });
});

describe("runtimeEnvironment", () => {
  it("puts the unbuffered flag first and scripts ahead of the runtime on PATH", () => {
    const recipe = parseRecipe({ version: 1, env: { DJANGO_SETTINGS_MODULE: "app.settings" } });
    expect(runtimeEnvironment(recipe)).toEqual([
      ["PYTHONUNBUFFERED", "1"],
      ["PATH", "/scripts:/py/bin:$PATH"],
      ["DJANGO_SETTINGS_MODULE", "app.settings"],
    ]);
  });
});

describe("recipe YAML", () => {
  it("parses labels and overrides from YAML", () => {
    const recipe = parseRecipeYaml("version: 1\nlabels:\n  maintainer: Platform Team\nport: 9000\n");
    expect(recipe.labels).toEqual({ maintainer: "Platform Team" });
    expect(recipe.port).toBe(9000);
  });

  it("reads back what it writes", () => {
    const recipe = createDefaultRecipe();
    expect(parseRecipeYaml(stringifyRecipe(recipe))).toEqual(recipe);
  });
});

describe("recipe files", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "slipway-recipe-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    expect(readRecipe(join(dir, "slipway.yml"))).toEqual(createDefaultRecipe());
  });

  it("ensureRecipe writes the defaults once", () => {
    const path = join(dir, "nested", "slipway.yml");
    ensureRecipe(path);
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf8")).toContain("baseImage: python:3.13-slim-bookworm");
    expect(ensureRecipe(path)).toEqual(createDefaultRecipe());
  });
});
