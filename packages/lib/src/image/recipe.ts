import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, posix } from "node:path";
import { parseYamlDocument, stringifyYamlDocument } from "../shared/yaml.ts";

export const RecipeVersion = 1;

export type RuntimeEnvironmentConfig = {
  /** Directory holding the isolated interpreter and its packages. */
  prefix: string;
  interpreter: string;
  /** Package-management tooling upgraded right after the environment is created. */
  tooling: string[];
  /** Variable that disables output buffering in the runtime. */
  unbufferedVar: string;
};

export type CopySource = {
  source: string;
  target: string;
};

export type ManifestConfig = {
  source: string;
  /** Temporary location inside the image; removed once packages are installed. */
  stagedPath: string;
};

export type VolumeConfig = {
  root: string;
  directories: string[];
  mode: string;
};

export type ImageRecipe = {
  version: typeof RecipeVersion;
  baseImage: string;
  labels: Record<string, string>;
  env: Record<string, string>;
  runtime: RuntimeEnvironmentConfig;
  manifest: ManifestConfig;
  scripts: CopySource;
  app: CopySource;
  systemPackages: string[];
  purgePackages: string[];
  serviceUser: string;
  serviceShell: string;
  volumes: VolumeConfig;
  port: number;
  entrypoint: string;
};

export function createDefaultRecipe(): ImageRecipe {
  return {
    version: RecipeVersion,
    baseImage: "python:3.13-slim-bookworm",
    labels: {},
    env: {},
    runtime: {
      prefix: "/py",
      interpreter: "python",
      tooling: ["pip", "setuptools", "wheel"],
      unbufferedVar: "PYTHONUNBUFFERED",
    },
    manifest: { source: "requirements.txt", stagedPath: "/tmp/requirements.txt" },
    scripts: { source: "scripts", target: "/scripts" },
    app: { source: "app", target: "/app" },
    systemPackages: [
      "curl",
      "build-essential",
      "libpq-dev",
      "postgresql-client",
      "libjpeg-dev",
      "zlib1g-dev",
      "ca-certificates",
      "git",
    ],
    purgePackages: ["build-essential", "libpq-dev"],
    serviceUser: "svc-user",
    serviceShell: "/usr/sbin/nologin",
    volumes: {
      root: "/vol",
      directories: ["/vol/web/media", "/vol/web/static"],
      mode: "755",
    },
    port: 8020,
    entrypoint: "run.sh",
  };
}

// --- Validation patterns for values that flow into the rendered Dockerfile ---

/** Image reference: registry/namespace/name:tag or @sha256 digest. No whitespace or shell metacharacters. */
const IMAGE_PATTERN = /^[a-z0-9]+([._\/:@-][a-z0-9]+)*$/i;

/** Debian package name per policy: lowercase alphanumerics plus + - . */
const APT_PACKAGE_PATTERN = /^[a-z0-9][a-z0-9+.-]+$/;

const TOOL_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const LABEL_KEY_PATTERN = /^[a-z0-9]([a-z0-9._-]*[a-z0-9])?$/i;

/** adduser's default NAME_REGEX. */
const USER_PATTERN = /^[a-z_][a-z0-9_-]{0,31}$/;

const EXECUTABLE_PATTERN = /^[A-Za-z0-9._-]+$/;

const RELATIVE_SOURCE_PATTERN = /^[A-Za-z0-9._][A-Za-z0-9._\/-]*$/;

const MODE_PATTERN = /^[0-7]{3,4}$/;

const RESERVED_USERS = new Set(["root", "toor", "daemon"]);

/** Shells that refuse interactive logins. A service account gets one of these. */
export const NON_LOGIN_SHELLS: ReadonlySet<string> = new Set(["/usr/sbin/nologin", "/sbin/nologin", "/bin/false"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertRecord(value: unknown, errorCode: string): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(errorCode);
  return value;
}

function rejectUnknownKeys(doc: Record<string, unknown>, allowed: readonly string[], scope: string): void {
  const allowedKeys = new Set(allowed);
  for (const key of Object.keys(doc)) {
    if (!allowedKeys.has(key)) throw new Error(`unknown_${scope}_field_${key}`);
  }
}

function parseString(value: unknown, fallback: string, errorCode: string, pattern?: RegExp): string {
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !value.trim()) throw new Error(errorCode);
  const trimmed = value.trim();
  if (pattern && !pattern.test(trimmed)) throw new Error(`${errorCode}_format`);
  return trimmed;
}

function parseStringList(value: unknown, fallback: string[], errorCode: string, pattern: RegExp): string[] {
  if (value === undefined) return [...fallback];
  if (!Array.isArray(value)) throw new Error(errorCode);
  const result: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || !entry.trim()) throw new Error(`${errorCode}_entry`);
    const trimmed = entry.trim();
    if (!pattern.test(trimmed)) throw new Error(`${errorCode}_format:${trimmed}`);
    if (result.includes(trimmed)) throw new Error(`${errorCode}_duplicate:${trimmed}`);
    result.push(trimmed);
  }
  return result;
}

function parseAbsolutePath(value: unknown, fallback: string, field: string): string {
  const errorCode = `invalid_absolute_path_${field}`;
  const path = parseString(value, fallback, errorCode);
  if (!path.startsWith("/") || /\s/.test(path)) throw new Error(errorCode);
  const normalized = posix.normalize(path);
  if (normalized !== path || path.endsWith("/")) throw new Error(errorCode);
  return path;
}

function parseRelativeSource(value: unknown, fallback: string, field: string): string {
  const errorCode = `invalid_source_${field}`;
  const raw = parseString(value, fallback, errorCode);
  const source = raw.startsWith("./") ? raw.slice(2) : raw;
  if (!RELATIVE_SOURCE_PATTERN.test(source)) throw new Error(errorCode);
  if (source.split("/").includes("..")) throw new Error(errorCode);
  return source.replace(/\/+$/, "");
}

function parseStringMap(value: unknown, errorCode: string, keyPattern: RegExp): Record<string, string> {
  if (value === undefined) return {};
  const doc = assertRecord(value, errorCode);
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(doc)) {
    if (!keyPattern.test(key)) throw new Error(`${errorCode}_key:${key}`);
    if (typeof entry !== "string" && typeof entry !== "number") throw new Error(`${errorCode}_value:${key}`);
    const text = String(entry);
    if (/[\r\n]/.test(text)) throw new Error(`${errorCode}_value:${key}`);
    result[key] = text;
  }
  return result;
}

function parsePort(value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 65535) throw new Error("invalid_port");
  return value;
}

function parseBaseImage(value: unknown, fallback: string): string {
  const image = parseString(value, fallback, "invalid_base_image", IMAGE_PATTERN);
  if (!isPinnedImage(image)) throw new Error("base_image_unpinned");
  return image;
}

/** An image is pinned when it names a digest or an explicit tag other than `latest`. */
export function isPinnedImage(image: string): boolean {
  if (image.includes("@sha256:")) return true;
  const lastSegment = image.slice(image.lastIndexOf("/") + 1);
  const colon = lastSegment.indexOf(":");
  if (colon === -1) return false;
  const tag = lastSegment.slice(colon + 1);
  return tag.length > 0 && tag !== "latest";
}

function isUnder(path: string, root: string): boolean {
  return path.startsWith(`${root}/`);
}

function parseRuntime(raw: unknown, defaults: RuntimeEnvironmentConfig): RuntimeEnvironmentConfig {
  if (raw === undefined) return { ...defaults, tooling: [...defaults.tooling] };
  const doc = assertRecord(raw, "invalid_runtime");
  rejectUnknownKeys(doc, ["prefix", "interpreter", "tooling", "unbufferedVar"], "runtime");
  return {
    prefix: parseAbsolutePath(doc.prefix, defaults.prefix, "runtime_prefix"),
    interpreter: parseString(doc.interpreter, defaults.interpreter, "invalid_interpreter", EXECUTABLE_PATTERN),
    tooling: parseStringList(doc.tooling, defaults.tooling, "invalid_tooling", TOOL_PATTERN),
    unbufferedVar: parseString(doc.unbufferedVar, defaults.unbufferedVar, "invalid_unbuffered_var", ENV_KEY_PATTERN),
  };
}

function parseCopySource(raw: unknown, defaults: CopySource, field: string): CopySource {
  if (raw === undefined) return { ...defaults };
  const doc = assertRecord(raw, `invalid_${field}`);
  rejectUnknownKeys(doc, ["source", "target"], field);
  return {
    source: parseRelativeSource(doc.source, defaults.source, field),
    target: parseAbsolutePath(doc.target, defaults.target, `${field}_target`),
  };
}

function parseManifestConfig(raw: unknown, defaults: ManifestConfig): ManifestConfig {
  if (raw === undefined) return { ...defaults };
  const doc = assertRecord(raw, "invalid_manifest");
  rejectUnknownKeys(doc, ["source", "stagedPath"], "manifest");
  const stagedPath = parseAbsolutePath(doc.stagedPath, defaults.stagedPath, "manifest_staged_path");
  if (!isUnder(stagedPath, "/tmp")) throw new Error("manifest_staged_outside_tmp");
  return {
    source: parseRelativeSource(doc.source, defaults.source, "manifest"),
    stagedPath,
  };
}

function parseVolumes(raw: unknown, defaults: VolumeConfig): VolumeConfig {
  const doc = raw === undefined ? {} : assertRecord(raw, "invalid_volumes");
  rejectUnknownKeys(doc, ["root", "directories", "mode"], "volumes");
  const root = parseAbsolutePath(doc.root, defaults.root, "volume_root");
  let directories: string[];
  if (doc.directories === undefined) {
    directories = [...defaults.directories];
  } else {
    if (!Array.isArray(doc.directories) || doc.directories.length === 0) throw new Error("invalid_volume_directories");
    directories = doc.directories.map((entry: unknown) => parseAbsolutePath(entry, "", "volume_directory"));
  }
  for (const dir of directories) {
    if (!isUnder(dir, root)) throw new Error(`volume_directory_outside_root:${dir}`);
  }
  const mode = doc.mode === undefined ? defaults.mode : String(doc.mode);
  if (!MODE_PATTERN.test(mode)) throw new Error("invalid_mode");
  return { root, directories, mode };
}

export function parseRecipe(raw: unknown): ImageRecipe {
  const doc = assertRecord(raw, "invalid_recipe");
  rejectUnknownKeys(doc, [
    "version", "baseImage", "labels", "env", "runtime", "manifest", "scripts", "app",
    "systemPackages", "purgePackages", "serviceUser", "serviceShell", "volumes", "port", "entrypoint",
  ], "recipe");
  if (doc.version !== RecipeVersion) throw new Error("invalid_recipe_version");

  const defaults = createDefaultRecipe();
  const runtime = parseRuntime(doc.runtime, defaults.runtime);
  const env = parseStringMap(doc.env, "invalid_env", ENV_KEY_PATTERN);
  if ("PATH" in env) throw new Error("env_path_reserved");
  if (runtime.unbufferedVar in env) throw new Error(`env_reserved:${runtime.unbufferedVar}`);

  const systemPackages = parseStringList(doc.systemPackages, defaults.systemPackages, "invalid_system_packages", APT_PACKAGE_PATTERN);
  const purgePackages = parseStringList(doc.purgePackages, defaults.purgePackages, "invalid_purge_packages", APT_PACKAGE_PATTERN);
  for (const pkg of purgePackages) {
    if (!systemPackages.includes(pkg)) throw new Error(`purge_package_not_installed:${pkg}`);
  }

  const serviceUser = parseString(doc.serviceUser, defaults.serviceUser, "invalid_service_user", USER_PATTERN);
  if (RESERVED_USERS.has(serviceUser)) throw new Error("service_user_reserved");
  const serviceShell = parseAbsolutePath(doc.serviceShell, defaults.serviceShell, "service_shell");
  if (!NON_LOGIN_SHELLS.has(serviceShell)) throw new Error(`service_shell_interactive:${serviceShell}`);

  return {
    version: RecipeVersion,
    baseImage: parseBaseImage(doc.baseImage, defaults.baseImage),
    labels: parseStringMap(doc.labels, "invalid_labels", LABEL_KEY_PATTERN),
    env,
    runtime,
    manifest: parseManifestConfig(doc.manifest, defaults.manifest),
    scripts: parseCopySource(doc.scripts, defaults.scripts, "scripts"),
    app: parseCopySource(doc.app, defaults.app, "app"),
    systemPackages,
    purgePackages,
    serviceUser,
    serviceShell,
    volumes: parseVolumes(doc.volumes, defaults.volumes),
    port: parsePort(doc.port, defaults.port),
    entrypoint: parseString(doc.entrypoint, defaults.entrypoint, "invalid_entrypoint", EXECUTABLE_PATTERN),
  };
}

/** Environment the image exposes to the application, in declaration order. */
export function runtimeEnvironment(recipe: ImageRecipe): Array<[key: string, value: string]> {
  return [
    [recipe.runtime.unbufferedVar, "1"],
    ["PATH", `${recipe.scripts.target}:${recipe.runtime.prefix}/bin:$PATH`],
    ...Object.entries(recipe.env),
  ];
}

export function parseRecipeYaml(content: string): ImageRecipe {
  return parseRecipe(parseYamlDocument(content));
}

export function stringifyRecipe(recipe: ImageRecipe): string {
  return stringifyYamlDocument(recipe);
}

export function readRecipe(path: string): ImageRecipe {
  if (!existsSync(path)) return createDefaultRecipe();
  return parseRecipeYaml(readFileSync(path, "utf8"));
}

export function writeRecipe(path: string, recipe: ImageRecipe): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringifyRecipe(recipe), "utf8");
}

export function ensureRecipe(path: string): ImageRecipe {
  if (existsSync(path)) return readRecipe(path);
  const initial = createDefaultRecipe();
  writeRecipe(path, initial);
  return initial;
}
