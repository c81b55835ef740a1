import { readFileSync } from "node:fs";
import { normalizePackageName } from "./manifest.ts";

export type AptRole =
  | "system"
  | "toolchain"
  | "db-headers"
  | "dev-headers"
  | "db-client"
  | "image-libs"
  | "compression-libs"
  | "network-client"
  | "certificates"
  | "vcs"
  | "runtime-lib";

export type AptPackage = {
  role: AptRole;
  depends: string[];
};

export type AptCatalog = {
  /** Packages the base image ships with, all marked manually installed. */
  baseImage: string[];
  packages: Record<string, AptPackage>;
};

export type PythonPackage = {
  /** System packages that must be present to compile the package from source. */
  build: string[];
  /** Shared libraries the installed package loads at run time. */
  runtime: string[];
  dependencies: string[];
};

export type PythonCatalog = Record<string, PythonPackage>;

const APT_ROLES: readonly AptRole[] = [
  "system",
  "toolchain",
  "db-headers",
  "dev-headers",
  "db-client",
  "image-libs",
  "compression-libs",
  "network-client",
  "certificates",
  "vcs",
  "runtime-lib",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAptRole(value: unknown): value is AptRole {
  return typeof value === "string" && APT_ROLES.some((role) => role === value);
}

function stringList(value: unknown, errorCode: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new Error(errorCode);
  return value.map((entry: unknown) => {
    if (typeof entry !== "string") throw new Error(errorCode);
    return entry;
  });
}

function readAsset(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../assets/${name}`, import.meta.url), "utf8"));
}

export function parseAptCatalog(raw: unknown): AptCatalog {
  if (!isRecord(raw) || !isRecord(raw.packages)) throw new Error("invalid_apt_catalog");
  const packages: Record<string, AptPackage> = {};
  for (const [name, entry] of Object.entries(raw.packages)) {
    if (!isRecord(entry) || !isAptRole(entry.role)) throw new Error(`invalid_apt_catalog_entry:${name}`);
    packages[name] = { role: entry.role, depends: stringList(entry.depends, `invalid_apt_catalog_entry:${name}`) };
  }
  return { baseImage: stringList(raw.baseImage, "invalid_apt_catalog"), packages };
}

export function parsePythonCatalog(raw: unknown): PythonCatalog {
  if (!isRecord(raw)) throw new Error("invalid_python_catalog");
  const catalog: PythonCatalog = {};
  for (const [name, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) throw new Error(`invalid_python_catalog_entry:${name}`);
    const errorCode = `invalid_python_catalog_entry:${name}`;
    catalog[normalizePackageName(name)] = {
      build: stringList(entry.build, errorCode),
      runtime: stringList(entry.runtime, errorCode),
      dependencies: stringList(entry.dependencies, errorCode).map(normalizePackageName),
    };
  }
  return catalog;
}

let aptCatalog: AptCatalog | null = null;
let pythonCatalog: PythonCatalog | null = null;

export function loadAptCatalog(): AptCatalog {
  aptCatalog ??= parseAptCatalog(readAsset("apt-catalog.json"));
  return aptCatalog;
}

export function loadPythonCatalog(): PythonCatalog {
  pythonCatalog ??= parsePythonCatalog(readAsset("python-packages.json"));
  return pythonCatalog;
}

/** Whether the package index knows the package. */
export function isKnownAptPackage(catalog: AptCatalog, name: string): boolean {
  return Object.hasOwn(catalog.packages, name);
}

/** The named packages plus everything they depend on, depth-first in dependency order. */
export function aptDependencyClosure(catalog: AptCatalog, names: readonly string[]): string[] {
  const seen = new Set<string>();
  const visit = (name: string): void => {
    if (seen.has(name)) return;
    seen.add(name);
    for (const dep of catalog.packages[name]?.depends ?? []) visit(dep);
  };
  for (const name of names) visit(name);
  return [...seen];
}

export function packagesWithRole(catalog: AptCatalog, names: Iterable<string>, roles: readonly AptRole[]): string[] {
  const result: string[] = [];
  for (const name of names) {
    const role = catalog.packages[name]?.role;
    if (role && roles.includes(role)) result.push(name);
  }
  return result;
}

/** Package knowledge for a language package; packages the catalog does not know are pure and dependency-free. */
export function describePythonPackage(catalog: PythonCatalog, name: string): PythonPackage {
  return catalog[normalizePackageName(name)] ?? { build: [], runtime: [], dependencies: [] };
}

/**
 * Manifest packages plus their transitive dependencies, normalized and in
 * installation order (each package after the manifest entry that pulled it in).
 */
export function resolvePackageClosure(catalog: PythonCatalog, names: readonly string[]): string[] {
  const seen = new Set<string>();
  const visit = (name: string): void => {
    const normalized = normalizePackageName(name);
    if (seen.has(normalized)) return;
    seen.add(normalized);
    for (const dep of describePythonPackage(catalog, normalized).dependencies) visit(dep);
  };
  for (const name of names) visit(name);
  return [...seen];
}
