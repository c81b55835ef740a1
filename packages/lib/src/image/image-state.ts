import { posix } from "node:path";
import type { AptCatalog } from "./catalog.ts";
import { initialIdentity, SUPERUSER, type IdentityState } from "./identity.ts";
import type { ImageRecipe } from "./recipe.ts";

export type EntryKind = "dir" | "file";

export type FsEntry = {
  kind: EntryKind;
  owner: string;
  group: string;
  mode: number;
};

export type Account = {
  uid: number;
  home: string;
  shell: string;
  passwordDisabled: boolean;
};

export type InstalledSystemPackage = {
  /** Manually installed packages are never auto-removed. */
  manual: boolean;
};

export type InstalledPythonPackage = {
  version?: string;
};

export type RuntimeEnvironmentState = {
  prefix: string;
  interpreter: string;
  /** Installer tooling present in the environment; not part of the application's package set. */
  tooling: string[];
  /** Installed language packages keyed by normalized name. */
  packages: Record<string, InstalledPythonPackage>;
};

export type ImageConfig = {
  env: Record<string, string>;
  workdir: string;
  ports: number[];
  labels: Record<string, string>;
  user: string;
  cmd: string[] | null;
};

/**
 * Everything a build step can observe or change about an image. Steps take one
 * of these and return a new one; the value they were given is never modified.
 */
export type ImageState = {
  identity: IdentityState;
  accounts: Record<string, Account>;
  entries: Record<string, FsEntry>;
  systemPackages: Record<string, InstalledSystemPackage>;
  /** Package index downloaded by `apt-get update`. */
  aptLists: boolean;
  /** Wheels and downloads cached by the language package installer. */
  pipCache: boolean;
  runtime: RuntimeEnvironmentState | null;
  config: ImageConfig;
};

export type MutationResult = { ok: true } | { ok: false; code: string; message: string };

const OK: MutationResult = { ok: true };

export const DEFAULT_DIR_MODE = 0o755;
export const DEFAULT_FILE_MODE = 0o644;
export const EXECUTABLE_FILE_MODE = 0o755;

const BASE_DIRECTORIES = [
  "/",
  "/bin",
  "/etc",
  "/home",
  "/root",
  "/tmp",
  "/usr",
  "/usr/bin",
  "/usr/local",
  "/usr/local/bin",
  "/usr/sbin",
  "/var",
  "/var/lib",
  "/var/lib/apt",
  "/var/lib/apt/lists",
];

function rootEntry(kind: EntryKind, mode: number): FsEntry {
  return { kind, owner: SUPERUSER, group: SUPERUSER, mode };
}

/** State of a freshly pulled base image: superuser identity, system interpreter, no index, no cache. */
export function createBaseImageState(recipe: ImageRecipe, catalog: AptCatalog): ImageState {
  const entries: Record<string, FsEntry> = {};
  for (const dir of BASE_DIRECTORIES) entries[dir] = rootEntry("dir", dir === "/tmp" ? 0o1777 : DEFAULT_DIR_MODE);
  entries["/bin/sh"] = rootEntry("file", EXECUTABLE_FILE_MODE);
  entries["/bin/bash"] = rootEntry("file", EXECUTABLE_FILE_MODE);
  entries["/usr/sbin/nologin"] = rootEntry("file", EXECUTABLE_FILE_MODE);
  entries[`/usr/local/bin/${recipe.runtime.interpreter}`] = rootEntry("file", EXECUTABLE_FILE_MODE);

  const systemPackages: Record<string, InstalledSystemPackage> = {};
  for (const name of catalog.baseImage) systemPackages[name] = { manual: true };

  return {
    identity: initialIdentity(),
    accounts: { [SUPERUSER]: { uid: 0, home: "/root", shell: "/bin/bash", passwordDisabled: false } },
    entries,
    systemPackages,
    aptLists: false,
    pipCache: false,
    runtime: null,
    config: {
      env: { PATH: "/usr/local/bin:/usr/local/sbin:/usr/sbin:/usr/bin:/sbin:/bin" },
      workdir: "/",
      ports: [],
      labels: { ...recipe.labels },
      user: SUPERUSER,
      cmd: null,
    },
  };
}

export function cloneState(state: ImageState): ImageState {
  return structuredClone(state);
}

/** Ancestors of an absolute path, outermost first, excluding the path itself. */
export function parentPaths(path: string): string[] {
  const parents: string[] = [];
  for (let current = posix.dirname(path); ; current = posix.dirname(current)) {
    parents.unshift(current);
    if (current === "/") break;
  }
  return parents;
}

/** `mkdir -p`: creates missing directories and leaves existing ones untouched. */
export function makeDirectories(draft: ImageState, paths: readonly string[]): MutationResult {
  for (const path of paths) {
    for (const dir of [...parentPaths(path), path]) {
      const existing = draft.entries[dir];
      if (existing === undefined) {
        draft.entries[dir] = rootEntry("dir", DEFAULT_DIR_MODE);
      } else if (existing.kind !== "dir") {
        return { ok: false, code: "not_a_directory", message: `${dir} exists and is not a directory` };
      }
    }
  }
  return OK;
}

/** Place a root-owned file, creating missing parent directories. */
export function placeFile(draft: ImageState, path: string, executable: boolean): MutationResult {
  const parents = makeDirectories(draft, [posix.dirname(path)]);
  if (!parents.ok) return parents;
  if (draft.entries[path]?.kind === "dir") {
    return { ok: false, code: "not_a_file", message: `${path} exists and is a directory` };
  }
  draft.entries[path] = rootEntry("file", executable ? EXECUTABLE_FILE_MODE : DEFAULT_FILE_MODE);
  return OK;
}

export function isWithin(path: string, root: string): boolean {
  return root === "/" || path === root || path.startsWith(`${root}/`);
}

/** The path and everything beneath it, sorted. */
export function subtreePaths(state: ImageState, root: string): string[] {
  return Object.keys(state.entries)
    .filter((path) => isWithin(path, root))
    .sort();
}

/** `rm -rf dir/*`: empties a directory but keeps it. */
export function removeChildren(draft: ImageState, dir: string): void {
  for (const path of subtreePaths(draft, dir)) {
    if (path !== dir) delete draft.entries[path];
  }
}

function requirePath(draft: ImageState, path: string): MutationResult {
  if (draft.entries[path] === undefined) return { ok: false, code: "path_missing", message: `${path} does not exist` };
  return OK;
}

/** `chown -R owner:group root` */
export function chownTree(draft: ImageState, root: string, owner: string, group: string): MutationResult {
  const found = requirePath(draft, root);
  if (!found.ok) return found;
  for (const path of subtreePaths(draft, root)) {
    const entry = draft.entries[path];
    draft.entries[path] = { ...entry, owner, group };
  }
  return OK;
}

/** `chmod -R mode root` */
export function chmodTree(draft: ImageState, root: string, mode: number): MutationResult {
  const found = requirePath(draft, root);
  if (!found.ok) return found;
  for (const path of subtreePaths(draft, root)) {
    const entry = draft.entries[path];
    draft.entries[path] = { ...entry, mode };
  }
  return OK;
}

/** `chmod -R +x root` */
export function addExecutableBits(draft: ImageState, root: string): MutationResult {
  const found = requirePath(draft, root);
  if (!found.ok) return found;
  for (const path of subtreePaths(draft, root)) {
    const entry = draft.entries[path];
    draft.entries[path] = { ...entry, mode: entry.mode | 0o111 };
  }
  return OK;
}

export function parseMode(mode: string): number {
  return Number.parseInt(mode, 8);
}

export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(3, "0");
}
