export type SpecifierOperator = "===" | "==" | "!=" | "<=" | ">=" | "~=" | "<" | ">";

export type VersionSpecifier = {
  operator: SpecifierOperator;
  version: string;
};

export type Requirement = {
  name: string;
  normalizedName: string;
  extras: string[];
  specifiers: VersionSpecifier[];
  marker?: string;
  /** 1-based line in the manifest file. */
  line: number;
};

export type DependencyManifest = {
  requirements: Requirement[];
};

/** One package after repeated entries have been merged and checked for satisfiability. */
export type ResolvedRequirement = {
  name: string;
  specifiers: VersionSpecifier[];
  /** Exact version when the constraints allow exactly one. */
  pinned?: string;
};

const REQUIREMENT_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[([^\]]*)\])?\s*([^;]*?)\s*(?:;\s*(.+))?$/;
const SPECIFIER_PATTERN = /^(===|==|!=|<=|>=|~=|<|>)\s*([A-Za-z0-9.*+!_-]+)$/;
const EXTRA_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** PEP 503 name normalisation: lowercase, runs of `-_.` collapse to `-`. */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

function stripComment(line: string): string {
  const hash = line.search(/(^|\s)#/);
  return (hash === -1 ? line : line.slice(0, hash)).trim();
}

function parseSpecifiers(raw: string, lineNo: number): VersionSpecifier[] {
  if (raw === "") return [];
  return raw.split(",").map((part) => {
    const match = SPECIFIER_PATTERN.exec(part.trim());
    if (!match) throw new Error(`manifest_malformed:${lineNo}`);
    const operator = toOperator(match[1]);
    const version = match[2];
    if (version.includes("*") && !(operator === "==" || operator === "!=")) throw new Error(`manifest_malformed:${lineNo}`);
    // ~= needs at least major.minor to have an upper bound
    if (operator === "~=" && releaseSegments(version).length < 2) throw new Error(`manifest_malformed:${lineNo}`);
    return { operator, version };
  });
}

function toOperator(raw: string): SpecifierOperator {
  switch (raw) {
    case "===":
    case "==":
    case "!=":
    case "<=":
    case ">=":
    case "~=":
    case "<":
    case ">":
      return raw;
    default:
      throw new Error(`invalid_specifier_operator:${raw}`);
  }
}

/**
 * Parse a requirements manifest into an ordered list of (package, constraint) entries.
 * pip options (`-r`, `--index-url`, ...) and direct URL references are rejected.
 */
export function parseManifest(content: string): DependencyManifest {
  const requirements: Requirement[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNo = index + 1;
    const line = stripComment(rawLine);
    if (line === "") return;
    if (line.startsWith("-")) throw new Error(`manifest_malformed:${lineNo}`);

    const match = REQUIREMENT_PATTERN.exec(line);
    if (!match) throw new Error(`manifest_malformed:${lineNo}`);

    const extras = (match[2] ?? "")
      .split(",")
      .map((extra) => extra.trim())
      .filter((extra) => extra.length > 0);
    if (extras.some((extra) => !EXTRA_PATTERN.test(extra))) throw new Error(`manifest_malformed:${lineNo}`);

    const requirement: Requirement = {
      name: match[1],
      normalizedName: normalizePackageName(match[1]),
      extras,
      specifiers: parseSpecifiers(match[3], lineNo),
      line: lineNo,
    };
    if (match[4]) requirement.marker = match[4].trim();
    requirements.push(requirement);
  });

  return { requirements };
}

function releaseSegments(version: string): number[] {
  const match = /^v?(\d+(?:\.\d+)*)/.exec(version);
  if (!match) return [0];
  return match[1].split(".").map((segment) => Number(segment));
}

/** Compare dotted release numbers; pre/post-release suffixes are ignored. */
export function compareVersions(a: string, b: string): number {
  const left = releaseSegments(a);
  const right = releaseSegments(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

function matchesWildcard(version: string, pattern: string): boolean {
  const prefix = releaseSegments(pattern.replace(/\.?\*$/, ""));
  const segments = releaseSegments(version);
  return prefix.every((value, i) => (segments[i] ?? 0) === value);
}

function compatibleUpperBound(version: string): string {
  const segments = releaseSegments(version);
  if (segments.length < 2) throw new Error(`invalid_compatible_release:${version}`);
  const upper = segments.slice(0, -1);
  upper[upper.length - 1] += 1;
  return upper.join(".");
}

export function satisfies(version: string, specifier: VersionSpecifier): boolean {
  const { operator, version: target } = specifier;
  switch (operator) {
    case "===":
      return version === target;
    case "==":
      return target.includes("*") ? matchesWildcard(version, target) : compareVersions(version, target) === 0;
    case "!=":
      return target.includes("*") ? !matchesWildcard(version, target) : compareVersions(version, target) !== 0;
    case "<=":
      return compareVersions(version, target) <= 0;
    case ">=":
      return compareVersions(version, target) >= 0;
    case "<":
      return compareVersions(version, target) < 0;
    case ">":
      return compareVersions(version, target) > 0;
    case "~=":
      return compareVersions(version, target) >= 0 && compareVersions(version, compatibleUpperBound(target)) < 0;
  }
}

type Bound = { version: string; inclusive: boolean };

function tighterLower(current: Bound | null, next: Bound): Bound {
  if (!current) return next;
  const cmp = compareVersions(next.version, current.version);
  if (cmp > 0 || (cmp === 0 && !next.inclusive)) return next;
  return current;
}

function tighterUpper(current: Bound | null, next: Bound): Bound {
  if (!current) return next;
  const cmp = compareVersions(next.version, current.version);
  if (cmp < 0 || (cmp === 0 && !next.inclusive)) return next;
  return current;
}

function resolveOne(name: string, specifiers: VersionSpecifier[]): ResolvedRequirement {
  const exact = specifiers.filter((s) => (s.operator === "==" || s.operator === "===") && !s.version.includes("*"));
  if (exact.length > 0) {
    const pinned = exact[0].version;
    if (!specifiers.every((s) => satisfies(pinned, s))) throw new Error(`unresolvable_constraint:${name}`);
    return { name, specifiers, pinned };
  }

  let lower: Bound | null = null;
  let upper: Bound | null = null;
  for (const s of specifiers) {
    if (s.operator === ">=") lower = tighterLower(lower, { version: s.version, inclusive: true });
    if (s.operator === ">") lower = tighterLower(lower, { version: s.version, inclusive: false });
    if (s.operator === "<=") upper = tighterUpper(upper, { version: s.version, inclusive: true });
    if (s.operator === "<") upper = tighterUpper(upper, { version: s.version, inclusive: false });
    if (s.operator === "~=") {
      lower = tighterLower(lower, { version: s.version, inclusive: true });
      upper = tighterUpper(upper, { version: compatibleUpperBound(s.version), inclusive: false });
    }
    if (s.operator === "==") {
      const base = s.version.replace(/\.?\*$/, "");
      lower = tighterLower(lower, { version: base, inclusive: true });
      upper = tighterUpper(upper, { version: compatibleUpperBound(`${base}.0`), inclusive: false });
    }
  }

  if (lower && upper) {
    const cmp = compareVersions(lower.version, upper.version);
    if (cmp > 0) throw new Error(`unresolvable_constraint:${name}`);
    if (cmp === 0) {
      if (!lower.inclusive || !upper.inclusive) throw new Error(`unresolvable_constraint:${name}`);
      const only = lower.version;
      if (!specifiers.every((s) => satisfies(only, s))) throw new Error(`unresolvable_constraint:${name}`);
      return { name, specifiers, pinned: only };
    }
  }
  return { name, specifiers };
}

/**
 * Merge repeated entries per package and reject constraint sets no version can satisfy.
 * Order follows first appearance in the manifest.
 */
export function resolveConstraints(manifest: DependencyManifest): ResolvedRequirement[] {
  const grouped = new Map<string, VersionSpecifier[]>();
  for (const requirement of manifest.requirements) {
    const existing = grouped.get(requirement.normalizedName) ?? [];
    grouped.set(requirement.normalizedName, [...existing, ...requirement.specifiers]);
  }
  return Array.from(grouped, ([name, specifiers]) => resolveOne(name, specifiers));
}
