import { describe, expect, it } from "vitest";
import {
  compareVersions,
  normalizePackageName,
  parseManifest,
  resolveConstraints,
  satisfies,
} from "./manifest.ts";

describe("parseManifest", () => {
  it("keeps entries in file order and skips comments and blank lines", () => {
    const manifest = parseManifest([
      "# web stack",
      "Django>=4.2,<5.0",
      "psycopg2-binary==2.9.9  # db driver",
      "Pillow[jpeg] ; python_version >= \"3.10\"",
      "",
      "celery",
    ].join("\n"));

    expect(manifest.requirements.map((r) => [r.name, r.line])).toEqual([
      ["Django", 2],
      ["psycopg2-binary", 3],
      ["Pillow", 4],
      ["celery", 6],
    ]);
    expect(manifest.requirements[0].normalizedName).toBe("django");
    expect(manifest.requirements[0].specifiers).toEqual([
      { operator: ">=", version: "4.2" },
      { operator: "<", version: "5.0" },
    ]);
    expect(manifest.requirements[2].extras).toEqual(["jpeg"]);
    expect(manifest.requirements[2].marker).toBe("python_version >= \"3.10\"");
    expect(manifest.requirements[3].specifiers).toEqual([]);
  });

  it("accepts CRLF line endings", () => {
    const manifest = parseManifest("gunicorn\r\nredis>=5\r\n");
    expect(manifest.requirements.map((r) => r.normalizedName)).toEqual(["gunicorn", "redis"]);
  });

  it("rejects installer options with the offending line number", () => {
    expect(() => parseManifest("django\n-r base.txt\n")).toThrow("manifest_malformed:2");
    expect(() => parseManifest("--index-url http://mirror.invalid/simple\n")).toThrow("manifest_malformed:1");
  });

  it("rejects malformed specifiers and direct references", () => {
    expect(() => parseManifest("django>>1\n")).toThrow("manifest_malformed:1");
    expect(() => parseManifest("\nhttps://example.invalid/pkg.whl\n")).toThrow("manifest_malformed:2");
    expect(() => parseManifest("django>=4.*\n")).toThrow("manifest_malformed:1");
  });

  it("rejects a compatible release without a minor version", () => {
    expect(() => parseManifest("Django>=4.2\nrequests~=2\n")).toThrow("manifest_malformed:2");
    expect(parseManifest("requests~=2.31\n").requirements[0].specifiers).toEqual([{ operator: "~=", version: "2.31" }]);
  });
});

describe("normalizePackageName", () => {
  it("lowercases and collapses separator runs", () => {
    expect(normalizePackageName("Django_REST.framework")).toBe("django-rest-framework");
    expect(normalizePackageName("zope..interface")).toBe("zope-interface");
  });
});

describe("compareVersions", () => {
  it("compares release segments numerically", () => {
    expect(compareVersions("1.10", "1.9")).toBe(1);
    expect(compareVersions("2.0", "2")).toBe(0);
    expect(compareVersions("1.2.3", "1.2.10")).toBe(-1);
  });
});

describe("satisfies", () => {
  it("handles compatible-release and wildcard specifiers", () => {
    expect(satisfies("4.2.1", { operator: "~=", version: "4.2" })).toBe(true);
    expect(satisfies("5.0", { operator: "~=", version: "4.2" })).toBe(false);
    expect(satisfies("4.9", { operator: "==", version: "4.*" })).toBe(true);
    expect(satisfies("5.0", { operator: "!=", version: "4.*" })).toBe(true);
  });
});

describe("resolveConstraints", () => {
  it("merges repeated entries for the same package", () => {
    const resolved = resolveConstraints(parseManifest("Django>=4.2\nredis\ndjango<5.0\n"));
    expect(resolved).toEqual([
      {
        name: "django",
        specifiers: [
          { operator: ">=", version: "4.2" },
          { operator: "<", version: "5.0" },
        ],
      },
      { name: "redis", specifiers: [] },
    ]);
  });

  it("pins packages with an exact version", () => {
    const [pillow] = resolveConstraints(parseManifest("Pillow==10.4.0\n"));
    expect(pillow.pinned).toBe("10.4.0");
  });

  it("pins a range that admits a single version", () => {
    const [six] = resolveConstraints(parseManifest("six>=1.16,<=1.16\n"));
    expect(six.pinned).toBe("1.16");
  });

  it("rejects a pin that contradicts another constraint", () => {
    expect(() => resolveConstraints(parseManifest("requests==2.31.0\nrequests>=2.32\n"))).toThrow(
      "unresolvable_constraint:requests",
    );
  });

  it("rejects empty ranges", () => {
    expect(() => resolveConstraints(parseManifest("celery>=5.4\ncelery<5.3\n"))).toThrow("unresolvable_constraint:celery");
    expect(() => resolveConstraints(parseManifest("six>1.16,<=1.16\n"))).toThrow("unresolvable_constraint:six");
  });

  it("leaves wildcard ranges unpinned", () => {
    const [django] = resolveConstraints(parseManifest("Django==4.2.*\n"));
    expect(django.pinned).toBeUndefined();
  });
});
