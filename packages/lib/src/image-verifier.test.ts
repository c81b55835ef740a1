import { describe, expect, it } from "vitest";
import { parseManifest } from "./image/manifest.ts";
import { createDefaultRecipe } from "./image/recipe.ts";
import { parseFreezeOutput, verifyBuiltImage } from "./image-verifier.ts";
import { createFakeSpawn, type FakeReply } from "./test-support/fake-spawn.ts";

const recipe = createDefaultRecipe();
const manifest = parseManifest("Django>=4.2,<5.0\npsycopg2>=2.9\nPillow==10.4.0\n");
const TAG = "site:dev";

const OWNERS = "stat -c %n %U /vol/web/media /vol/web/static /scripts /app";

const HEALTHY: Record<string, FakeReply> = {
  "id -un": { stdout: "svc-user\n" },
  "id -u": { stdout: "1000\n" },
  "getent passwd svc-user": { stdout: "svc-user:x:1000:1000::/home/svc-user:/usr/sbin/nologin\n" },
  "getent shadow svc-user": { stdout: "svc-user:!:19800:0:99999:7:::\n" },
  "gcc --version": { exitCode: 127, stderr: "exec: \"gcc\": executable file not found in $PATH\n" },
  "dpkg -s libpq-dev": { exitCode: 1, stderr: "dpkg-query: package 'libpq-dev' is not installed\n" },
  "/py/bin/pip freeze": { stdout: "asgiref==3.8.1\nDjango==4.2.16\npillow==10.4.0\npsycopg2==2.9.9\nsqlparse==0.5.1\n" },
  "dpkg -s libpq5": { stdout: "Status: install ok installed\n" },
  "dpkg -s libjpeg62-turbo": { stdout: "Status: install ok installed\n" },
  "dpkg -s zlib1g": { stdout: "Status: install ok installed\n" },
  "stat -c %a %U /vol": { stdout: "755 svc-user\n" },
  [OWNERS]: { stdout: "/vol/web/media svc-user\n/vol/web/static svc-user\n/scripts svc-user\n/app svc-user\n" },
  "find /var/lib/apt/lists -mindepth 1 -print -quit": { stdout: "" },
  "test -e /tmp/requirements.txt": { exitCode: 1 },
  "test -d /root/.cache/pip": { exitCode: 1 },
};

/** Drop `run --rm [--user u] tag` and look the remaining command up. */
function imageCommand(args: string[]): string {
  const rest = args.slice(2);
  const command = rest[0] === "--user" ? rest.slice(3) : rest.slice(1);
  return command.join(" ");
}

function fakeImage(overrides: Record<string, FakeReply> = {}) {
  const replies = { ...HEALTHY, ...overrides };
  return createFakeSpawn((args) => replies[imageCommand(args)] ?? { exitCode: 1, stderr: "unexpected command\n" });
}

describe("parseFreezeOutput", () => {
  it("normalizes names and keeps versions", () => {
    const installed = parseFreezeOutput("Django==4.2.16\nzope.interface==6.4\nmylib @ file:///src/mylib\n\n");
    expect([...installed]).toEqual([
      ["django", "4.2.16"],
      ["zope-interface", "6.4"],
      ["mylib", "file:///src/mylib"],
    ]);
  });
});

describe("verifyBuiltImage", () => {
  it("passes a lean image that runs as the service account", async () => {
    const fake = fakeImage();
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report).toEqual({ ok: true, issues: [] });
  });

  it("runs privileged probes as the superuser in throwaway containers", async () => {
    const fake = fakeImage();
    await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(fake.calls.every((call) => call.command === "docker" && call.args[0] === "run" && call.args[1] === "--rm")).toBe(true);
    const asRoot = fake.calls.filter((call) => call.args[2] === "--user").map((call) => imageCommand(call.args));
    expect(asRoot).toEqual(["getent shadow svc-user", "test -d /root/.cache/pip"]);
  });

  it("reports an image that still runs as root", async () => {
    const fake = fakeImage({ "id -un": { stdout: "root\n" }, "id -u": { stdout: "0\n" } });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([{ check: "process_identity", message: "image runs as the superuser" }]);
  });

  it("reports a leftover compiler and headers", async () => {
    const fake = fakeImage({
      "gcc --version": { stdout: "gcc (Debian 12.2.0-14) 12.2.0\nCopyright (C) 2022\n" },
      "dpkg -s libpq-dev": { stdout: "Status: install ok installed\n" },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "toolchain_absent", message: "a C compiler is still installed", detail: "gcc (Debian 12.2.0-14) 12.2.0" },
      { check: "db_headers_absent", message: "libpq-dev is still installed" },
    ]);
  });

  it("reports missing packages, wrong pins and purged runtime libraries", async () => {
    const fake = fakeImage({
      "/py/bin/pip freeze": { stdout: "asgiref==3.8.1\nDjango==4.2.16\npillow==10.3.0\nsqlparse==0.5.1\n" },
      "dpkg -s libpq5": { exitCode: 1 },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "runtime_packages_match", message: "installed packages differ from the manifest", detail: "missing: psycopg2" },
      { check: "runtime_packages_match", message: "pillow 10.3.0 is installed", detail: "expected 10.4.0" },
      { check: "runtime_libraries_present", message: "libpq5 is not installed" },
    ]);
  });

  it("reports a writable volume root and foreign ownership", async () => {
    const fake = fakeImage({
      "stat -c %a %U /vol": { stdout: "777 root\n" },
      [OWNERS]: { stdout: "/vol/web/media svc-user\n/vol/web/static svc-user\n/scripts root\n/app svc-user\n" },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "volume_mode", message: "/vol has mode 777", detail: "expected 755" },
      { check: "volume_mode", message: "/vol is owned by root" },
      { check: "path_ownership", message: "/scripts is not owned by svc-user", detail: "root" },
    ]);
  });

  it("reports packages the manifest does not pull in, ignoring the package tooling", async () => {
    const fake = fakeImage({
      "/py/bin/pip freeze": {
        stdout: "asgiref==3.8.1\nDjango==4.2.16\npillow==10.4.0\npsycopg2==2.9.9\nrequests==2.32.3\nsetuptools==75.1.0\nsqlparse==0.5.1\nwheel==0.44.0\n",
      },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "runtime_packages_match", message: "installed packages differ from the manifest", detail: "unexpected: requests" },
    ]);
  });

  it("attributes owners by path when a directory is missing", async () => {
    const fake = fakeImage({
      [OWNERS]: { exitCode: 1, stdout: "/vol/web/media svc-user\n/scripts svc-user\n/app root\n", stderr: "stat: cannot statx '/vol/web/static': No such file or directory\n" },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "path_ownership", message: "/vol/web/static does not exist" },
      { check: "path_ownership", message: "/app is not owned by svc-user", detail: "root" },
    ]);
  });

  it("reports an interactive shell even when the recipe asks for it", async () => {
    const fake = fakeImage({
      "getent passwd svc-user": { stdout: "svc-user:x:1000:1000::/home/svc-user:/bin/bash\n" },
    });
    const loginRecipe = { ...recipe, serviceShell: "/bin/bash" };
    const report = await verifyBuiltImage(TAG, loginRecipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "service_account", message: "svc-user has an interactive shell", detail: "/bin/bash" },
    ]);
  });

  it("reports installer leftovers", async () => {
    const fake = fakeImage({
      "find /var/lib/apt/lists -mindepth 1 -print -quit": { stdout: "/var/lib/apt/lists/lock\n" },
      "test -d /root/.cache/pip": { exitCode: 0 },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues.map((issue) => issue.message)).toEqual([
      "package index lists remain in the image",
      "package download cache remains in the image",
    ]);
  });

  it("reports an account with a login shell and password", async () => {
    const fake = fakeImage({
      "getent passwd svc-user": { stdout: "svc-user:x:1000:1000::/home/svc-user:/bin/bash\n" },
      "getent shadow svc-user": { stdout: "svc-user:$y$j9T$placeholder:19800:0:99999:7:::\n" },
    });
    const report = await verifyBuiltImage(TAG, recipe, manifest, { bin: "docker", spawn: fake.spawn });
    expect(report.issues).toEqual([
      { check: "service_account", message: "svc-user has an interactive shell", detail: "/bin/bash" },
      { check: "service_account", message: "svc-user can log in with a password" },
    ]);
  });
});
