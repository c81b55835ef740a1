import { spawn as nodeSpawn, type ChildProcess } from "node:child_process";
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { locateFailedStep, renderDockerfile } from "./image/dockerfile.ts";
import type { ProvisionPlan } from "./image/pipeline.ts";
import type { StepId } from "./image/steps.ts";
import { createLogger } from "./shared/logger.ts";
import type { BuildConfig, DockerErrorCode, DockerRunOptions, DockerRunResult, SpawnFn } from "./types.ts";

export type { DockerErrorCode, DockerRunOptions, DockerRunResult };

const log = createLogger("docker");

const errorMatchers: Array<{ pattern: RegExp; code: DockerErrorCode }> = [
  { pattern: /Cannot connect to the Docker daemon|error during connect|Is the docker daemon running/i, code: "daemon_unreachable" },
  { pattern: /permission denied|access denied/i, code: "permission_denied" },
  { pattern: /Temporary failure resolving|Could not resolve|Failed to establish a new connection|Network is unreachable|Connection timed out/i, code: "network_unreachable" },
  { pattern: /requirements\.txt.*not found|Could not open requirements file|failed to compute cache key/i, code: "manifest_missing" },
  { pattern: /No matching distribution found|ResolutionImpossible|conflicting dependencies/i, code: "unresolvable_constraint" },
  { pattern: /error: command '[^']*' failed|fatal error: \S+\.h: No such file|pg_config executable not found|Failed building wheel/i, code: "native_build_failed" },
];

export function classifyError(output: string): DockerErrorCode {
  for (const matcher of errorMatchers) {
    if (matcher.pattern.test(output)) return matcher.code;
  }
  return "unknown";
}

function chunkText(chunk: Buffer | string): string {
  return typeof chunk === "string" ? chunk : chunk.toString("utf8");
}

/**
 * Run the container engine CLI once. Failures are classified but never
 * retried: a build that fails on a transient error fails.
 */
export function runDocker(args: readonly string[], options: DockerRunOptions): Promise<DockerRunResult> {
  const stream = options.stream ?? false;
  const timeoutMs = options.timeoutMs ?? (stream ? 0 : 30_000);
  const controller = timeoutMs > 0 ? new AbortController() : undefined;
  const spawn: SpawnFn = options.spawn ?? nodeSpawn;

  return new Promise((resolve) => {
    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const stdout: string[] = [];
    const stderr: string[] = [];

    const settle = (result: DockerRunResult): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve(result);
    };

    const fail = (error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      const code: DockerErrorCode = controller?.signal.aborted === true ? "timeout" : classifyError(message);
      settle({ ok: false, exitCode: 1, stdout: stdout.join(""), stderr: stderr.join("") || message, code });
    };

    let child: ChildProcess;
    try {
      child = spawn(options.bin, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        signal: controller?.signal,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      fail(error);
      return;
    }

    if (controller) timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      const text = chunkText(chunk);
      stdout.push(text);
      if (stream) process.stdout.write(text);
    });
    child.stderr?.on("data", (chunk: Buffer | string) => {
      const text = chunkText(chunk);
      stderr.push(text);
      if (stream) process.stderr.write(text);
    });
    child.on("error", fail);
    child.on("close", (exitCode: number | null) => {
      if (controller?.signal.aborted === true) {
        fail(new Error(`${options.bin} ${args[0] ?? ""} timed out after ${timeoutMs}ms`));
        return;
      }
      const out = stdout.join("");
      const err = stderr.join("");
      const code = exitCode ?? 1;
      if (code === 0) {
        settle({ ok: true, exitCode: 0, stdout: out, stderr: err, code: "unknown" });
        return;
      }
      settle({ ok: false, exitCode: code, stdout: out, stderr: err, code: classifyError(`${err}\n${out}`) });
    });
  });
}

export type BuildImageOptions = {
  config: BuildConfig;
  tag: string;
  noCache?: boolean;
  stream?: boolean;
  spawn?: SpawnFn;
};

export type BuildImageResult =
  | { ok: true; tag: string; dockerfilePath: string }
  | {
      ok: false;
      tag: string;
      dockerfilePath: string;
      code: DockerErrorCode;
      exitCode: number;
      /** Step whose command was running when the build stopped, when it can be told. */
      failedStep: StepId | null;
      output: string;
    };

export function buildArgs(config: BuildConfig, tag: string, noCache = false): string[] {
  const args = ["build", "--progress=plain", "-f", config.dockerfilePath, "-t", tag];
  if (noCache) args.push("--no-cache");
  return [...args, config.contextDir];
}

/** Write the rendered Dockerfile and build it with the container engine. */
export async function buildImage(plan: ProvisionPlan, options: BuildImageOptions): Promise<BuildImageResult> {
  const { config, tag } = options;
  mkdirSync(dirname(config.dockerfilePath), { recursive: true });
  writeFileSync(config.dockerfilePath, renderDockerfile(plan), "utf8");

  log.info("build_started", { tag, dockerfile: config.dockerfilePath });
  const result = await runDocker(buildArgs(config, tag, options.noCache), {
    bin: config.dockerBin,
    cwd: config.contextDir,
    timeoutMs: config.buildTimeoutMs,
    stream: options.stream,
    spawn: options.spawn,
  });

  if (result.ok) {
    log.info("build_completed", { tag });
    return { ok: true, tag, dockerfilePath: config.dockerfilePath };
  }

  const output = `${result.stdout}\n${result.stderr}`;
  const failedStep = locateFailedStep(output, plan);
  log.error("build_failed", { tag, code: result.code, exitCode: result.exitCode, step: failedStep });
  return {
    ok: false,
    tag,
    dockerfilePath: config.dockerfilePath,
    code: result.code,
    exitCode: result.exitCode,
    failedStep,
    output,
  };
}
