import type { ChildProcess, SpawnOptions } from "node:child_process";

/** Error codes surfaced by the container engine runner. */
export type DockerErrorCode =
  | "daemon_unreachable"
  | "network_unreachable"
  | "manifest_missing"
  | "unresolvable_constraint"
  | "native_build_failed"
  | "permission_denied"
  | "timeout"
  | "unknown";

/** Stable typed codes for preflight check outcomes. */
export type PreflightCode =
  | "manifest_missing"
  | "manifest_malformed"
  | "unresolvable_constraint"
  | "scripts_missing"
  | "app_missing"
  | "entrypoint_missing"
  | "entrypoint_not_executable"
  | "daemon_unavailable"
  | "daemon_check_failed";

/** Whether a preflight issue should block the build or just warn. */
export type PreflightSeverity = "fatal" | "warning";

/** A single typed preflight check outcome. */
export type PreflightIssue = {
  code: PreflightCode;
  severity: PreflightSeverity;
  message: string;
  detail?: string;
  meta?: {
    path?: string;
    line?: number;
    command?: string;
  };
};

/** Aggregate result from all preflight checks. */
export type PreflightResult = {
  ok: boolean;
  issues: PreflightIssue[];
};

/** Spawn function type for dependency injection in the engine runner. */
export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type DockerRunOptions = {
  bin: string;
  cwd?: string;
  timeoutMs?: number;
  /** Tee engine output to the terminal while still capturing it. */
  stream?: boolean;
  env?: Record<string, string | undefined>;
  spawn?: SpawnFn;
};

export type DockerRunResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  code: DockerErrorCode;
};

/** Resolved settings for talking to the container engine and locating build inputs. */
export type BuildConfig = {
  dockerBin: string;
  contextDir: string;
  recipePath: string;
  dockerfilePath: string;
  buildTimeoutMs: number;
};

/** A file found in the build context, relative to its source directory. */
export type ContextFile = {
  path: string;
  executable: boolean;
};

/** The build inputs the recipe copies into the image. `null` means the source is absent from the context. */
export type BuildContext = {
  manifest: string | null;
  scripts: ContextFile[] | null;
  app: ContextFile[] | null;
};

export type VerificationCheck =
  | "toolchain_absent"
  | "db_headers_absent"
  | "runtime_packages_match"
  | "runtime_libraries_present"
  | "service_account"
  | "path_ownership"
  | "volume_mode"
  | "installer_cache_absent"
  | "process_identity";

export type VerificationIssue = {
  check: VerificationCheck;
  message: string;
  detail?: string;
};

export type VerificationReport = {
  ok: boolean;
  issues: VerificationIssue[];
};
