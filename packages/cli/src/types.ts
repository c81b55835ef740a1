import type { SpawnFn } from "@slipway/lib/types.ts";

/** Process surroundings a command runs in. Tests pass their own. */
export type CommandEnv = {
  cwd: string;
  env: Record<string, string | undefined>;
  spawn?: SpawnFn;
};

/** Flags shared by every command that reads a build context. */
export type ProjectOptions = {
  /** Build context directory, relative to the working directory. */
  dir?: string;
  /** Recipe file overriding `SLIPWAY_RECIPE`. */
  recipe?: string;
};

export type InitOptions = ProjectOptions & {
  force?: boolean;
};

export type RenderOptions = ProjectOptions & {
  write?: boolean;
};

export type SimulateOptions = ProjectOptions & {
  offline?: boolean;
};

export type BuildOptions = ProjectOptions & {
  tag?: string;
  noCache?: boolean;
  skipPreflight?: boolean;
  verify?: boolean;
  /** Capture engine output without echoing it. */
  quiet?: boolean;
};

export type VerifyOptions = ProjectOptions & {
  tag: string;
};
