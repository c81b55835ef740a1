export type {
  BuildConfig,
  BuildContext,
  ContextFile,
  DockerErrorCode,
  DockerRunOptions,
  DockerRunResult,
  PreflightCode,
  PreflightIssue,
  PreflightResult,
  PreflightSeverity,
  SpawnFn,
  VerificationCheck,
  VerificationIssue,
  VerificationReport,
} from "./types.ts";

export { DEFAULT_DOCKERFILE, DEFAULT_RECIPE_FILE, loadBuildConfig } from "./config.ts";
export { parseEnvContent, readEnvFile } from "./env.ts";
export { listContextFiles, loadBuildContext } from "./context.ts";

export {
  createDefaultRecipe,
  ensureRecipe,
  isPinnedImage,
  parseRecipe,
  parseRecipeYaml,
  readRecipe,
  runtimeEnvironment,
  stringifyRecipe,
  writeRecipe,
} from "./image/recipe.ts";
export type { ImageRecipe } from "./image/recipe.ts";

export {
  compareVersions,
  normalizePackageName,
  parseManifest,
  resolveConstraints,
  satisfies,
} from "./image/manifest.ts";
export type { DependencyManifest, Requirement, ResolvedRequirement, VersionSpecifier } from "./image/manifest.ts";

export {
  aptDependencyClosure,
  describePythonPackage,
  loadAptCatalog,
  loadPythonCatalog,
  packagesWithRole,
  resolvePackageClosure,
} from "./image/catalog.ts";
export type { AptCatalog, AptRole, PythonCatalog } from "./image/catalog.ts";

export { createBaseImageState, formatMode } from "./image/image-state.ts";
export type { ImageState } from "./image/image-state.ts";

export { dropPrivileges, handOff, initialIdentity, requirePrivilege } from "./image/identity.ts";
export type { IdentityPhase, IdentityState } from "./image/identity.ts";

export { applyStep, PROVISION_STEPS } from "./image/steps.ts";
export type { Instruction, ProvisionStep, StepContext, StepId, StepResult } from "./image/steps.ts";

export { createProvisionPlan, runPipeline, simulateBuild } from "./image/pipeline.ts";
export type { PipelineResult, ProvisionPlan, SimulateOptions } from "./image/pipeline.ts";

export { locateFailedStep, renderDockerfile, shellCommandText } from "./image/dockerfile.ts";
export { verifyImageState } from "./image/verify.ts";

export { buildImage, classifyError, runDocker } from "./docker-runner.ts";
export type { BuildImageOptions, BuildImageResult } from "./docker-runner.ts";
export { verifyBuiltImage } from "./image-verifier.ts";
export { checkBuildContext, checkDaemonRunning, runPreflightChecks } from "./preflight.ts";

export { createLogger } from "./shared/logger.ts";
export type { Logger, LogLevel } from "./shared/logger.ts";
