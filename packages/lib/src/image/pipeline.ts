import { createLogger, type Logger } from "../shared/logger.ts";
import type { BuildContext } from "../types.ts";
import { loadAptCatalog, loadPythonCatalog, type AptCatalog, type PythonCatalog } from "./catalog.ts";
import { shellCommandText } from "./dockerfile.ts";
import { createBaseImageState, type ImageState } from "./image-state.ts";
import type { ImageRecipe } from "./recipe.ts";
import { applyStep, PROVISION_STEPS, type ProvisionStep, type StepContext, type StepId } from "./steps.ts";

export type ProvisionPlan = {
  recipe: ImageRecipe;
  steps: readonly ProvisionStep[];
};

export type PipelineContext = Omit<StepContext, "recipe"> & {
  logger?: Logger;
};

export type PipelineResult =
  | { ok: true; state: ImageState; completed: StepId[] }
  | {
      ok: false;
      failedStep: StepId;
      code: string;
      message: string;
      completed: StepId[];
      /** Snapshot after the last step that succeeded. Never a final image. */
      state: ImageState;
    };

export type SimulateOptions = {
  network?: boolean;
  logger?: Logger;
  aptCatalog?: AptCatalog;
  pythonCatalog?: PythonCatalog;
};

export function createProvisionPlan(recipe: ImageRecipe): ProvisionPlan {
  return { recipe, steps: PROVISION_STEPS };
}

function traceCommands(log: Logger, step: ProvisionStep, recipe: ImageRecipe): void {
  for (const instruction of step.instructions(recipe)) {
    if (instruction.kind !== "RUN") continue;
    for (const command of instruction.commands) log.debug(`+ ${shellCommandText(command)}`, { step: step.id });
  }
}

/**
 * Apply each step in plan order. The first failure stops the run: later steps
 * never see a partially provisioned image.
 */
export function runPipeline(plan: ProvisionPlan, initial: ImageState, ctx: PipelineContext): PipelineResult {
  const log = ctx.logger ?? createLogger("pipeline");
  const stepContext: StepContext = {
    recipe: plan.recipe,
    build: ctx.build,
    aptCatalog: ctx.aptCatalog,
    pythonCatalog: ctx.pythonCatalog,
    network: ctx.network,
  };
  const completed: StepId[] = [];
  let state = initial;

  for (const step of plan.steps) {
    log.info("step_started", { step: step.id, phase: step.phase });
    traceCommands(log, step, plan.recipe);
    const result = applyStep(step, state, stepContext);
    if (!result.ok) {
      log.error("step_failed", { step: step.id, code: result.code, message: result.message });
      return { ok: false, failedStep: step.id, code: result.code, message: result.message, completed, state };
    }
    state = result.state;
    completed.push(step.id);
    log.info("step_completed", { step: step.id, identity: state.identity.phase });
  }

  return { ok: true, state, completed };
}

/** Run the whole plan against a fresh base image without a container engine. */
export function simulateBuild(recipe: ImageRecipe, build: BuildContext, options: SimulateOptions = {}): PipelineResult {
  const aptCatalog = options.aptCatalog ?? loadAptCatalog();
  const pythonCatalog = options.pythonCatalog ?? loadPythonCatalog();
  return runPipeline(createProvisionPlan(recipe), createBaseImageState(recipe, aptCatalog), {
    build,
    aptCatalog,
    pythonCatalog,
    network: options.network ?? true,
    logger: options.logger,
  });
}
