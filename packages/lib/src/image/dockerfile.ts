import type { ProvisionPlan } from "./pipeline.ts";
import type { Instruction, ShellCommand, StepId } from "./steps.ts";

const INDENT = "    ";
const LIST_INDENT = "        ";
const ENV_SAFE_VALUE = /^[A-Za-z0-9_./-]+$/;

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, "\\$&")}"`;
}

function formatEnvValue(value: string): string {
  return ENV_SAFE_VALUE.test(value) ? value : quote(value);
}

/** The command as `set -x` would echo it, without the leading `+ `. */
export function shellCommandText(command: ShellCommand): string {
  return [...command.words, ...(command.list ?? [])].join(" ");
}

export function renderInstruction(instruction: Exclude<Instruction, { kind: "RUN" }>): string {
  switch (instruction.kind) {
    case "ENV":
      return `ENV ${instruction.key}=${formatEnvValue(instruction.value)}`;
    case "COPY":
      return `COPY ./${instruction.source} ${instruction.target}`;
    case "WORKDIR":
      return `WORKDIR ${instruction.path}`;
    case "EXPOSE":
      return `EXPOSE ${instruction.port}`;
    case "USER":
      return `USER ${instruction.user}`;
    case "CMD":
      return `CMD ${JSON.stringify(instruction.argv)}`;
  }
}

type RunInstruction = Extract<Instruction, { kind: "RUN" }>;

/** Merge consecutive RUN instructions into a single strict-mode layer. */
function renderRunLayer(runs: RunInstruction[]): string[] {
  const lines = ["RUN set -eux; \\"];
  const commands = runs.flatMap((run, runIndex) =>
    run.commands.map((command, commandIndex) => ({
      command,
      separated: run.separated && runIndex > 0 && commandIndex === 0,
    })),
  );

  commands.forEach(({ command, separated }, index) => {
    const terminator = index === commands.length - 1 ? "" : "; \\";
    if (separated) lines.push(`${INDENT}\\`);
    if (command.comment) lines.push(`${INDENT}# ${command.comment}`);
    const head = `${INDENT}${command.words.join(" ")}`;
    const list = command.list ?? [];
    if (list.length === 0) {
      lines.push(`${head}${terminator}`);
      return;
    }
    lines.push(`${head} \\`);
    list.forEach((item, itemIndex) => {
      lines.push(`${LIST_INDENT}${item}${itemIndex === list.length - 1 ? terminator : " \\"}`);
    });
  });
  return lines;
}

/** Render the plan as a Dockerfile. Every provisioning command runs inside one `set -eux` layer. */
export function renderDockerfile(plan: ProvisionPlan): string {
  const { recipe } = plan;
  const lines = [`FROM ${recipe.baseImage}`];
  for (const [key, value] of Object.entries(recipe.labels)) lines.push(`LABEL ${key}=${quote(value)}`);

  let pendingRuns: RunInstruction[] = [];
  const flushRuns = (): void => {
    if (pendingRuns.length > 0) lines.push(...renderRunLayer(pendingRuns));
    pendingRuns = [];
  };

  for (const step of plan.steps) {
    for (const instruction of step.instructions(recipe)) {
      if (instruction.kind === "RUN") {
        pendingRuns.push(instruction);
        continue;
      }
      flushRuns();
      lines.push(renderInstruction(instruction));
    }
  }
  flushRuns();
  return `${lines.join("\n")}\n`;
}

const TRACE_LINE = /^(?:#\d+\s+[\d.]+\s+)?\+ (.*)$/;
const STAGE_LINE = /^#\d+\s+\[[^\]]*\d+\/\d+\]\s+(.*)$/;

function normalizeCommand(text: string): string {
  return text.replace(/["']/g, "").replace(/\s+/g, " ").trim();
}

function commandMatchesTrace(command: ShellCommand, trace: string): boolean {
  if (normalizeCommand(shellCommandText(command)) === trace) return true;
  const words = [...command.words, ...(command.list ?? [])];
  const globIndex = words.findIndex((word) => word.includes("*"));
  if (globIndex <= 0) return false;
  return trace.startsWith(`${normalizeCommand(words.slice(0, globIndex).join(" "))} `);
}

function lastMatch(lines: string[], pattern: RegExp): string | null {
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = pattern.exec(lines[i].trimEnd());
    if (match) return normalizeCommand(match[1]);
  }
  return null;
}

/**
 * Map engine output back to the step that failed: the last strict-mode trace
 * line names the failing command; without one, the last build stage header
 * names the failing instruction.
 */
export function locateFailedStep(output: string, plan: ProvisionPlan): StepId | null {
  const lines = output.split(/\r?\n/);

  const trace = lastMatch(lines, TRACE_LINE);
  if (trace !== null) {
    for (const step of plan.steps) {
      for (const instruction of step.instructions(plan.recipe)) {
        if (instruction.kind !== "RUN") continue;
        if (instruction.commands.some((command) => commandMatchesTrace(command, trace))) return step.id;
      }
    }
  }

  const stage = lastMatch(lines, STAGE_LINE);
  if (stage !== null) {
    for (const step of plan.steps) {
      for (const instruction of step.instructions(plan.recipe)) {
        if (instruction.kind === "RUN") continue;
        if (normalizeCommand(renderInstruction(instruction)) === stage) return step.id;
      }
    }
  }
  return null;
}
