import { resolve } from "node:path";
import type { ResolvedContainerConfig, ResolvedTestbedConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";
import {
  formatCommandLine,
  runPipeline,
  type PipelineEvent,
  type PipelineResult,
  type StepCommandExecutor,
  type StepDefinition
} from "../pipeline/runner.js";
import { createProcessExecutor } from "../process/executor.js";
import { toEnvRecord } from "../utils/env.js";
import { pathExists, resolveHostPath } from "../utils/paths.js";

export const CONTAINER_STEPS = ["build-image", "run-shell"] as const;

export type ContainerStepName = (typeof CONTAINER_STEPS)[number];

const SHELL_SMOKE_SCRIPT = "echo shell-ready";

export interface ContainerRunLayout {
  cwd: string;
  gitconfigHostPath: string | null;
  passThroughEnv: Record<string, string>;
  interactive: boolean;
}

export interface RunContainerWorkflowOptions {
  cwd?: string;
  env?: Record<string, string>;
  homeDir?: string;
  passThroughEnv?: Record<string, string>;
  isInteractiveTerminal?: () => boolean;
  pathExists?: (path: string) => Promise<boolean>;
  executor?: StepCommandExecutor;
  onEvent?: (event: PipelineEvent<ContainerStepName>) => void;
}

export interface ContainerWorkflowResult {
  tag: string;
  interactive: boolean;
  exitCode: number;
  smokeOutput?: string;
  pipeline: PipelineResult<ContainerStepName>;
}

export function buildImageArgs(container: ResolvedContainerConfig, cwd: string): string[] {
  const args = ["build", "-t", container.tag];
  if (container.dockerfile.trim() !== "") {
    args.push("-f", resolve(cwd, container.dockerfile));
  }
  args.push(container.context);
  return args;
}

export function buildRunArgs(container: ResolvedContainerConfig, layout: ContainerRunLayout): string[] {
  const args = ["run"];
  if (layout.gitconfigHostPath) {
    args.push("-v", `${layout.gitconfigHostPath}:${container.gitconfig_target}`);
  }
  args.push("-v", `${layout.cwd}:${container.workdir}`, "--rm");
  if (layout.interactive) {
    args.push("-it");
  }

  // Values reach the runtime through its own environment, not argv.
  for (const name of Object.keys(layout.passThroughEnv)) {
    args.push("-e", name);
  }

  args.push(container.tag);
  if (layout.interactive) {
    args.push(container.shell);
  } else {
    args.push(container.shell, "-lc", SHELL_SMOKE_SCRIPT);
  }
  return args;
}

export function buildContainerSteps(
  config: Pick<ResolvedTestbedConfig, "container">,
  context: {
    homeDir?: string;
    passThroughEnv: Record<string, string>;
    interactive: boolean;
    pathExists: (path: string) => Promise<boolean>;
  }
): StepDefinition<ContainerStepName>[] {
  const container = config.container;

  return [
    {
      step: "build-image",
      async plan(state) {
        return {
          kind: "command",
          command: {
            program: container.runtime,
            args: buildImageArgs(container, state.cwd),
            cwd: state.cwd,
            env: state.env
          }
        };
      }
    },
    {
      step: "run-shell",
      async plan(state) {
        const gitconfigPath = resolveHostPath(container.gitconfig_path, { homeDir: context.homeDir, cwd: state.cwd });
        const gitconfigExists = await context.pathExists(gitconfigPath);
        if (!gitconfigExists) {
          logger.warn(`Git config '${gitconfigPath}' not found; starting the container without it.`);
        }

        return {
          kind: "command",
          acceptAnyExitCode: context.interactive,
          command: {
            program: container.runtime,
            args: buildRunArgs(container, {
              cwd: state.cwd,
              gitconfigHostPath: gitconfigExists ? gitconfigPath : null,
              passThroughEnv: context.passThroughEnv,
              interactive: context.interactive
            }),
            cwd: state.cwd,
            env: {
              ...state.env,
              ...context.passThroughEnv
            },
            stdio: context.interactive ? "inherit" : "pipe"
          }
        };
      }
    }
  ];
}

export async function runContainerWorkflow(
  config: Pick<ResolvedTestbedConfig, "container">,
  options: RunContainerWorkflowOptions = {}
): Promise<ContainerWorkflowResult> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? toEnvRecord(process.env);
  const isInteractiveTerminal = options.isInteractiveTerminal ?? (() => Boolean(process.stdin.isTTY && process.stdout.isTTY));
  const interactive = isInteractiveTerminal();

  const steps = buildContainerSteps(config, {
    homeDir: options.homeDir,
    passThroughEnv: options.passThroughEnv ?? {},
    interactive,
    pathExists: options.pathExists ?? pathExists
  });

  const pipeline = await runPipeline(steps, { cwd, env }, options.executor ?? createProcessExecutor(), {
    onEvent: options.onEvent
  });

  const runSummary = pipeline.steps.find((summary) => summary.step === "run-shell");
  const smokeOutput = interactive ? undefined : runSummary?.output?.trim() || "no output";

  return {
    tag: config.container.tag,
    interactive,
    exitCode: runSummary?.exitCode ?? 1,
    ...(smokeOutput !== undefined ? { smokeOutput } : {}),
    pipeline
  };
}

export function renderContainerPlanLines(
  config: Pick<ResolvedTestbedConfig, "container">,
  cwd: string,
  options: { homeDir?: string; passThroughEnv?: Record<string, string> } = {}
): string[] {
  const container = config.container;
  const gitconfigHostPath = resolveHostPath(container.gitconfig_path, { homeDir: options.homeDir, cwd });

  return [
    `build-image: ${formatCommandLine({ program: container.runtime, args: buildImageArgs(container, cwd) })}`,
    `run-shell:   ${formatCommandLine({
      program: container.runtime,
      args: buildRunArgs(container, {
        cwd,
        gitconfigHostPath,
        passThroughEnv: options.passThroughEnv ?? {},
        interactive: true
      })
    })}`
  ];
}
