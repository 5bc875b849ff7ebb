import { join, resolve } from "node:path";
import type { ResolvedSetupConfig, ResolvedTestbedConfig } from "../config/schema.js";
import {
  formatCommandLine,
  runPipeline,
  type PipelineEvent,
  type PipelineResult,
  type PipelineState,
  type StepCommand,
  type StepCommandExecutor,
  type StepDefinition
} from "../pipeline/runner.js";
import type { SleepFn } from "../pipeline/retry.js";
import { createProcessExecutor } from "../process/executor.js";
import { toEnvRecord } from "../utils/env.js";
import { deriveCloneDirectoryName, pathExists } from "../utils/paths.js";
import { activateVirtualEnv } from "./virtualenv.js";

export const SETUP_STEPS = [
  "clone",
  "create-venv",
  "activate-venv",
  "install-deps",
  "enter-repo",
  "create-branch",
  "reinstall-deps"
] as const;

export type SetupStepName = (typeof SETUP_STEPS)[number];

export interface SetupWorkspaceProbes {
  pathExists: (path: string) => Promise<boolean>;
  isGitRepo: (path: string) => Promise<boolean>;
  branchExists: (repoPath: string, branch: string, state: PipelineState) => Promise<boolean>;
}

export interface SetupWorkflowContext {
  cwd: string;
  platform?: NodeJS.Platform;
  probes: SetupWorkspaceProbes;
}

export interface RunSetupWorkflowOptions {
  cwd?: string;
  env?: Record<string, string>;
  platform?: NodeJS.Platform;
  executor?: StepCommandExecutor;
  probes?: Partial<SetupWorkspaceProbes>;
  sleep?: SleepFn;
  onEvent?: (event: PipelineEvent<SetupStepName>) => void;
}

export interface SetupWorkflowResult {
  cloneDirectory: string;
  venvPath: string;
  branch: string;
  pipeline: PipelineResult<SetupStepName>;
}

export interface SetupLayout {
  cloneDirectory: string;
  venvPath: string;
}

export function resolveSetupLayout(setup: ResolvedSetupConfig, cwd: string): SetupLayout {
  const directory = setup.directory.trim() === "" ? deriveCloneDirectoryName(setup.repo_url) : setup.directory;
  return {
    cloneDirectory: resolve(cwd, directory),
    venvPath: resolve(cwd, setup.venv_dir)
  };
}

export function buildSetupSteps(
  config: Pick<ResolvedTestbedConfig, "setup">,
  context: SetupWorkflowContext
): StepDefinition<SetupStepName>[] {
  const setup = config.setup;
  const { cloneDirectory, venvPath } = resolveSetupLayout(setup, context.cwd);
  const probes = context.probes;

  const installCommand = (state: PipelineState): StepCommand => ({
    program: "pip",
    args: ["install", "-r", setup.manifest],
    cwd: state.cwd,
    env: state.env
  });

  return [
    {
      step: "clone",
      async plan(state) {
        if (await probes.pathExists(cloneDirectory)) {
          if (!setup.reuse_existing) {
            throw new Error(`Clone target '${cloneDirectory}' already exists and setup.reuse_existing is false.`);
          }
          if (!(await probes.isGitRepo(cloneDirectory))) {
            throw new Error(`Clone target '${cloneDirectory}' already exists and is not a git repository.`);
          }
          return { kind: "skip", reason: `reusing existing clone at ${cloneDirectory}` };
        }

        return {
          kind: "command",
          retryable: true,
          command: {
            program: "git",
            args: ["clone", setup.repo_url, cloneDirectory],
            cwd: state.cwd,
            env: state.env
          }
        };
      }
    },
    {
      step: "create-venv",
      async plan(state) {
        if (setup.reuse_existing && (await probes.pathExists(venvPath))) {
          return { kind: "skip", reason: `reusing existing virtualenv at ${venvPath}` };
        }

        const [program, ...args] = splitCommand(setup.venv_command);
        return {
          kind: "command",
          command: {
            program,
            args: [...args, setup.venv_dir],
            cwd: state.cwd,
            env: state.env
          }
        };
      }
    },
    {
      step: "activate-venv",
      async plan(state) {
        return {
          kind: "context",
          detail: `VIRTUAL_ENV=${venvPath}`,
          next: {
            cwd: state.cwd,
            env: activateVirtualEnv(state.env, venvPath, context.platform)
          }
        };
      }
    },
    {
      step: "install-deps",
      async plan(state) {
        return { kind: "command", retryable: true, command: installCommand(state) };
      }
    },
    {
      step: "enter-repo",
      async plan(state) {
        return {
          kind: "context",
          detail: `cwd=${cloneDirectory}`,
          next: {
            cwd: cloneDirectory,
            env: state.env
          }
        };
      }
    },
    {
      step: "create-branch",
      async plan(state) {
        const exists = await probes.branchExists(state.cwd, setup.branch, state);
        return {
          kind: "command",
          command: {
            program: "git",
            args: exists ? ["checkout", setup.branch] : ["checkout", "-b", setup.branch],
            cwd: state.cwd,
            env: state.env
          }
        };
      }
    },
    {
      step: "reinstall-deps",
      async plan(state) {
        return { kind: "command", retryable: true, command: installCommand(state) };
      }
    }
  ];
}

export async function runSetupWorkflow(
  config: Pick<ResolvedTestbedConfig, "setup">,
  options: RunSetupWorkflowOptions = {}
): Promise<SetupWorkflowResult> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? toEnvRecord(process.env);
  const executor = options.executor ?? createProcessExecutor();
  const probes: SetupWorkspaceProbes = {
    ...createDefaultProbes(executor),
    ...(options.probes ?? {})
  };

  const steps = buildSetupSteps(config, {
    cwd,
    platform: options.platform,
    probes
  });
  const layout = resolveSetupLayout(config.setup, cwd);

  const pipeline = await runPipeline(steps, { cwd, env }, executor, {
    retryPolicy: {
      attempts: config.setup.retries + 1,
      delayMs: config.setup.retry_delay_ms
    },
    continueOnError: config.setup.continue_on_error,
    timeoutMs: config.setup.step_timeout_ms > 0 ? config.setup.step_timeout_ms : undefined,
    sleep: options.sleep,
    onEvent: options.onEvent
  });

  return {
    cloneDirectory: layout.cloneDirectory,
    venvPath: layout.venvPath,
    branch: config.setup.branch,
    pipeline
  };
}

/** Command lines the workflow would run on a fresh workspace, in order. */
export function renderSetupPlanLines(config: Pick<ResolvedTestbedConfig, "setup">, cwd: string): string[] {
  const setup = config.setup;
  const { cloneDirectory, venvPath } = resolveSetupLayout(setup, cwd);
  const [venvProgram, ...venvArgs] = splitCommand(setup.venv_command);
  const install = formatCommandLine({ program: "pip", args: ["install", "-r", setup.manifest] });

  return [
    `clone:          ${formatCommandLine({ program: "git", args: ["clone", setup.repo_url, cloneDirectory] })}`,
    `create-venv:    ${formatCommandLine({ program: venvProgram, args: [...venvArgs, setup.venv_dir] })}`,
    `activate-venv:  VIRTUAL_ENV=${venvPath}`,
    `install-deps:   ${install}`,
    `enter-repo:     cd ${cloneDirectory}`,
    `create-branch:  ${formatCommandLine({ program: "git", args: ["checkout", "-b", setup.branch] })}`,
    `reinstall-deps: ${install}`
  ];
}

function createDefaultProbes(executor: StepCommandExecutor): SetupWorkspaceProbes {
  return {
    pathExists,
    async isGitRepo(path) {
      return pathExists(join(path, ".git"));
    },
    async branchExists(repoPath, branch, state) {
      if (!(await pathExists(repoPath))) {
        return false;
      }

      const result = await executor.run(
        {
          program: "git",
          args: ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`],
          cwd: repoPath,
          env: state.env,
          stdio: "pipe"
        },
        {}
      );
      return result.exitCode === 0;
    }
  };
}

function splitCommand(commandLine: string): [string, ...string[]] {
  const [program, ...args] = commandLine.trim().split(/\s+/);
  if (!program) {
    throw new Error("Invalid setup.venv_command: expected a non-empty command.");
  }

  return [program, ...args];
}
