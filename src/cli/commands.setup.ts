import { loadConfigWithMetadata, type LoadConfigOptions, type LoadedTestbedConfig } from "../config/load.js";
import type { ResolvedTestbedConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";
import {
  renderSetupPlanLines,
  runSetupWorkflow,
  type RunSetupWorkflowOptions,
  type SetupWorkflowResult
} from "../setup/workflow.js";
import type { CommandResult } from "../types/index.js";
import { parseWorkflowCommandArgs } from "./command-args.js";
import { logPipelineEvent } from "./pipeline-progress.js";

export interface SetupCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<LoadedTestbedConfig>;
  runSetupWorkflow: (
    config: Pick<ResolvedTestbedConfig, "setup">,
    options?: RunSetupWorkflowOptions
  ) => Promise<SetupWorkflowResult>;
  cwd: () => string;
}

const defaultDeps: SetupCommandDeps = {
  loadConfig: loadConfigWithMetadata,
  runSetupWorkflow,
  cwd: () => process.cwd()
};

export async function runSetupCommand(args: string[], deps: SetupCommandDeps = defaultDeps): Promise<CommandResult> {
  const parsed = parseWorkflowCommandArgs("setup", args);
  const cwd = deps.cwd();
  const loaded = await deps.loadConfig({ configPath: parsed.configPath, cwd });
  logger.verbose(loaded.configPath ? `Using ${loaded.scope} config ${loaded.configPath}` : "No config file found; using defaults");

  if (parsed.dryRun) {
    return {
      message: ["Setup plan (dry run):", ...renderSetupPlanLines(loaded.config, cwd).map((line) => `  ${line}`)].join("\n"),
      exitCode: 0
    };
  }

  const result = await deps.runSetupWorkflow(loaded.config, {
    cwd,
    onEvent: logPipelineEvent
  });

  if (!result.pipeline.success) {
    const failed = result.pipeline.steps.filter((step) => !step.success).map((step) => step.step);
    return {
      message: `Setup finished with failed steps: ${failed.join(", ")}.`,
      exitCode: 1
    };
  }

  return {
    message: `Setup complete: ${result.cloneDirectory} is on branch '${result.branch}' (virtualenv ${result.venvPath}).`,
    exitCode: 0
  };
}
