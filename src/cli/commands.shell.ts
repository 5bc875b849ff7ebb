import { resolve } from "node:path";
import {
  renderContainerPlanLines,
  runContainerWorkflow,
  type ContainerWorkflowResult,
  type RunContainerWorkflowOptions
} from "../container/workflow.js";
import { loadConfigWithMetadata, type LoadConfigOptions, type LoadedTestbedConfig } from "../config/load.js";
import type { ResolvedTestbedConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";
import type { CommandResult } from "../types/index.js";
import { parseWorkflowCommandArgs } from "./command-args.js";
import { loadCliEnvSource, resolvePassThroughEnv, type EnvSource } from "./env-source.js";
import { logPipelineEvent } from "./pipeline-progress.js";

export interface ShellCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<LoadedTestbedConfig>;
  loadEnvSource: (envPath: string) => Promise<EnvSource>;
  runContainerWorkflow: (
    config: Pick<ResolvedTestbedConfig, "container">,
    options?: RunContainerWorkflowOptions
  ) => Promise<ContainerWorkflowResult>;
  cwd: () => string;
}

const defaultDeps: ShellCommandDeps = {
  loadConfig: loadConfigWithMetadata,
  loadEnvSource: loadCliEnvSource,
  runContainerWorkflow,
  cwd: () => process.cwd()
};

export async function runShellCommand(args: string[], deps: ShellCommandDeps = defaultDeps): Promise<CommandResult> {
  const parsed = parseWorkflowCommandArgs("shell", args);
  const cwd = deps.cwd();
  const loaded = await deps.loadConfig({ configPath: parsed.configPath, cwd });
  logger.verbose(loaded.configPath ? `Using ${loaded.scope} config ${loaded.configPath}` : "No config file found; using defaults");

  const envSource = await deps.loadEnvSource(resolve(cwd, ".env"));
  const passThroughEnv = resolvePassThroughEnv(loaded.config.env.pass_through, envSource);
  const missing = loaded.config.env.pass_through.filter((name) => !(name in passThroughEnv));
  if (missing.length > 0) {
    logger.warn(`Not forwarding unset env vars: ${missing.join(", ")}`);
  }

  if (parsed.dryRun) {
    return {
      message: [
        "Container plan (dry run):",
        ...renderContainerPlanLines(loaded.config, cwd, { passThroughEnv }).map((line) => `  ${line}`)
      ].join("\n"),
      exitCode: 0
    };
  }

  const result = await deps.runContainerWorkflow(loaded.config, {
    cwd,
    passThroughEnv,
    onEvent: logPipelineEvent
  });

  if (!result.interactive) {
    return {
      message: `Shell smoke check in image ${result.tag}: ${result.smokeOutput ?? "no output"}`,
      exitCode: result.exitCode
    };
  }

  return {
    message: `Shell session in image ${result.tag} ended with exit code ${result.exitCode}.`,
    exitCode: result.exitCode
  };
}
