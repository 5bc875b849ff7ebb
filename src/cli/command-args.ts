import { readFlagValue } from "../utils/argv.js";

export interface WorkflowCommandArgs {
  configPath?: string;
  dryRun: boolean;
}

export function parseWorkflowCommandArgs(command: string, args: string[]): WorkflowCommandArgs {
  const parsed: WorkflowCommandArgs = { dryRun: false };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    if (token === "--config") {
      parsed.configPath = readFlagValue(args, index, "--config");
      index += 1;
      continue;
    }

    if (token === "--dry-run") {
      parsed.dryRun = true;
      continue;
    }

    throw new Error(`Unexpected argument for ${command}: ${token}. Use --help for usage.`);
  }

  return parsed;
}
