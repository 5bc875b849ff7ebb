#!/usr/bin/env node

import { logger, setVerboseLoggingEnabled } from "../logging/logger.js";
import { runSetupCommand } from "./commands.setup.js";
import { runShellCommand } from "./commands.shell.js";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "./router.js";

export async function runCli(argv: string[]): Promise<number> {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    setVerboseLoggingEnabled(globalOptions.verbose);
    const resolved = resolveCliCommand(globalOptions.args);

    if (resolved.command === "help") {
      logger.info(renderHelp());
      return 0;
    }

    if (resolved.command === "setup") {
      const result = await runSetupCommand(resolved.args);
      logger.info(result.message);
      return result.exitCode ?? 0;
    }

    const result = await runShellCommand(resolved.args);
    logger.info(result.message);
    return result.exitCode ?? 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unexpected CLI failure";
    logger.error(message);
    return 1;
  }
}

const exitCode = await runCli(process.argv.slice(2));
process.exit(exitCode);
