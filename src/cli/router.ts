import { isHelpFlag } from "../utils/argv.js";
import type { CliCommandName } from "../types/index.js";

export interface ResolvedCliCommand {
  command: CliCommandName;
  args: string[];
}

export interface GlobalCliOptions {
  args: string[];
  verbose: boolean;
}

const commands: ReadonlySet<string> = new Set<CliCommandName>(["setup", "shell", "help"]);

function isCliCommandName(token: string): token is CliCommandName {
  return commands.has(token);
}

export function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  let verbose = false;
  const args: string[] = [];

  for (const token of argv) {
    if (token === "--verbose") {
      verbose = true;
      continue;
    }

    args.push(token);
  }

  return { args, verbose };
}

export function resolveCliCommand(argv: string[]): ResolvedCliCommand {
  const [first, ...rest] = argv;

  if (!first || isHelpFlag(first)) {
    return { command: "help", args: [] };
  }

  if (isCliCommandName(first)) {
    if (rest.some(isHelpFlag)) {
      return { command: "help", args: [] };
    }
    return { command: first, args: rest };
  }

  throw new Error(`Unknown command: ${first}. Use --help for usage.`);
}

export function renderHelp(): string {
  return [
    "repo-testbed CLI",
    "",
    "Usage:",
    "  repo-testbed <command> [options]",
    "",
    "Config resolution:",
    "  --config <path> -> ./testbed.config.toml -> user config testbed.config.toml -> built-in defaults",
    "",
    "Commands:",
    "  setup    Clone the target repo, create and activate a virtualenv, install deps, switch to the work branch",
    "  shell    Build the container image and open an interactive shell with cwd and git config mounted",
    "  help     Show this help",
    "",
    "Options:",
    "  --config <path>   Use this config file",
    "  --dry-run         Print the commands without running them",
    "  --verbose         Show detailed step logs",
    "  -h, --help        Show help"
  ].join("\n");
}
