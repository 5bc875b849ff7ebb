type LogLevel = "info" | "step" | "debug" | "warn" | "error";

let verboseEnabled = false;

const levelPrefix: Record<LogLevel, string> = {
  info: "INFO",
  step: "STEP",
  debug: "DEBUG",
  warn: "WARN",
  error: "ERROR"
};

const ansi = {
  reset: "\u001b[0m",
  cyan: "\u001b[36m",
  magenta: "\u001b[35m",
  gray: "\u001b[90m",
  yellow: "\u001b[33m",
  red: "\u001b[31m"
} as const;

const levelColor: Record<LogLevel, string> = {
  info: ansi.cyan,
  step: ansi.magenta,
  debug: ansi.gray,
  warn: ansi.yellow,
  error: ansi.red
};

function isColorEnabled(output: NodeJS.WriteStream): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  const forceColor = process.env.FORCE_COLOR;
  if (forceColor !== undefined && forceColor !== "0") {
    return true;
  }

  return output.isTTY === true;
}

function formatPrefix(level: LogLevel, output: NodeJS.WriteStream, label?: string): string {
  const prefix = label ? `[${levelPrefix[level]} ${label}]` : `[${levelPrefix[level]}]`;
  if (!isColorEnabled(output)) {
    return prefix;
  }

  return `${levelColor[level]}${prefix}${ansi.reset}`;
}

function write(level: LogLevel, message: string, label?: string): void {
  const isError = level === "error" || level === "warn";
  const output = isError ? process.stderr : process.stdout;
  const line = `${formatPrefix(level, output, label)} ${message}`;
  if (isError) {
    console.error(line);
    return;
  }

  console.log(line);
}

export function setVerboseLoggingEnabled(enabled: boolean): void {
  verboseEnabled = enabled;
}

export const logger = {
  info(message: string): void {
    write("info", message);
  },
  // Progress line for workflow step `index` (1-based) of `total`.
  step(index: number, total: number, message: string): void {
    write("step", message, `${index}/${total}`);
  },
  verbose(message: string): void {
    if (!verboseEnabled) {
      return;
    }
    write("debug", message);
  },
  warn(message: string): void {
    write("warn", message);
  },
  error(message: string): void {
    write("error", message);
  }
};
