export function isHelpFlag(token: string): boolean {
  return token === "-h" || token === "--help";
}

export function readFlagValue(args: string[], index: number, flag: string): string {
  const next = args[index + 1];
  if (!next || next.startsWith("--")) {
    throw new Error(`Missing value for ${flag}.`);
  }

  return next;
}
