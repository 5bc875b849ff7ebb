import { access } from "node:fs/promises";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";

export interface HostPathResolveOptions {
  homeDir?: string;
  cwd?: string;
}

export function resolveHostPath(inputPath: string, options: HostPathResolveOptions = {}): string {
  const homeDir = options.homeDir ?? process.env.HOME ?? homedir();
  const cwd = options.cwd ?? process.cwd();

  let expanded = inputPath.replaceAll("${HOME}", homeDir).replaceAll("$HOME", homeDir);
  if (expanded === "~") {
    expanded = homeDir;
  } else if (expanded.startsWith("~/")) {
    expanded = join(homeDir, expanded.slice(2));
  }

  return isAbsolute(expanded) ? resolve(expanded) : resolve(cwd, expanded);
}

/**
 * Directory name `git clone <url>` picks when no target is given:
 * the last path segment without a trailing `.git`.
 */
export function deriveCloneDirectoryName(repoUrl: string): string {
  const trimmed = repoUrl.trim().replace(/[\\/]+$/, "").replace(/\.git$/, "");
  const segments = trimmed.split(/[\\/:]/).filter((segment) => segment !== "");
  const name = segments.at(-1);
  if (!name) {
    throw new Error(`Cannot derive a clone directory from repository URL '${repoUrl}'.`);
  }

  return name;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
