import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseDotEnv } from "dotenv";
import { isErrnoException } from "../utils/paths.js";

export type EnvSource = Record<string, string | undefined>;

/** Process env layered over the working directory's `.env`. */
export async function loadCliEnvSource(envPath: string = resolve(process.cwd(), ".env")): Promise<EnvSource> {
  let parsedFileEnv: EnvSource = {};

  try {
    parsedFileEnv = parseDotEnv(await readFile(envPath, "utf8"));
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "ENOENT") {
      throw error;
    }
  }

  return {
    ...parsedFileEnv,
    ...process.env
  };
}

export function resolvePassThroughEnv(names: string[], source: EnvSource): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const name of names) {
    const value = source[name];
    if (value === undefined || value === "") {
      continue;
    }
    resolved[name] = value;
  }

  return resolved;
}
