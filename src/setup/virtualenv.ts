import { join } from "node:path";

export function resolveVirtualEnvBinDir(venvPath: string, platform: NodeJS.Platform = process.platform): string {
  return join(venvPath, platform === "win32" ? "Scripts" : "bin");
}

/**
 * Environment an activated virtualenv gives its child processes: `VIRTUAL_ENV`
 * set, the venv's bin directory first on PATH, `PYTHONHOME` unset.
 * Re-activating the same venv does not duplicate its PATH entry.
 */
export function activateVirtualEnv(
  env: Record<string, string>,
  venvPath: string,
  platform: NodeJS.Platform = process.platform
): Record<string, string> {
  const delimiter = platform === "win32" ? ";" : ":";
  const binDir = resolveVirtualEnvBinDir(venvPath, platform);
  const pathKey = findPathKey(env, platform);

  const activated: Record<string, string> = { ...env };
  delete activated.PYTHONHOME;

  const segments = (env[pathKey] ?? "")
    .split(delimiter)
    .filter((segment) => segment !== "" && segment !== binDir);
  activated[pathKey] = [binDir, ...segments].join(delimiter);
  activated.VIRTUAL_ENV = venvPath;

  return activated;
}

// Windows environments often spell it "Path".
function findPathKey(env: Record<string, string>, platform: NodeJS.Platform): string {
  if (platform !== "win32") {
    return "PATH";
  }

  return Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "PATH";
}
