import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { isErrnoException, pathExists } from "../utils/paths.js";
import type { ResolvedTestbedConfig } from "./schema.js";
import { defaultConfig } from "./defaults.js";

type JsonRecord = Record<string, unknown>;

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedTestbedConfig {
  config: ResolvedTestbedConfig;
  configPath: string | null;
  scope: "explicit" | "local" | "global" | "defaults";
}

export const TESTBED_CONFIG_FILENAME = "testbed.config.toml";
const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedTestbedConfig> {
  const loaded = await loadConfigWithMetadata(options);
  return loaded.config;
}

export async function loadConfigWithMetadata(options: LoadConfigOptions = {}): Promise<LoadedTestbedConfig> {
  const resolvedPath = await resolveTestbedConfigPath(options);
  const rawConfig = resolvedPath.path === null ? {} : await readTomlConfig(resolvedPath.path);

  return {
    config: resolveConfig(rawConfig),
    configPath: resolvedPath.path,
    scope: resolvedPath.scope
  };
}

export function resolveConfig(rawConfig: JsonRecord): ResolvedTestbedConfig {
  const setupRaw = getOptionalTable(rawConfig, "setup", "setup");
  const containerRaw = getOptionalTable(rawConfig, "container", "container");
  const envRaw = getOptionalTable(rawConfig, "env", "env");

  const resolved: ResolvedTestbedConfig = {
    setup: {
      repo_url: getOptionalString(setupRaw, "repo_url", "setup.repo_url") ?? defaultConfig.setup.repo_url,
      directory: getOptionalString(setupRaw, "directory", "setup.directory") ?? defaultConfig.setup.directory,
      branch: getOptionalString(setupRaw, "branch", "setup.branch") ?? defaultConfig.setup.branch,
      manifest: getOptionalString(setupRaw, "manifest", "setup.manifest") ?? defaultConfig.setup.manifest,
      venv_dir: getOptionalString(setupRaw, "venv_dir", "setup.venv_dir") ?? defaultConfig.setup.venv_dir,
      venv_command:
        getOptionalString(setupRaw, "venv_command", "setup.venv_command") ?? defaultConfig.setup.venv_command,
      reuse_existing:
        getOptionalBoolean(setupRaw, "reuse_existing", "setup.reuse_existing") ?? defaultConfig.setup.reuse_existing,
      retries: getOptionalNumber(setupRaw, "retries", "setup.retries") ?? defaultConfig.setup.retries,
      retry_delay_ms:
        getOptionalNumber(setupRaw, "retry_delay_ms", "setup.retry_delay_ms") ?? defaultConfig.setup.retry_delay_ms,
      step_timeout_ms:
        getOptionalNumber(setupRaw, "step_timeout_ms", "setup.step_timeout_ms") ??
        defaultConfig.setup.step_timeout_ms,
      continue_on_error:
        getOptionalBoolean(setupRaw, "continue_on_error", "setup.continue_on_error") ??
        defaultConfig.setup.continue_on_error
    },
    container: {
      runtime: getOptionalString(containerRaw, "runtime", "container.runtime") ?? defaultConfig.container.runtime,
      tag: getOptionalString(containerRaw, "tag", "container.tag") ?? defaultConfig.container.tag,
      context: getOptionalString(containerRaw, "context", "container.context") ?? defaultConfig.container.context,
      dockerfile:
        getOptionalString(containerRaw, "dockerfile", "container.dockerfile") ?? defaultConfig.container.dockerfile,
      gitconfig_path:
        getOptionalString(containerRaw, "gitconfig_path", "container.gitconfig_path") ??
        defaultConfig.container.gitconfig_path,
      gitconfig_target:
        getOptionalString(containerRaw, "gitconfig_target", "container.gitconfig_target") ??
        defaultConfig.container.gitconfig_target,
      workdir: getOptionalString(containerRaw, "workdir", "container.workdir") ?? defaultConfig.container.workdir,
      shell: getOptionalString(containerRaw, "shell", "container.shell") ?? defaultConfig.container.shell
    },
    env: {
      pass_through: getOptionalStringArray(envRaw, "pass_through", "env.pass_through") ?? [
        ...defaultConfig.env.pass_through
      ]
    }
  };

  for (const [path, value] of [
    ["setup.repo_url", resolved.setup.repo_url],
    ["setup.branch", resolved.setup.branch],
    ["setup.manifest", resolved.setup.manifest],
    ["setup.venv_dir", resolved.setup.venv_dir],
    ["setup.venv_command", resolved.setup.venv_command],
    ["container.runtime", resolved.container.runtime],
    ["container.tag", resolved.container.tag],
    ["container.context", resolved.container.context],
    ["container.workdir", resolved.container.workdir],
    ["container.shell", resolved.container.shell]
  ] as const) {
    if (value.trim() === "") {
      throw new Error(`Invalid ${path}: expected a non-empty string.`);
    }
  }

  for (const [path, value] of [
    ["setup.retries", resolved.setup.retries],
    ["setup.retry_delay_ms", resolved.setup.retry_delay_ms],
    ["setup.step_timeout_ms", resolved.setup.step_timeout_ms]
  ] as const) {
    if (value < 0 || !Number.isInteger(value)) {
      throw new Error(`Invalid ${path}: expected an integer greater than or equal to 0.`);
    }
  }

  if (/\s/.test(resolved.setup.branch)) {
    throw new Error("Invalid setup.branch: branch names cannot contain whitespace.");
  }

  for (const [index, name] of resolved.env.pass_through.entries()) {
    if (!ENV_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid env.pass_through[${index}]: '${name}' is not a valid environment variable name.`);
    }
  }

  return resolved;
}

async function resolveTestbedConfigPath(
  options: LoadConfigOptions
): Promise<{ path: string | null; scope: LoadedTestbedConfig["scope"] }> {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath) {
    return {
      path: resolve(cwd, options.configPath),
      scope: "explicit"
    };
  }

  const localPath = resolve(cwd, TESTBED_CONFIG_FILENAME);
  if (await pathExists(localPath)) {
    return {
      path: localPath,
      scope: "local"
    };
  }

  const globalPath = getGlobalTestbedConfigPath(options);
  if (await pathExists(globalPath)) {
    return {
      path: globalPath,
      scope: "global"
    };
  }

  return {
    path: null,
    scope: "defaults"
  };
}

export function getGlobalTestbedConfigPath(options: Pick<LoadConfigOptions, "platform" | "env" | "homeDir"> = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const resolvedHomeDir = options.homeDir ?? homedir();

  if (platform === "win32") {
    const appData =
      typeof env.APPDATA === "string" && env.APPDATA.trim() !== "" ? env.APPDATA : join(resolvedHomeDir, "AppData", "Roaming");
    return resolve(appData, "repo-testbed", TESTBED_CONFIG_FILENAME);
  }

  const xdgConfigHome =
    typeof env.XDG_CONFIG_HOME === "string" && env.XDG_CONFIG_HOME.trim() !== ""
      ? env.XDG_CONFIG_HOME
      : join(resolvedHomeDir, ".config");
  return resolve(xdgConfigHome, "repo-testbed", TESTBED_CONFIG_FILENAME);
}

async function readTomlConfig(configPath: string): Promise<JsonRecord> {
  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Cannot load testbed config at '${configPath}': file does not exist.`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseToml(source);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot parse testbed config at '${configPath}': ${detail}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("Invalid testbed config root: expected a TOML table.");
  }

  return parsed;
}

function getOptionalTable(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`Invalid ${path}: expected a TOML table.`);
  }
  return value;
}

function getOptionalString(parent: JsonRecord | undefined, key: string, path: string): string | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`Invalid ${path}: expected a string.`);
  }
  return value;
}

function getOptionalNumber(parent: JsonRecord | undefined, key: string, path: string): number | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new Error(`Invalid ${path}: expected a number.`);
  }
  return value;
}

function getOptionalBoolean(parent: JsonRecord | undefined, key: string, path: string): boolean | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${path}: expected a boolean.`);
  }
  return value;
}

function getOptionalStringArray(parent: JsonRecord | undefined, key: string, path: string): string[] | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`Invalid ${path}: expected an array of strings.`);
  }
  return [...value];
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
