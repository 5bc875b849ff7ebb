import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getGlobalTestbedConfigPath, loadConfig, loadConfigWithMetadata } from "../src/config/load.js";
import { defaultConfig } from "../src/config/defaults.js";

describe("loadConfig", () => {
  let tempDir = "";
  let homeDir = "";

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "repo-testbed-config-"));
    homeDir = join(tempDir, "home");
    await mkdir(homeDir);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("falls back to built-in defaults when no config exists", async () => {
    const loaded = await loadConfigWithMetadata({ cwd: tempDir, homeDir, env: {}, platform: "linux" });

    expect(loaded.scope).toBe("defaults");
    expect(loaded.configPath).toBeNull();
    expect(loaded.config).toEqual(defaultConfig);
    expect(loaded.config.setup.repo_url).toBe("https://github.com/keon/algorithms.git");
    expect(loaded.config.setup.branch).toBe("gemini-unit-tests");
    expect(loaded.config.container.tag).toBe("gemini-unit-test-gen");
  });

  it("loads a local config and applies defaults to missing keys", async () => {
    await writeFile(
      join(tempDir, "testbed.config.toml"),
      [
        "[setup]",
        'repo_url = "https://example.test/team/service.git"',
        'branch = "add-tests"',
        "retries = 0",
        "",
        "[container]",
        'tag = "service-tests"',
        "",
        "[env]",
        'pass_through = ["API_TOKEN"]'
      ].join("\n")
    );

    const loaded = await loadConfigWithMetadata({ cwd: tempDir, homeDir, env: {}, platform: "linux" });

    expect(loaded.scope).toBe("local");
    expect(loaded.configPath).toBe(resolve(tempDir, "testbed.config.toml"));
    expect(loaded.config.setup).toEqual({
      ...defaultConfig.setup,
      repo_url: "https://example.test/team/service.git",
      branch: "add-tests",
      retries: 0
    });
    expect(loaded.config.container).toEqual({ ...defaultConfig.container, tag: "service-tests" });
    expect(loaded.config.env.pass_through).toEqual(["API_TOKEN"]);
  });

  it("uses the global config when no local config exists", async () => {
    const xdgConfigHome = join(tempDir, "xdg");
    const globalPath = getGlobalTestbedConfigPath({ platform: "linux", env: { XDG_CONFIG_HOME: xdgConfigHome }, homeDir });
    await mkdir(join(xdgConfigHome, "repo-testbed"), { recursive: true });
    await writeFile(globalPath, '[setup]\nmanifest = "requirements-dev.txt"\n');

    const loaded = await loadConfigWithMetadata({
      cwd: tempDir,
      homeDir,
      env: { XDG_CONFIG_HOME: xdgConfigHome },
      platform: "linux"
    });

    expect(globalPath).toBe(resolve(xdgConfigHome, "repo-testbed", "testbed.config.toml"));
    expect(loaded.scope).toBe("global");
    expect(loaded.config.setup.manifest).toBe("requirements-dev.txt");
  });

  it("resolves the global path under APPDATA on Windows", () => {
    expect(getGlobalTestbedConfigPath({ platform: "win32", env: { APPDATA: "/appdata" }, homeDir })).toBe(
      resolve("/appdata", "repo-testbed", "testbed.config.toml")
    );
  });

  it("fails when an explicit config path does not exist", async () => {
    await expect(loadConfig({ cwd: tempDir, configPath: "missing.toml" })).rejects.toThrow(
      `Cannot load testbed config at '${resolve(tempDir, "missing.toml")}': file does not exist.`
    );
  });

  it("reports TOML syntax errors with the file path", async () => {
    const configPath = join(tempDir, "broken.toml");
    await writeFile(configPath, "[setup\nbranch = 1");

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow(`Cannot parse testbed config at '${configPath}'`);
  });

  it("rejects values of the wrong type", async () => {
    const configPath = join(tempDir, "typed.toml");
    await writeFile(configPath, "[setup]\nreuse_existing = \"yes\"\n");

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow("Invalid setup.reuse_existing: expected a boolean.");
  });

  it("rejects negative or fractional retry counts", async () => {
    const configPath = join(tempDir, "retries.toml");
    await writeFile(configPath, "[setup]\nretries = -1\n");

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow(
      "Invalid setup.retries: expected an integer greater than or equal to 0."
    );
  });

  it("rejects empty required strings", async () => {
    const configPath = join(tempDir, "empty.toml");
    await writeFile(configPath, '[container]\ntag = "  "\n');

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow("Invalid container.tag: expected a non-empty string.");
  });

  it("rejects invalid pass-through variable names", async () => {
    const configPath = join(tempDir, "env.toml");
    await writeFile(configPath, '[env]\npass_through = ["OK_NAME", "NOT-OK"]\n');

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow(
      "Invalid env.pass_through[1]: 'NOT-OK' is not a valid environment variable name."
    );
  });

  it("rejects a non-table section", async () => {
    const configPath = join(tempDir, "section.toml");
    await writeFile(configPath, 'setup = "nope"\n');

    await expect(loadConfig({ cwd: tempDir, configPath })).rejects.toThrow("Invalid setup: expected a TOML table.");
  });
});
