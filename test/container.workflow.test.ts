import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildImageArgs,
  buildRunArgs,
  renderContainerPlanLines,
  runContainerWorkflow
} from "../src/container/workflow.js";
import { defaultConfig } from "../src/config/defaults.js";
import type { ResolvedContainerConfig } from "../src/config/schema.js";
import { logger } from "../src/logging/logger.js";
import type { StepCommand, StepCommandExecutor, StepCommandRunResult } from "../src/pipeline/runner.js";

function containerConfig(overrides: Partial<ResolvedContainerConfig> = {}): { container: ResolvedContainerConfig } {
  return {
    container: {
      ...defaultConfig.container,
      ...overrides
    }
  };
}

function recordingExecutor(resultFor: (command: StepCommand) => StepCommandRunResult = () => ({ exitCode: 0 })): {
  executor: StepCommandExecutor;
  calls: StepCommand[];
} {
  const calls: StepCommand[] = [];
  return {
    calls,
    executor: {
      async run(command) {
        calls.push(command);
        return resultFor(command);
      }
    }
  };
}

describe("runContainerWorkflow", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the image and opens an interactive shell with mounts", async () => {
    const { executor, calls } = recordingExecutor();

    const result = await runContainerWorkflow(containerConfig(), {
      cwd: "/home/dev/project",
      env: { PATH: "/usr/bin" },
      homeDir: "/home/dev",
      isInteractiveTerminal: () => true,
      pathExists: vi.fn().mockResolvedValue(true),
      executor
    });

    expect(calls).toEqual([
      {
        program: "docker",
        args: ["build", "-t", "gemini-unit-test-gen", "."],
        cwd: "/home/dev/project",
        env: { PATH: "/usr/bin" }
      },
      {
        program: "docker",
        args: [
          "run",
          "-v",
          "/home/dev/.gitconfig:/etc/gitconfig",
          "-v",
          "/home/dev/project:/chat",
          "--rm",
          "-it",
          "gemini-unit-test-gen",
          "bash"
        ],
        cwd: "/home/dev/project",
        env: { PATH: "/usr/bin" },
        stdio: "inherit"
      }
    ]);
    expect(result).toMatchObject({ tag: "gemini-unit-test-gen", interactive: true, exitCode: 0 });
    expect(result.smokeOutput).toBeUndefined();
  });

  it("returns the shell session's exit code", async () => {
    const { executor } = recordingExecutor((command) => ({ exitCode: command.args[0] === "run" ? 130 : 0 }));

    const result = await runContainerWorkflow(containerConfig(), {
      cwd: "/work",
      env: {},
      homeDir: "/home/dev",
      isInteractiveTerminal: () => true,
      pathExists: vi.fn().mockResolvedValue(true),
      executor
    });

    expect(result.exitCode).toBe(130);
    expect(result.pipeline.success).toBe(true);
  });

  it("does not start a container when the build fails", async () => {
    const { executor, calls } = recordingExecutor(() => ({ exitCode: 1, stderr: "no Dockerfile" }));

    await expect(
      runContainerWorkflow(containerConfig(), {
        cwd: "/work",
        env: {},
        isInteractiveTerminal: () => true,
        pathExists: vi.fn().mockResolvedValue(true),
        executor
      })
    ).rejects.toThrow(
      "Step 'build-image' failed: Command 'docker build -t gemini-unit-test-gen .' failed with exit code 1: no Dockerfile"
    );
    expect(calls).toHaveLength(1);
  });

  it("skips the git config mount with a warning when the file is missing", async () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => undefined);
    const { executor, calls } = recordingExecutor();

    await runContainerWorkflow(containerConfig(), {
      cwd: "/work",
      env: {},
      homeDir: "/home/dev",
      isInteractiveTerminal: () => true,
      pathExists: vi.fn().mockResolvedValue(false),
      executor
    });

    expect(calls[1].args).toEqual(["run", "-v", "/work:/chat", "--rm", "-it", "gemini-unit-test-gen", "bash"]);
    expect(warnSpy).toHaveBeenCalledWith("Git config '/home/dev/.gitconfig' not found; starting the container without it.");
  });

  it("forwards pass-through variables by name and through the child env", async () => {
    const { executor, calls } = recordingExecutor();

    await runContainerWorkflow(containerConfig(), {
      cwd: "/work",
      env: { PATH: "/usr/bin" },
      homeDir: "/home/dev",
      passThroughEnv: { API_TOKEN: "test-token" },
      isInteractiveTerminal: () => true,
      pathExists: vi.fn().mockResolvedValue(true),
      executor
    });

    expect(calls[1].args).toContain("API_TOKEN");
    expect(calls[1].args).not.toContain("test-token");
    expect(calls[1].args.slice(-4)).toEqual(["-e", "API_TOKEN", "gemini-unit-test-gen", "bash"]);
    expect(calls[1].env).toEqual({ PATH: "/usr/bin", API_TOKEN: "test-token" });
  });

  it("runs a smoke check instead of a shell without a terminal", async () => {
    const { executor, calls } = recordingExecutor((command) =>
      command.args[0] === "run" ? { exitCode: 0, stdout: "shell-ready\n" } : { exitCode: 0 }
    );

    const result = await runContainerWorkflow(containerConfig(), {
      cwd: "/work",
      env: {},
      homeDir: "/home/dev",
      isInteractiveTerminal: () => false,
      pathExists: vi.fn().mockResolvedValue(true),
      executor
    });

    expect(calls[1].args).toEqual([
      "run",
      "-v",
      "/home/dev/.gitconfig:/etc/gitconfig",
      "-v",
      "/work:/chat",
      "--rm",
      "gemini-unit-test-gen",
      "bash",
      "-lc",
      "echo shell-ready"
    ]);
    expect(calls[1].stdio).toBe("pipe");
    expect(result).toMatchObject({ interactive: false, exitCode: 0, smokeOutput: "shell-ready" });
  });

  it("treats a failing smoke check as a failed step", async () => {
    const { executor } = recordingExecutor((command) => ({ exitCode: command.args[0] === "run" ? 127 : 0 }));

    await expect(
      runContainerWorkflow(containerConfig(), {
        cwd: "/work",
        env: {},
        isInteractiveTerminal: () => false,
        pathExists: vi.fn().mockResolvedValue(true),
        executor
      })
    ).rejects.toThrow("Step 'run-shell' failed");
  });
});

describe("container command arguments", () => {
  it("adds a Dockerfile path and custom context to the build", () => {
    expect(buildImageArgs({ ...defaultConfig.container, dockerfile: "docker/Dockerfile.test", context: "docker" }, "/work")).toEqual([
      "build",
      "-t",
      "gemini-unit-test-gen",
      "-f",
      "/work/docker/Dockerfile.test",
      "docker"
    ]);
  });

  it("uses the configured runtime paths and shell", () => {
    expect(
      buildRunArgs(
        { ...defaultConfig.container, gitconfig_target: "/root/.gitconfig", workdir: "/src", shell: "sh" },
        { cwd: "/work", gitconfigHostPath: "/home/dev/.gitconfig", passThroughEnv: {}, interactive: true }
      )
    ).toEqual(["run", "-v", "/home/dev/.gitconfig:/root/.gitconfig", "-v", "/work:/src", "--rm", "-it", "gemini-unit-test-gen", "sh"]);
  });

  it("renders the plan for a dry run", () => {
    expect(renderContainerPlanLines(containerConfig({ runtime: "podman" }), "/work", { homeDir: "/home/dev" })).toEqual([
      "build-image: podman build -t gemini-unit-test-gen .",
      "run-shell:   podman run -v /home/dev/.gitconfig:/etc/gitconfig -v /work:/chat --rm -it gemini-unit-test-gen bash"
    ]);
  });
});
