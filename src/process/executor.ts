import type { StepCommandExecutor } from "../pipeline/runner.js";
import { runProcess } from "./exec.js";

export function createProcessExecutor(): StepCommandExecutor {
  return {
    async run(command, options) {
      const result = await runProcess(command.program, command.args, {
        cwd: command.cwd,
        env: command.env,
        stdio: command.stdio ?? "inherit",
        timeoutMs: options.timeoutMs
      });

      return {
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr
      };
    }
  };
}
