import { CommandNotFoundError, WorkingDirectoryNotFoundError } from "../process/exec.js";
import { resolveRetryPolicy, type RetryPolicy, type SleepFn, withRetry } from "./retry.js";

export interface StepCommand {
  program: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  stdio?: "inherit" | "pipe";
}

export interface StepCommandRunOptions {
  timeoutMs?: number;
}

export interface StepCommandRunResult {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

export interface StepCommandExecutor {
  run(command: StepCommand, options: StepCommandRunOptions): Promise<StepCommandRunResult>;
}

/** Working directory and environment handed from one step to the next. */
export interface PipelineState {
  cwd: string;
  env: Record<string, string>;
}

export type StepPlan =
  | {
      kind: "command";
      command: StepCommand;
      retryable?: boolean;
      // The exit code is reported rather than treated as a failure.
      acceptAnyExitCode?: boolean;
    }
  | { kind: "skip"; reason: string }
  | { kind: "context"; detail: string; next: PipelineState };

export interface StepDefinition<TStep extends string = string> {
  step: TStep;
  plan: (state: PipelineState) => Promise<StepPlan>;
}

export interface StepSummary<TStep extends string = string> {
  step: TStep;
  command: string;
  success: boolean;
  attempts: number;
  skipped: boolean;
  exitCode?: number;
  output?: string;
  detail?: string;
  error?: string;
}

export interface PipelineResult<TStep extends string = string> {
  success: boolean;
  steps: StepSummary<TStep>[];
  state: PipelineState;
}

export type PipelineEvent<TStep extends string = string> =
  | { type: "step:start"; step: TStep; index: number; total: number; command: string; attempt: number }
  | { type: "step:retry"; step: TStep; command: string; attempt: number; nextAttempt: number; error: string }
  | { type: "step:success"; step: TStep; command: string; attempts: number; exitCode: number }
  | { type: "step:skip"; step: TStep; index: number; total: number; reason: string }
  | { type: "step:context"; step: TStep; index: number; total: number; detail: string }
  | { type: "step:failure"; step: TStep; command: string; attempts: number; error: string };

export interface RunPipelineOptions<TStep extends string = string> {
  retryPolicy?: Partial<RetryPolicy>;
  continueOnError?: boolean;
  timeoutMs?: number;
  sleep?: SleepFn;
  onEvent?: (event: PipelineEvent<TStep>) => void;
}

export class PipelineStepError extends Error {
  readonly step: string;
  readonly summaries: StepSummary[];

  constructor(step: string, message: string, summaries: StepSummary[], options?: ErrorOptions) {
    super(`Step '${step}' failed: ${message}`, options);
    this.name = "PipelineStepError";
    this.step = step;
    this.summaries = summaries;
  }
}

export async function runPipeline<TStep extends string>(
  steps: StepDefinition<TStep>[],
  initialState: PipelineState,
  executor: StepCommandExecutor,
  options: RunPipelineOptions<TStep> = {}
): Promise<PipelineResult<TStep>> {
  const retryPolicy = resolveRetryPolicy(options.retryPolicy);
  const continueOnError = options.continueOnError ?? false;
  const summaries: StepSummary<TStep>[] = [];
  let state: PipelineState = initialState;

  for (const [position, definition] of steps.entries()) {
    const index = position + 1;
    const total = steps.length;
    let attempts = 0;
    let commandLine = "";

    try {
      const plan = await definition.plan(state);

      if (plan.kind === "skip") {
        summaries.push({ step: definition.step, command: "", success: true, attempts: 0, skipped: true, detail: plan.reason });
        options.onEvent?.({ type: "step:skip", step: definition.step, index, total, reason: plan.reason });
        continue;
      }

      if (plan.kind === "context") {
        state = plan.next;
        summaries.push({ step: definition.step, command: "", success: true, attempts: 0, skipped: false, detail: plan.detail });
        options.onEvent?.({ type: "step:context", step: definition.step, index, total, detail: plan.detail });
        continue;
      }

      const command = plan.command;
      const acceptAnyExitCode = plan.acceptAnyExitCode ?? false;
      commandLine = formatCommandLine(command);
      const stepPolicy: RetryPolicy = plan.retryable ? retryPolicy : { ...retryPolicy, attempts: 1 };

      const result = await withRetry(
        async (attempt) => {
          attempts = attempt;
          options.onEvent?.({ type: "step:start", step: definition.step, index, total, command: commandLine, attempt });

          const runResult = await executor.run(command, { timeoutMs: options.timeoutMs });
          if (runResult.exitCode !== 0 && !acceptAnyExitCode) {
            throw new Error(formatCommandError(commandLine, runResult.exitCode, runResult.stderr));
          }

          return runResult;
        },
        stepPolicy,
        {
          sleep: options.sleep,
          shouldRetry: isRetryableStepError,
          onRetry: (error, attempt, nextAttempt) => {
            options.onEvent?.({
              type: "step:retry",
              step: definition.step,
              command: commandLine,
              attempt,
              nextAttempt,
              error: toErrorMessage(error)
            });
          }
        }
      );

      summaries.push({
        step: definition.step,
        command: commandLine,
        success: true,
        attempts,
        skipped: false,
        exitCode: result.exitCode,
        ...(result.stdout !== undefined && command.stdio === "pipe" ? { output: result.stdout } : {})
      });
      options.onEvent?.({
        type: "step:success",
        step: definition.step,
        command: commandLine,
        attempts,
        exitCode: result.exitCode
      });
    } catch (error) {
      const errorMessage = toErrorMessage(error);
      summaries.push({
        step: definition.step,
        command: commandLine,
        success: false,
        attempts,
        skipped: false,
        error: errorMessage
      });
      options.onEvent?.({ type: "step:failure", step: definition.step, command: commandLine, attempts, error: errorMessage });

      if (!continueOnError) {
        throw new PipelineStepError(definition.step, errorMessage, summaries, { cause: error });
      }
    }
  }

  return {
    success: summaries.every((summary) => summary.success),
    steps: summaries,
    state
  };
}

export function formatCommandLine(command: Pick<StepCommand, "program" | "args">): string {
  return [command.program, ...command.args].map(quoteForDisplay).join(" ");
}

function quoteForDisplay(value: string): string {
  if (value !== "" && /^[A-Za-z0-9_@%+=:,./~-]+$/.test(value)) {
    return value;
  }

  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

function formatCommandError(commandLine: string, exitCode: number, stderr?: string): string {
  const suffix = stderr && stderr.trim() !== "" ? `: ${stderr.trim()}` : "";
  return `Command '${commandLine}' failed with exit code ${exitCode}${suffix}`;
}

function isRetryableStepError(error: unknown): boolean {
  return !(error instanceof CommandNotFoundError || error instanceof WorkingDirectoryNotFoundError);
}

function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message;
  }
  return "Unknown step error";
}
