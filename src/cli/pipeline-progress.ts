import { logger } from "../logging/logger.js";
import type { PipelineEvent } from "../pipeline/runner.js";

export function logPipelineEvent(event: PipelineEvent): void {
  switch (event.type) {
    case "step:start":
      if (event.attempt === 1) {
        logger.step(event.index, event.total, `${event.step}: ${event.command}`);
      } else {
        logger.verbose(`${event.step}: attempt ${event.attempt}`);
      }
      return;
    case "step:skip":
      logger.step(event.index, event.total, `${event.step}: skipped (${event.reason})`);
      return;
    case "step:context":
      logger.step(event.index, event.total, `${event.step}: ${event.detail}`);
      return;
    case "step:retry":
      logger.warn(`${event.step} failed on attempt ${event.attempt}, retrying (attempt ${event.nextAttempt}): ${event.error}`);
      return;
    case "step:success":
      logger.verbose(`${event.step} finished with exit code ${event.exitCode} after ${event.attempts} attempt(s)`);
      return;
    case "step:failure":
      logger.warn(`${event.step} failed after ${event.attempts} attempt(s): ${event.error}`);
      return;
  }
}
