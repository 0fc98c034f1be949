import type { BootstrapContext } from "./context.js";
import { planBootstrap, type BootstrapStep, type StepResult } from "./steps.js";
import { DevstrapError, DevstrapErrorCode } from "../errors.js";
import { logger } from "../logger.js";

export interface StepReport {
  readonly step: string;
  readonly result: StepResult;
}

/**
 * Run the steps in order, stopping at the first failure.
 * Throws STEP_FAILED carrying the step's exit code; the CLI exits with it.
 */
export async function runBootstrap(
  ctx: BootstrapContext,
  steps: readonly BootstrapStep[] = planBootstrap(ctx.platform),
): Promise<StepReport[]> {
  const reports: StepReport[] = [];
  for (const step of steps) {
    logger.info({ step: step.name }, "Running bootstrap step");
    const result = await step.run(ctx);
    reports.push({ step: step.name, result });

    if (result.status === "failed") {
      throw new DevstrapError(DevstrapErrorCode.STEP_FAILED, `Bootstrap step ${step.name} failed`, {
        step: step.name,
        exitCode: result.exitCode,
        completed: reports.slice(0, -1).map((r) => r.step),
      });
    }
    if (result.status === "skipped") {
      logger.info({ step: step.name, reason: result.reason }, "Bootstrap step skipped");
    }
  }
  logger.info({ steps: reports.length }, "Bootstrap complete");
  return reports;
}
