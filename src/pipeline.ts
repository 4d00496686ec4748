/**
 * Ordered, fail-fast step execution.
 *
 * notStarted -> running(i) -> running(i+1) ... -> succeeded | failedAt(i)
 *
 * A critical step that throws ends the run at that step. A non-critical
 * step that throws is reported and skipped over. Nothing is retried: callers
 * re-run the whole pipeline and rely on each step being idempotent.
 */

import { errorMessage } from "./errors.js";

export interface InstallStep<C> {
  name: string;
  description: string;
  idempotent: boolean;
  critical: boolean;
  action(ctx: C): Promise<void>;
}

export interface StepResult<C> {
  step: InstallStep<C>;
  success: boolean;
  errorDetail?: string;
  durationMs: number;
}

export type PipelineState =
  | { status: "notStarted" }
  | { status: "running"; stepIndex: number }
  | { status: "succeeded" }
  | { status: "failedAt"; stepIndex: number; stepName: string; error: unknown };

type Status = PipelineState["status"];

const VALID_TRANSITIONS: Record<Status, readonly Status[]> = {
  notStarted: ["running", "succeeded"],
  running: ["running", "succeeded", "failedAt"],
  succeeded: [],
  failedAt: [],
};

export interface PipelineHooks<C> {
  onStepStart?(step: InstallStep<C>, index: number, total: number): void;
  onStepEnd?(result: StepResult<C>, index: number): void;
}

export class Pipeline<C> {
  private current: PipelineState = { status: "notStarted" };
  private readonly results: StepResult<C>[] = [];

  constructor(
    private readonly steps: readonly InstallStep<C>[],
    private readonly hooks: PipelineHooks<C> = {},
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get stepResults(): readonly StepResult<C>[] {
    return this.results;
  }

  async run(ctx: C): Promise<PipelineState> {
    if (this.current.status !== "notStarted") {
      throw new Error(`Pipeline already ran (state: ${this.current.status})`);
    }

    for (const [index, step] of this.steps.entries()) {
      this.transition({ status: "running", stepIndex: index });
      this.hooks.onStepStart?.(step, index, this.steps.length);

      const start = performance.now();
      let failure: unknown;
      let failed = false;
      try {
        await step.action(ctx);
      } catch (err: unknown) {
        failed = true;
        failure = err;
      }

      const result: StepResult<C> = {
        step,
        success: !failed,
        errorDetail: failed ? errorMessage(failure) : undefined,
        durationMs: Math.round(performance.now() - start),
      };
      this.results.push(result);
      this.hooks.onStepEnd?.(result, index);

      if (failed && step.critical) {
        this.transition({
          status: "failedAt",
          stepIndex: index,
          stepName: step.name,
          error: failure,
        });
        return this.current;
      }
    }

    this.transition({ status: "succeeded" });
    return this.current;
  }

  private transition(next: PipelineState): void {
    if (!VALID_TRANSITIONS[this.current.status].includes(next.status)) {
      throw new Error(`Invalid pipeline transition: ${this.current.status} -> ${next.status}`);
    }
    this.current = next;
  }
}
