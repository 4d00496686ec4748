import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Pipeline, type InstallStep } from "./pipeline.js";

function step(
  name: string,
  log: string[],
  opts: { critical?: boolean; fail?: string } = {},
): InstallStep<string[]> {
  return {
    name,
    description: `step ${name}`,
    idempotent: true,
    critical: opts.critical ?? true,
    async action(ctx) {
      log.push(name);
      ctx.push(name);
      if (opts.fail) throw new Error(opts.fail);
    },
  };
}

describe("Pipeline", () => {
  it("starts in notStarted", () => {
    const pipeline = new Pipeline<string[]>([]);
    assert.deepEqual(pipeline.state, { status: "notStarted" });
  });

  it("runs every step in order and succeeds", async () => {
    const log: string[] = [];
    const ctx: string[] = [];
    const pipeline = new Pipeline([step("a", log), step("b", log), step("c", log)]);

    const state = await pipeline.run(ctx);
    assert.deepEqual(state, { status: "succeeded" });
    assert.deepEqual(log, ["a", "b", "c"]);
    assert.deepEqual(ctx, ["a", "b", "c"]);
    assert.deepEqual(
      pipeline.stepResults.map((r) => [r.step.name, r.success]),
      [["a", true], ["b", true], ["c", true]],
    );
  });

  it("stops at the first critical failure", async () => {
    const log: string[] = [];
    const pipeline = new Pipeline([
      step("a", log),
      step("b", log, { fail: "boom" }),
      step("c", log),
    ]);

    const state = await pipeline.run([]);
    assert.equal(state.status, "failedAt");
    if (state.status !== "failedAt") return;
    assert.equal(state.stepIndex, 1);
    assert.equal(state.stepName, "b");
    assert.ok(state.error instanceof Error);
    assert.equal(state.error.message, "boom");
    assert.deepEqual(log, ["a", "b"]);
    assert.equal(pipeline.stepResults.length, 2);
    assert.equal(pipeline.stepResults[1].errorDetail, "boom");
  });

  it("continues past a non-critical failure", async () => {
    const log: string[] = [];
    const pipeline = new Pipeline([
      step("a", log, { critical: false, fail: "lock held" }),
      step("b", log),
    ]);

    const state = await pipeline.run([]);
    assert.deepEqual(state, { status: "succeeded" });
    assert.deepEqual(log, ["a", "b"]);
    assert.equal(pipeline.stepResults[0].success, false);
    assert.equal(pipeline.stepResults[0].errorDetail, "lock held");
  });

  it("succeeds with no steps", async () => {
    const pipeline = new Pipeline<string[]>([]);
    assert.deepEqual(await pipeline.run([]), { status: "succeeded" });
  });

  it("refuses to run twice", async () => {
    const pipeline = new Pipeline([step("a", [])]);
    await pipeline.run([]);
    await assert.rejects(pipeline.run([]), {
      message: "Pipeline already ran (state: succeeded)",
    });
  });

  it("calls hooks around each step", async () => {
    const events: string[] = [];
    const pipeline = new Pipeline([step("a", []), step("b", [], { fail: "x" })], {
      onStepStart(s, index, total) {
        events.push(`start ${s.name} ${index}/${total}`);
      },
      onStepEnd(result, index) {
        events.push(`end ${result.step.name} ${index} ${result.success}`);
      },
    });

    await pipeline.run([]);
    assert.deepEqual(events, [
      "start a 0/2",
      "end a 0 true",
      "start b 1/2",
      "end b 1 false",
    ]);
  });
});
