import { describe, it, expect } from "vitest";
import { LockTimeoutError } from "../src/errors.js";
import { TaskRunner } from "../src/tasks/task-runner.js";
import { silentLogger } from "./helpers.js";

describe("TaskRunner", () => {
  it("reports pending, then the result", async () => {
    const runner = new TaskRunner<string>({ logger: silentLogger });
    let finish: (value: string) => void = () => undefined;
    const { taskId } = runner.submit(
      () => new Promise<string>((resolve) => {
        finish = resolve;
      }),
    );

    expect(runner.status(taskId)).toEqual({ state: "pending" });
    await Promise.resolve();
    finish("done");
    await runner.drain();

    expect(runner.status(taskId)).toEqual({ state: "success", result: "done" });
    expect(runner.pendingCount).toBe(0);
  });

  it("records a failure reason and error code", async () => {
    const runner = new TaskRunner<string>({ logger: silentLogger });
    const { taskId } = runner.submit(async () => {
      throw new LockTimeoutError("conversation:c1", 100);
    });
    await runner.drain();

    expect(runner.status(taskId)).toEqual({
      state: "failure",
      reason: 'Could not acquire lock "conversation:c1" within 100ms',
      code: "LOCK_TIMEOUT",
    });
  });

  it("captures synchronous throws from the work function", async () => {
    const runner = new TaskRunner<string>({ logger: silentLogger });
    const { taskId } = runner.submit(() => {
      throw new Error("boom");
    });
    await runner.drain();
    expect(runner.status(taskId)).toMatchObject({ state: "failure", reason: "boom" });
  });

  it("forgets finished tasks after the retention period", async () => {
    let now = 0;
    const runner = new TaskRunner<number>({
      logger: silentLogger,
      retentionMs: 1_000,
      now: () => now,
    });
    const { taskId } = runner.submit(async () => 42, "task-1");
    await runner.drain();

    expect(taskId).toBe("task-1");
    now = 999;
    expect(runner.status(taskId)).toEqual({ state: "success", result: 42 });
    now = 1_000;
    expect(runner.status(taskId)).toBeUndefined();
  });

  it("returns undefined for unknown ids", () => {
    const runner = new TaskRunner<number>({ logger: silentLogger });
    expect(runner.status("nope")).toBeUndefined();
  });
});
