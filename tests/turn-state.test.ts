import { describe, it, expect } from "vitest";
import { canTransition, TurnStateMachine } from "../src/agent/turn-state.js";
import { silentLogger } from "./helpers.js";

describe("TurnStateMachine", () => {
  it("walks the happy path", () => {
    const machine = new TurnStateMachine(silentLogger);
    machine.transition("routed");
    machine.transition("processing");
    machine.transition("completed");
    expect(machine.state).toBe("completed");
    expect(machine.transitions).toEqual(["received", "routed", "processing", "completed"]);
  });

  it("rejects skipping the routing step", () => {
    const machine = new TurnStateMachine(silentLogger);
    expect(() => machine.transition("processing")).toThrow(
      "Illegal turn transition: received → processing",
    );
  });

  it("allows escalation only from routed", () => {
    expect(canTransition("routed", "escalated")).toBe(true);
    expect(canTransition("processing", "escalated")).toBe(false);
    expect(canTransition("escalated", "failed")).toBe(true);
  });

  it("fails from any live state but leaves finished turns alone", () => {
    const live = new TurnStateMachine(silentLogger);
    live.fail();
    expect(live.transitions).toEqual(["received", "failed"]);
    live.fail();
    expect(live.transitions).toEqual(["received", "failed"]);

    const done = new TurnStateMachine(silentLogger);
    done.transition("routed");
    done.transition("processing");
    done.transition("completed");
    done.fail();
    expect(done.state).toBe("completed");
  });
});
