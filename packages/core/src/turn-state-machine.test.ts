import { describe, it, expect } from "vitest";
import { IllegalTransitionError, TurnStateMachine } from "./turn-state-machine.js";

describe("TurnStateMachine", () => {
  it("walks the happy path and records the trace", () => {
    const machine = new TurnStateMachine();
    for (const state of ["INPUT_VALIDATING", "RETRIEVING", "GENERATING", "OUTPUT_VALIDATING", "COMPLETED"] as const) {
      machine.transition(state);
    }

    expect(machine.state).toBe("COMPLETED");
    expect(machine.isTerminal).toBe(true);
    expect(machine.trace).toEqual([
      "RECEIVED",
      "INPUT_VALIDATING",
      "RETRIEVING",
      "GENERATING",
      "OUTPUT_VALIDATING",
      "COMPLETED",
    ]);
  });

  it("rejects transitions outside the table", () => {
    const machine = new TurnStateMachine();
    expect(() => machine.transition("GENERATING")).toThrow(IllegalTransitionError);
    expect(() => machine.transition("GENERATING")).toThrow("illegal turn transition RECEIVED -> GENERATING");

    machine.transition("INPUT_VALIDATING");
    machine.transition("RETRIEVING");
    expect(machine.canTransition("BLOCKED")).toBe(false);
  });

  it("aborts to BLOCKED from any live state but not from a terminal one", () => {
    const machine = new TurnStateMachine();
    machine.transition("INPUT_VALIDATING");
    machine.transition("RETRIEVING");
    machine.abort();
    expect(machine.state).toBe("BLOCKED");

    machine.abort();
    expect(machine.trace).toEqual(["RECEIVED", "INPUT_VALIDATING", "RETRIEVING", "BLOCKED"]);
  });
});
