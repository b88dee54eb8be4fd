import type { TurnState } from "@groundline/types";

const TRANSITIONS: Readonly<Record<TurnState, readonly TurnState[]>> = {
  RECEIVED: ["INPUT_VALIDATING"],
  INPUT_VALIDATING: ["BLOCKED", "RETRIEVING"],
  RETRIEVING: ["GENERATING"],
  GENERATING: ["OUTPUT_VALIDATING", "BLOCKED"],
  OUTPUT_VALIDATING: ["BLOCKED", "COMPLETED"],
  BLOCKED: [],
  COMPLETED: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: TurnState,
    readonly to: TurnState,
  ) {
    super(`illegal turn transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** Tracks one turn through its states and keeps the visited sequence. */
export class TurnStateMachine {
  private current: TurnState = "RECEIVED";
  private readonly visited: TurnState[] = ["RECEIVED"];

  get state(): TurnState {
    return this.current;
  }

  get trace(): readonly TurnState[] {
    return this.visited;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(next: TurnState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: TurnState): void {
    if (!this.canTransition(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }

  /** Infrastructure failure: jump to BLOCKED from any non-terminal state. */
  abort(): void {
    if (this.isTerminal) return;
    this.current = "BLOCKED";
    this.visited.push("BLOCKED");
  }
}
