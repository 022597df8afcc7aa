import type { Logger } from "../logger.js";

// ── Turn State Machine ───────────────────────────────────
// received → routed → processing → completed
//                   ↘ escalated
// Any non-terminal state may move to failed.

export type TurnState =
  | "received"
  | "routed"
  | "processing"
  | "escalated"
  | "completed"
  | "failed";

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  received: ["routed", "failed"],
  routed: ["processing", "escalated", "failed"],
  processing: ["completed", "failed"],
  // Escalated is a terminal label for a turn that still completed its dispatch.
  escalated: ["failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: TurnState, to: TurnState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class TurnStateMachine {
  private current: TurnState = "received";
  private readonly history: TurnState[] = ["received"];

  constructor(private readonly logger: Logger) {}

  get state(): TurnState {
    return this.current;
  }

  /** Every state visited, in order. */
  get transitions(): TurnState[] {
    return [...this.history];
  }

  transition(to: TurnState): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal turn transition: ${this.current} → ${to}`);
    }
    this.logger.debug({ from: this.current, to }, "Turn state");
    this.current = to;
    this.history.push(to);
  }

  /** Move to `failed` unless the turn already failed or completed. */
  fail(): void {
    if (canTransition(this.current, "failed")) this.transition("failed");
  }
}
