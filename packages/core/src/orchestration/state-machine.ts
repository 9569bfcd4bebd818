import type { OrchestratorState } from "@conductor/sdk";
import { InvalidTransitionError } from "../errors";

type StateTransitions = {
  [K in OrchestratorState]: readonly OrchestratorState[];
};

export const validTransitions: StateTransitions = {
  idle: ["analyzing", "failed"],
  analyzing: ["selecting", "failed"],
  selecting: ["executing", "failed"],
  executing: ["merging", "failed"],
  merging: ["done", "failed"],
  done: [],
  failed: [],
} as const;

export function canTransition(from: OrchestratorState, to: OrchestratorState): boolean {
  return validTransitions[from].includes(to);
}

export function transition(from: OrchestratorState, to: OrchestratorState): OrchestratorState {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
  return to;
}

export function isTerminal(state: OrchestratorState): boolean {
  return validTransitions[state].length === 0;
}
