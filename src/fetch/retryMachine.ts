import { RetryableCategory, StatusCategory, TerminalCategory, isTerminalCategory } from "./classify";

export type RetryState =
  | { phase: "attempting"; attempt: number }
  | { phase: "waiting"; attemptsMade: number; delaySeconds: number; category: RetryableCategory }
  | { phase: "succeeded"; attemptsMade: number }
  | { phase: "failed_terminal"; attemptsMade: number; category: TerminalCategory }
  | { phase: "failed_exhausted"; attemptsMade: number; category: RetryableCategory };

export type AttemptingState = Extract<RetryState, { phase: "attempting" }>;
export type WaitingState = Extract<RetryState, { phase: "waiting" }>;
export type SettledState = Exclude<RetryState, AttemptingState | WaitingState>;

export const INITIAL_STATE: AttemptingState = { phase: "attempting", attempt: 1 };

export function afterAttempt(
  state: AttemptingState,
  category: StatusCategory,
  maxAttempts: number,
  delaySeconds: number,
): WaitingState | SettledState {
  const attemptsMade = state.attempt;

  if (category === "success") {
    return { phase: "succeeded", attemptsMade };
  }
  if (isTerminalCategory(category)) {
    return { phase: "failed_terminal", attemptsMade, category };
  }
  if (attemptsMade >= maxAttempts) {
    return { phase: "failed_exhausted", attemptsMade, category };
  }
  return { phase: "waiting", attemptsMade, delaySeconds: Math.max(0, delaySeconds), category };
}

export function afterWait(state: WaitingState): AttemptingState {
  return { phase: "attempting", attempt: state.attemptsMade + 1 };
}

export function isSettled(state: RetryState): state is SettledState {
  return state.phase === "succeeded" || state.phase === "failed_terminal" || state.phase === "failed_exhausted";
}
