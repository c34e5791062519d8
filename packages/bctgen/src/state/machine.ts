import { CodeState, TRANSITIONS } from './types.js';

/**
 * Validate and execute a state transition.
 * Throws if the transition is invalid.
 */
export function transition(current: CodeState, target: CodeState): CodeState {
  const valid = validNext(current);
  if (!valid.includes(target)) {
    throw new Error(
      `Invalid transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

/**
 * Return all valid next states from the current state.
 */
export function validNext(current: CodeState): CodeState[] {
  return TRANSITIONS[current];
}

/**
 * Check if a state is terminal (no further transitions possible).
 */
export function isTerminal(state: CodeState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * State to enter after a failed request: retry while attempts remain, otherwise fail.
 */
export function afterFailure(current: CodeState, attempts: number, maxAttempts: number): CodeState {
  return transition(current, attempts < maxAttempts ? CodeState.RETRYING : CodeState.FAILED);
}
