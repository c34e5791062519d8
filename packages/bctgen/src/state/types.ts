// Per-code generation lifecycle
export enum CodeState {
  PENDING = 'pending',
  REQUESTING = 'requesting',
  RETRYING = 'retrying',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}

// Valid transitions
export const TRANSITIONS: Record<CodeState, CodeState[]> = {
  [CodeState.PENDING]:    [CodeState.REQUESTING],
  [CodeState.REQUESTING]: [CodeState.SUCCEEDED, CodeState.RETRYING],
  [CodeState.RETRYING]:   [CodeState.SUCCEEDED, CodeState.FAILED],   // one retry only
  [CodeState.SUCCEEDED]:  [],
  [CodeState.FAILED]:     [],
};

/** Generation attempts allowed per code: the first request plus one immediate retry. */
export const MAX_ATTEMPTS = 2;
