/** Rounds the tool loop may run before giving up with `ToolLoopExhaustedError`. */
export const MAX_TOOL_ROUNDS = 20;

/** Default bound for one tool-loop turn: 10 minutes. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 60 * 1000;
