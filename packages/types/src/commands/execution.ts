// Execution result of a single shell command
// Success means the process ran to completion, whatever its exit code.

export const ExecutionFailureReason = {
  TIMEOUT: "timeout",
  LAUNCH: "launch",
} as const;

export type ExecutionFailureReasonType =
  (typeof ExecutionFailureReason)[keyof typeof ExecutionFailureReason];

export interface ExecutionSuccess {
  succeeded: true;
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}

export interface ExecutionFailure {
  succeeded: false;
  reason: ExecutionFailureReasonType;
  errorMessage: string;
  durationMs: number;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export function isExecutionTimeout(result: ExecutionResult): boolean {
  return !result.succeeded && result.reason === ExecutionFailureReason.TIMEOUT;
}
