/**
 * vastcheck exit codes.
 * 0 = every required parameter present and valid, 1 = validation failed,
 * 2+ = the run could not produce a report.
 */

export enum ExitCode {
  SUCCESS = 0,
  VALIDATION_FAILED = 1,
  INVALID_INPUT = 2,
  CONFIG_ERROR = 3,
  RUNTIME_ERROR = 4,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
