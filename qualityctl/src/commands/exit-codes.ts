/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  QUALITY_FAILED: 1,
  INPUT_INVALID: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
