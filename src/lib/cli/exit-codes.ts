export const EXIT_CODES = {
  OK: 0,
  NO_PUBLIC_IP: 1,
  NO_TIMEZONE: 2,
  UNSUPPORTED_OS: 3,
  APPLY_FAILED: 4,
  CONFIG_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
