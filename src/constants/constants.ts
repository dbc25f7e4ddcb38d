// src/constants/constants.ts

/**
 * Listener defaults
 */
export const DEFAULT_PORT = 4999;
export const DEFAULT_HOST = '0.0.0.0';

/** Idle sessions are closed after this many milliseconds (0 disables). */
export const DEFAULT_IDLE_TIMEOUT_MS = 300_000;

/** Partial lines longer than this are discarded. */
export const DEFAULT_MAX_LINE_LENGTH = 8192;

export const DEFAULT_RESPONSE_EOL = '\n';
export const DEFAULT_COMMAND_EOL = '\n';

/** Capacity of the activity monitor's command log. */
export const COMMAND_LOG_SIZE = 100;

/**
 * Accepted boolean spellings when a parameter does not declare its own
 */
export const BOOLEAN_TRUE_VALUES = ['1', 'ON', 'TRUE', 'YES'] as const;
export const BOOLEAN_FALSE_VALUES = ['0', 'OFF', 'FALSE', 'NO'] as const;

/** Wire labels for boolean state variables without explicit labels. */
export const BOOLEAN_LABELS = { true: '1', false: '0' } as const;

/**
 * Response shapes that devices use to report a failed command
 */
export const ERROR_RESPONSE_PATTERNS: readonly RegExp[] = [
  /^ERROR/,
  /^!E\(/,
  /ERR/,
  /INVALID/,
  /UNKNOWN/,
  /^NAK/,
];
