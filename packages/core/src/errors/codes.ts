/**
 * Error Code Infrastructure
 * Stable error codes and the exit codes the CLI maps them to.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Charset Errors (E001–E099)
  EMPTY_CHARSET = 'E001',
  UNTERMINATED_CHARSET = 'E002',

  // Generation Errors (E100–E199)
  INVALID_LENGTH = 'E100',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.EMPTY_CHARSET]: 10,
  [ErrorCode.UNTERMINATED_CHARSET]: 11,
  [ErrorCode.INVALID_LENGTH]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
