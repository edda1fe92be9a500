/** Error categories for the sequencer */
export const ErrorCode = {
  // Configuration errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Report errors
  REPORT_NOT_FOUND: 'REPORT_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Sequencer error with code and optional remediation hint */
export class SequencerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'SequencerError';
  }
}

/** Bad pipeline input. Raised before any step runs. */
export class ConfigurationError extends SequencerError {
  constructor(message: string, hint?: string) {
    super(ErrorCode.CONFIGURATION_ERROR, message, hint);
    this.name = 'ConfigurationError';
  }
}

/** Configuration problems the CLI reports as validation failures */
export function isConfigError(err: SequencerError): boolean {
  return (
    err.code === ErrorCode.CONFIGURATION_ERROR ||
    err.code === ErrorCode.CONFIG_PARSE_ERROR ||
    err.code === ErrorCode.CONFIG_NOT_FOUND
  );
}
