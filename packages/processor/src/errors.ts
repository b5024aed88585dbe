/**
 * Processor Package - Thrown Errors
 *
 * User mistakes are reported as diagnostics. These are only thrown for engine
 * defects and for host setup that cannot proceed at all.
 */

export class ProcessorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "ProcessorError";
  }
}

/** Error codes */
export const ProcessorErrorCode = {
  UNKNOWN_DIRECTIVE: "VALUEGEN_UNKNOWN_DIRECTIVE",
  PROJECT_LOAD: "VALUEGEN_PROJECT_LOAD",
} as const;

export type ProcessorErrorCodeType = (typeof ProcessorErrorCode)[keyof typeof ProcessorErrorCode];

/**
 * The dispatcher was handed an identity it does not claim.
 */
export class UnknownDirectiveError extends ProcessorError {
  constructor(public readonly identity: string) {
    super(`Unknown directive: ${identity}`, ProcessorErrorCode.UNKNOWN_DIRECTIVE);
    this.name = "UnknownDirectiveError";
  }
}
