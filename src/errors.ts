export enum DevstrapErrorCode {
  UNSUPPORTED_PLATFORM = "UNSUPPORTED_PLATFORM",
  INSTALL_FAILED = "INSTALL_FAILED",
  STEP_FAILED = "STEP_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
}

export class DevstrapError extends Error {
  readonly code: DevstrapErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DevstrapErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "DevstrapError";
    this.code = code;
    this.context = context;
  }
}

/** Exit status reported when no supported package manager is found in strict mode. */
export const UNSUPPORTED_EXIT_CODE = 2;

/**
 * Process exit status for an error. Install and step failures carry the
 * child's own status in `context.exitCode`; anything else exits with 1.
 */
export function exitCodeFor(err: unknown): number {
  if (!(err instanceof DevstrapError)) return 1;
  switch (err.code) {
    case DevstrapErrorCode.UNSUPPORTED_PLATFORM:
      return UNSUPPORTED_EXIT_CODE;
    case DevstrapErrorCode.INSTALL_FAILED:
    case DevstrapErrorCode.STEP_FAILED: {
      const exitCode = err.context?.["exitCode"];
      return typeof exitCode === "number" && exitCode !== 0 ? exitCode : 1;
    }
    case DevstrapErrorCode.CONFIG_INVALID:
      return 1;
  }
}
