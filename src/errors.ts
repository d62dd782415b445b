export enum HardeningErrorCode {
  OBSERVATION_FAILED = "OBSERVATION_FAILED",
  ACTION_FAILED = "ACTION_FAILED",
  PREREQUISITE_MISSING = "PREREQUISITE_MISSING",
  VALIDATION_FAILED = "VALIDATION_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
  PROFILE_NOT_FOUND = "PROFILE_NOT_FOUND",
  BACKOUT_UNSUPPORTED = "BACKOUT_UNSUPPORTED",
  NOT_ROOT = "NOT_ROOT",
}

export class HardeningError extends Error {
  readonly code: HardeningErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HardeningErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "HardeningError";
    this.code = code;
    this.context = context;
  }
}

export function isHardeningError(err: unknown, code?: HardeningErrorCode): err is HardeningError {
  return err instanceof HardeningError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
