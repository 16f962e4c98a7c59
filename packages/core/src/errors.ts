export type StackErrorCode =
  | "UNSUPPORTED_PLATFORM"
  | "UNSUPPORTED_RUNTIME"
  | "CONFIG_INVALID"
  | "PACKAGE_NOT_FOUND"
  | "PACKAGE_AMBIGUOUS"
  | "BACKUP_FAILED"
  | "QUARANTINE_LOCKED"
  | "INSTALL_FAILED"
  | "ENTRY_POINT_UNRESOLVED"
  | "CONFIG_ROUNDTRIP_FAILED";

/**
 * Fatal error that aborts a whole rebuild run.
 * The message states what was expected and what was found.
 */
export class StackError extends Error {
  public readonly code: StackErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: StackErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "StackError";
    this.code = code;
    this.details = details;
  }
}

export function isStackError(err: unknown): err is StackError {
  return err instanceof StackError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
