export enum KmodErrorCode {
  INVALID_VARIANT = "INVALID_VARIANT",
  PRECOMPILED_UNSUPPORTED = "PRECOMPILED_UNSUPPORTED",
  INSTALL_FAILED = "INSTALL_FAILED",
}

export class KmodError extends Error {
  readonly code: KmodErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: KmodErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "KmodError";
    this.code = code;
    this.context = context;
  }
}

/** Message of anything thrown, for folding into warnings and error lists. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
