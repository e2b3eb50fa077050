export type StudioErrorCode =
  | "UNKNOWN_CAPABILITY"
  | "INVALID_CAPABILITY"
  | "VALIDATION_REJECTED"
  | "BACKEND_CALL_FAILED"
  | "PARTIAL_RESULT"
  | "SOURCE_READ_FAILED"
  | "CONFIGURATION_ERROR";

export class StudioError extends Error {
  readonly code: StudioErrorCode;
  constructor(message: string, code: StudioErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StudioError";
    this.code = code;
  }
}

/** Unknown or misconfigured capability name. Fatal, never retried. */
export class ConstructionError extends StudioError {
  constructor(message: string, code: "UNKNOWN_CAPABILITY" | "INVALID_CAPABILITY" = "UNKNOWN_CAPABILITY") {
    super(message, code);
    this.name = "ConstructionError";
  }
}

export class ValidationRejection extends StudioError {
  readonly attempt: number;
  constructor(message: string, attempt: number) {
    super(message, "VALIDATION_REJECTED");
    this.name = "ValidationRejection";
    this.attempt = attempt;
  }
}

export class BackendCallFailure extends StudioError {
  constructor(message: string, cause?: unknown) {
    super(message, "BACKEND_CALL_FAILED", { cause });
    this.name = "BackendCallFailure";
  }
}

/** A modality result is present but does not carry the fields a consumer expects. */
export class PartialResultError extends StudioError {
  readonly modality: string;
  constructor(modality: string, message: string) {
    super(message, "PARTIAL_RESULT");
    this.name = "PartialResultError";
    this.modality = modality;
  }
}

export class SourceReadError extends StudioError {
  readonly sourcePath: string;
  constructor(sourcePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to read story source ${sourcePath}${detail}`, "SOURCE_READ_FAILED", { cause });
    this.name = "SourceReadError";
    this.sourcePath = sourcePath;
  }
}

export class ConfigurationError extends StudioError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}
