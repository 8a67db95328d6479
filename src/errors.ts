/**
 * Error taxonomy shared by the engine and its surfaces.
 *
 * Per-observer failures are isolated by the dispatcher; lookup errors on
 * direct store calls reach the caller unchanged.
 */

export type VigilErrorCode =
  | "CONFIG_INVALID"
  | "CHANGE_DETECTION_FAILED"
  | "OBSERVER_TIMEOUT"
  | "OBSERVER_INVOCATION_FAILED"
  | "RECONCILIATION_REFERENCE"
  | "OBSERVATION_NOT_FOUND"
  | "OBSERVATION_INVALID_STATE"
  | "STORAGE_FAILED";

export class VigilError extends Error {
  constructor(
    message: string,
    public readonly code: VigilErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VigilError";
  }

  toJSON(): { error: string; code: VigilErrorCode; details?: Record<string, unknown> } {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export class ConfigError extends VigilError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_INVALID", details);
    this.name = "ConfigError";
  }
}

export class ChangeDetectionError extends VigilError {
  constructor(
    public readonly targetKey: string,
    cause: unknown,
  ) {
    super(
      `Could not fingerprint ${targetKey}: ${describeError(cause)}`,
      "CHANGE_DETECTION_FAILED",
      { targetKey },
      { cause },
    );
    this.name = "ChangeDetectionError";
  }
}

export class ObserverTimeoutError extends VigilError {
  constructor(
    public readonly observerName: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Observer '${observerName}' timed out after ${timeoutMs}ms`,
      "OBSERVER_TIMEOUT",
      { observerName, timeoutMs },
    );
    this.name = "ObserverTimeoutError";
  }
}

export class ObserverInvocationError extends VigilError {
  constructor(
    public readonly observerName: string,
    message: string,
    cause?: unknown,
  ) {
    super(
      `Observer '${observerName}' failed: ${message}`,
      "OBSERVER_INVOCATION_FAILED",
      { observerName },
      { cause },
    );
    this.name = "ObserverInvocationError";
  }
}

export class ReconciliationReferenceError extends VigilError {
  constructor(
    public readonly observationId: string,
    public readonly reason: "not-found" | "already-resolved",
  ) {
    super(
      reason === "not-found"
        ? `Resolution references unknown observation ${observationId}`
        : `Resolution references already resolved observation ${observationId}`,
      "RECONCILIATION_REFERENCE",
      { observationId, reason },
    );
    this.name = "ReconciliationReferenceError";
  }
}

export class ObservationNotFoundError extends VigilError {
  constructor(public readonly observationId: string) {
    super(`Observation not found: ${observationId}`, "OBSERVATION_NOT_FOUND", {
      observationId,
    });
    this.name = "ObservationNotFoundError";
  }
}

export class ObservationStateError extends VigilError {
  constructor(observationId: string, message: string) {
    super(message, "OBSERVATION_INVALID_STATE", { observationId });
    this.name = "ObservationStateError";
  }
}

export class StorageError extends VigilError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_FAILED", undefined, { cause });
    this.name = "StorageError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
