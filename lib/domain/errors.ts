// Error codes shared by the intake pipeline. Adapter-level codes abort an intake; reconciliation
// codes only ever appear inside per-candidate results.
export type AdapterErrorCode =
  | "TranscriptionUnavailable"
  | "TranscriptionTimeout"
  | "UnsupportedFormat"
  | "ExtractionUnavailable"
  | "ExtractionTimeout";

// Written to the intake row when a recording held no speech. Not an error: the request succeeds.
export const EMPTY_AUDIO = "EmptyAudio";

export type ReconcileErrorCode =
  | "UnresolvedReference"
  | "InsufficientStock"
  | "ConcurrentUpdateConflict"
  | "InvalidStatusTransition"
  | "StorageFailure";

const ADAPTER_ERROR_STATUS: Record<AdapterErrorCode, number> = {
  TranscriptionUnavailable: 503,
  TranscriptionTimeout: 504,
  UnsupportedFormat: 422,
  ExtractionUnavailable: 503,
  ExtractionTimeout: 504,
};

export class FieldOpsError extends Error {
  readonly code: AdapterErrorCode;
  readonly status: number;

  constructor(code: AdapterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FieldOpsError";
    this.code = code;
    this.status = ADAPTER_ERROR_STATUS[code];
  }
}

export function describeError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return message.length <= 200 ? message : `${message.slice(0, 197)}...`;
}

export function statusForAdapterError(code: AdapterErrorCode) {
  return ADAPTER_ERROR_STATUS[code];
}
