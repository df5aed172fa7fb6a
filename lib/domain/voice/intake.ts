import { EMPTY_AUDIO, FieldOpsError, describeError } from "@/lib/domain/errors";
import { isLowStock } from "@/lib/domain/inventory";
import {
  collectMutations,
  determineDisposition,
  reconcileCandidates,
  toOutcomeRecords,
} from "@/lib/domain/reconciler";
import type { FieldOpsStore } from "@/lib/domain/store/types";
import { parseEnvConfig, type EnvConfig } from "@/schemas/env";
import { toDateKey } from "@/utils/dashboard/time";

import { extractCandidates } from "./extraction";
import { transcribeAudio } from "./transcription";
import type {
  ExtractionResult,
  ReconciliationResult,
  TranscriptionResult,
  VoiceIntakeSummary,
} from "./types";

export type VoiceIntakeInput = {
  audio: Uint8Array;
  mimeType: string;
};

export type VoiceIntakeOptions = {
  now?: Date;
  config?: EnvConfig;
};

const EMPTY_RECONCILIATION: ReconciliationResult = { applied: [], flagged: [], rejected: [] };

type IntakeRejection =
  | { kind: "error"; error: FieldOpsError }
  | { kind: "empty"; message: string };

async function recordRejectedIntake(
  store: FieldOpsStore,
  rejection: IntakeRejection,
  now: Date,
  transcription: TranscriptionResult | null,
): Promise<VoiceIntakeSummary> {
  const code = rejection.kind === "error" ? rejection.error.code : EMPTY_AUDIO;
  const message = rejection.kind === "error" ? rejection.error.message : rejection.message;
  const intake = await store.insertVoiceIntake({
    transcript: transcription?.transcript ?? "",
    transcription_confidence: transcription?.confidence ?? 0,
    extraction_confidence: null,
    duration_seconds: transcription?.durationSeconds ?? 0,
    unmatched_text: transcription?.transcript ?? "",
    mutations: [],
    outcomes: [],
    error_code: code,
    disposition: "rejected",
    created_at: now.toISOString(),
  });

  console.warn("[voice-intake] Intake rejected", { intakeId: intake.id, code, message });

  return {
    intakeId: intake.id,
    disposition: "rejected",
    transcript: intake.transcript,
    transcriptionConfidence: intake.transcription_confidence,
    durationSeconds: intake.duration_seconds,
    extractionConfidence: null,
    unmatchedText: intake.unmatched_text,
    ...EMPTY_RECONCILIATION,
    lowStockItems: [],
    reason: rejection.kind === "empty" ? { code: EMPTY_AUDIO, message } : null,
    error: rejection.kind === "error" ? { code: rejection.error.code, message } : null,
  };
}

async function findLowStockItems(
  store: FieldOpsStore,
  result: ReconciliationResult,
  fallbackThreshold: number,
) {
  const itemIds = new Set(
    result.applied
      .filter((outcome) => outcome.mutation.entity_type === "inventory_item")
      .map((outcome) => outcome.mutation.entity_id),
  );
  const items = await Promise.all(Array.from(itemIds, (id) => store.getInventoryItem(id)));
  const names: string[] = [];
  for (const item of items) {
    if (item && isLowStock(item, fallbackThreshold)) {
      names.push(item.name);
    }
  }
  return names;
}

// Only adapter errors become a rejected intake; anything else is a bug or a storage failure.
function asAdapterError(error: unknown): FieldOpsError {
  if (error instanceof FieldOpsError) {
    return error;
  }
  throw error;
}

/**
 * Runs one recording through transcription, extraction and reconciliation and writes the audit row.
 * Adapter failures come back as a rejected summary carrying `error`. A recording without speech is
 * rejected with `reason` set and no error. Storage failures outside the per-candidate loop propagate.
 */
export async function handleVoiceIntake(
  store: FieldOpsStore,
  input: VoiceIntakeInput,
  options: VoiceIntakeOptions = {},
): Promise<VoiceIntakeSummary> {
  const config = options.config ?? parseEnvConfig();
  const now = options.now ?? new Date();
  const startedAt = Date.now();

  let transcription: TranscriptionResult;
  try {
    transcription = await transcribeAudio(input, { timeoutMs: config.transcriptionTimeoutMs });
  } catch (error) {
    return recordRejectedIntake(store, { kind: "error", error: asAdapterError(error) }, now, null);
  }

  if (!transcription.transcript) {
    return recordRejectedIntake(
      store,
      { kind: "empty", message: "No speech detected in the recording" },
      now,
      transcription,
    );
  }

  let extraction: ExtractionResult;
  try {
    extraction = await extractCandidates(transcription.transcript, {
      timeoutMs: config.extractionTimeoutMs,
      confidenceThreshold: config.extractionConfidenceThreshold,
      referenceDate: toDateKey(now),
    });
  } catch (error) {
    return recordRejectedIntake(store, { kind: "error", error: asAdapterError(error) }, now, transcription);
  }

  const intake = await store.insertVoiceIntake({
    transcript: transcription.transcript,
    transcription_confidence: transcription.confidence,
    extraction_confidence: extraction.confidence,
    duration_seconds: transcription.durationSeconds,
    unmatched_text: extraction.unmatchedText,
    mutations: [],
    outcomes: [],
    error_code: null,
    disposition: null,
    created_at: now.toISOString(),
  });

  const result = await reconcileCandidates(store, extraction.candidates, {
    now,
    confidenceThreshold: config.extractionConfidenceThreshold,
    maxAttempts: config.concurrencyMaxAttempts,
    intakeId: intake.id,
  });
  const disposition = determineDisposition(result);

  try {
    await store.finalizeVoiceIntake(intake.id, {
      disposition,
      mutations: collectMutations(result),
      outcomes: toOutcomeRecords(result),
    });
  } catch (error) {
    console.error("[voice-intake] Failed to finalize intake after reconciliation", {
      intakeId: intake.id,
      applied: result.applied.length,
      error: describeError(error),
    });
    throw error;
  }

  const lowStockItems = await findLowStockItems(store, result, config.lowStockThreshold);

  console.log("[voice-intake] Intake processed", {
    intakeId: intake.id,
    disposition,
    candidates: extraction.candidates.length,
    applied: result.applied.length,
    flagged: result.flagged.length,
    rejected: result.rejected.length,
    latencyMs: Date.now() - startedAt,
  });

  return {
    intakeId: intake.id,
    disposition,
    transcript: transcription.transcript,
    transcriptionConfidence: transcription.confidence,
    durationSeconds: transcription.durationSeconds,
    extractionConfidence: extraction.confidence,
    unmatchedText: extraction.unmatchedText,
    applied: result.applied,
    flagged: result.flagged,
    rejected: result.rejected,
    lowStockItems,
    reason: null,
    error: null,
  };
}
