import { APIConnectionTimeoutError, APIUserAbortError } from "openai";

import { FieldOpsError, describeError } from "@/lib/domain/errors";
import { withTimeout } from "@/utils/async/withTimeout";
import { callExtractionModel } from "@/utils/openai/fieldops";

import {
  modelExtractionPayloadSchema,
  modelRecordSchema,
  type CandidateRecord,
  type ExtractionResult,
  type FieldConfidence,
  type JobUpdateFields,
  type ModelRecord,
} from "./types";

// Used when the model gives neither an overall nor a per-field confidence.
export const DEFAULT_CANDIDATE_CONFIDENCE = 0.85;

type ExtractOptions = {
  timeoutMs: number;
  confidenceThreshold: number;
  referenceDate: string;
};

function candidateConfidence(overall: number | null | undefined, fieldConfidence: FieldConfidence) {
  if (typeof overall === "number") {
    return overall;
  }
  const fieldValues = Object.values(fieldConfidence);
  return fieldValues.length ? Math.min(...fieldValues) : DEFAULT_CANDIDATE_CONFIDENCE;
}

function toJobFields(fields: Extract<ModelRecord, { type: "job_update" }>["fields"]): JobUpdateFields {
  const result: JobUpdateFields = {};
  if (fields.status) result.status = fields.status;
  if (fields.description) result.description = fields.description;
  if (fields.customer_name) result.customerName = fields.customer_name;
  if (fields.job_type) result.jobType = fields.job_type;
  if (typeof fields.labor_hours === "number") result.laborHours = fields.labor_hours;
  if (fields.scheduled_at) result.scheduledAt = fields.scheduled_at;
  return result;
}

export function toCandidate(record: ModelRecord, confidenceThreshold: number): CandidateRecord {
  const confidence = candidateConfidence(record.confidence, record.field_confidence);
  const base = {
    confidence,
    fieldConfidence: record.field_confidence,
    needsReview: confidence < confidenceThreshold,
  };

  switch (record.type) {
    case "job_update":
      return {
        ...base,
        type: "job_update",
        ref: { id: record.job_id, nameHint: record.job_hint },
        createIfMissing: record.create_if_missing,
        fields: toJobFields(record.fields),
      };
    case "inventory_adjustment":
      return {
        ...base,
        type: "inventory_adjustment",
        ref: { id: record.item_id, nameHint: record.item_hint },
        delta: record.delta,
        unit: record.unit,
        createIfMissing: record.create_if_missing,
      };
    case "followup_create":
      return {
        ...base,
        type: "followup_create",
        description: record.description,
        dueDate: record.due_date,
        dueText: record.due_text,
        jobRef: record.job_id || record.job_hint ? { id: record.job_id, nameHint: record.job_hint } : null,
        customerName: record.customer_name,
      };
  }
}

function mapExtractionError(error: unknown): FieldOpsError {
  if (error instanceof FieldOpsError) {
    return error;
  }
  if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
    return new FieldOpsError("ExtractionTimeout", "Extraction model timed out", { cause: error });
  }
  return new FieldOpsError("ExtractionUnavailable", `Extraction model unavailable: ${describeError(error)}`, {
    cause: error,
  });
}

/**
 * Turns a transcript into candidate records. Records that fail validation are dropped one by one; the
 * call only fails when the model is unreachable, too slow, or answers with something that is not JSON.
 */
export async function extractCandidates(
  transcript: string,
  { timeoutMs, confidenceThreshold, referenceDate }: ExtractOptions,
): Promise<ExtractionResult> {
  const trimmed = transcript.trim();
  if (!trimmed) {
    return { candidates: [], unmatchedText: "", confidence: null, modelName: null };
  }

  let response: Awaited<ReturnType<typeof callExtractionModel>>;
  try {
    response = await withTimeout(
      (signal) => callExtractionModel({ transcript: trimmed, referenceDate, signal }),
      timeoutMs,
      () => new FieldOpsError("ExtractionTimeout", `Extraction exceeded ${timeoutMs}ms`),
    );
  } catch (error) {
    throw mapExtractionError(error);
  }

  const payload = modelExtractionPayloadSchema.safeParse(response.payload);
  if (!payload.success) {
    throw new FieldOpsError("ExtractionUnavailable", "Extraction model returned an unexpected shape");
  }

  const candidates: CandidateRecord[] = [];
  payload.data.records.forEach((record, index) => {
    const parsed = modelRecordSchema.safeParse(record);
    if (!parsed.success) {
      console.warn("[voice-extraction] Dropping invalid record", {
        index,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return;
    }
    candidates.push(toCandidate(parsed.data, confidenceThreshold));
  });

  const unmatchedText = candidates.length ? payload.data.unmatched_text?.trim() ?? "" : trimmed;
  const confidence = candidates.length
    ? candidates.reduce((sum, candidate) => sum + candidate.confidence, 0) / candidates.length
    : null;

  console.log("[voice-extraction] Extracted candidates", {
    model: response.modelName,
    received: payload.data.records.length,
    accepted: candidates.length,
    needsReview: candidates.filter((candidate) => candidate.needsReview).length,
  });

  return { candidates, unmatchedText, confidence, modelName: response.modelName };
}
