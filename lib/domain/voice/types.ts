import { z } from "zod";

import { JOB_STATUSES } from "@/types/domain";
import type { IntakeDisposition, IntakeMutation, JobStatus } from "@/types/domain";
import type { AdapterErrorCode, EMPTY_AUDIO, ReconcileErrorCode } from "@/lib/domain/errors";

// Voice intake flows through three closed shapes: the transcript, the candidate records the model
// proposes, and the reconciliation outcome for each candidate.

export interface TranscriptionResult {
  transcript: string;
  confidence: number;
  durationSeconds: number;
}

export interface EntityRef {
  id?: string | null;
  nameHint?: string | null;
}

export type FieldConfidence = Record<string, number>;

interface CandidateBase {
  confidence: number;
  fieldConfidence: FieldConfidence;
  needsReview: boolean;
}

export interface JobUpdateFields {
  status?: JobStatus;
  description?: string;
  customerName?: string;
  jobType?: string;
  laborHours?: number;
  scheduledAt?: string;
}

export interface JobUpdateCandidate extends CandidateBase {
  type: "job_update";
  ref: EntityRef;
  createIfMissing: boolean;
  fields: JobUpdateFields;
}

export interface InventoryAdjustmentCandidate extends CandidateBase {
  type: "inventory_adjustment";
  ref: EntityRef;
  delta: number;
  unit?: string | null;
  createIfMissing: boolean;
}

export interface FollowUpCreateCandidate extends CandidateBase {
  type: "followup_create";
  description: string;
  dueDate?: string | null;
  dueText?: string | null;
  jobRef?: EntityRef | null;
  customerName?: string | null;
}

export type CandidateRecord =
  | JobUpdateCandidate
  | InventoryAdjustmentCandidate
  | FollowUpCreateCandidate;

export interface ExtractionResult {
  candidates: CandidateRecord[];
  unmatchedText: string;
  confidence: number | null;
  modelName: string | null;
}

export type AppliedOutcome = {
  status: "applied";
  candidate: CandidateRecord;
  mutation: IntakeMutation;
  before?: number | null;
  after?: number | null;
};

export type FlaggedOutcome = {
  status: "flagged";
  candidate: CandidateRecord;
  reason: string;
};

export type RejectedOutcome = {
  status: "rejected";
  candidate: CandidateRecord;
  code: ReconcileErrorCode;
  message: string;
};

export type CandidateOutcome = AppliedOutcome | FlaggedOutcome | RejectedOutcome;

export interface ReconciliationResult {
  applied: AppliedOutcome[];
  flagged: FlaggedOutcome[];
  rejected: RejectedOutcome[];
}

export interface VoiceIntakeSummary {
  intakeId: string | null;
  disposition: IntakeDisposition;
  transcript: string;
  transcriptionConfidence: number;
  durationSeconds: number;
  extractionConfidence: number | null;
  unmatchedText: string;
  applied: AppliedOutcome[];
  flagged: FlaggedOutcome[];
  rejected: RejectedOutcome[];
  lowStockItems: string[];
  // Why a rejected intake had nothing to process, when no adapter failed.
  reason: { code: typeof EMPTY_AUDIO; message: string } | null;
  error: { code: AdapterErrorCode; message: string } | null;
}

// --- Model output (snake_case, as the prompt asks for it) ---

const confidenceSchema = z.number().min(0).max(1);
const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const fieldConfidenceSchema = z.record(confidenceSchema).nullish().transform((value) => value ?? {});

export const modelJobUpdateSchema = z.object({
  type: z.literal("job_update"),
  job_id: optionalText,
  job_hint: optionalText,
  create_if_missing: z.boolean().nullish().transform((value) => value ?? false),
  fields: z
    .object({
      status: z.enum(JOB_STATUSES).nullish(),
      description: optionalText,
      customer_name: optionalText,
      job_type: optionalText,
      labor_hours: z.number().min(0).nullish(),
      scheduled_at: optionalText,
    })
    .nullish()
    .transform((value): Partial<NonNullable<typeof value>> => value ?? {}),
  confidence: confidenceSchema.nullish(),
  field_confidence: fieldConfidenceSchema,
});

export const modelInventoryAdjustmentSchema = z.object({
  type: z.literal("inventory_adjustment"),
  item_id: optionalText,
  item_hint: optionalText,
  delta: z
    .number()
    .int()
    .refine((value) => value !== 0, { message: "delta must be non-zero" }),
  unit: optionalText,
  create_if_missing: z.boolean().nullish().transform((value) => value ?? false),
  confidence: confidenceSchema.nullish(),
  field_confidence: fieldConfidenceSchema,
});

export const modelFollowUpCreateSchema = z.object({
  type: z.literal("followup_create"),
  description: z.string().trim().min(1),
  due_date: optionalText,
  due_text: optionalText,
  job_id: optionalText,
  job_hint: optionalText,
  customer_name: optionalText,
  confidence: confidenceSchema.nullish(),
  field_confidence: fieldConfidenceSchema,
});

export const modelRecordSchema = z.discriminatedUnion("type", [
  modelJobUpdateSchema,
  modelInventoryAdjustmentSchema,
  modelFollowUpCreateSchema,
]);

export type ModelRecord = z.infer<typeof modelRecordSchema>;

export const modelExtractionPayloadSchema = z.object({
  records: z.array(z.unknown()).nullish().transform((value) => value ?? []),
  unmatched_text: z.string().nullish(),
});
