import type { FieldOpsStore, JobPatch, NewJob } from "@/lib/domain/store/types";
import type { JobUpdateFields } from "@/lib/domain/voice/types";
import type { Job, JobPart, JobStatus } from "@/types/domain";
import { parseTimestamp } from "@/utils/dashboard/time";

// Jobs move forward only; cancelled may be entered from any non-terminal state.
const STATUS_RANK: Record<JobStatus, number> = {
  open: 0,
  in_progress: 1,
  completed: 2,
  cancelled: 2,
};

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(["completed", "cancelled"]);

export const OPEN_JOB_STATUSES: readonly JobStatus[] = ["open", "in_progress"];

export function isStatusTransitionAllowed(from: JobStatus, to: JobStatus) {
  if (from === to) return true;
  if (TERMINAL_STATUSES.has(from)) return false;
  if (to === "cancelled") return true;
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export function roundCurrency(value: number) {
  return Math.round(value * 100) / 100;
}

export function computeJobCost(job: Pick<Job, "labor_hours" | "parts_used">, laborRatePerHour: number) {
  const parts = job.parts_used.reduce((sum, part) => sum + part.quantity * part.unit_cost, 0);
  return roundCurrency(laborRatePerHour * job.labor_hours + parts);
}

export type JobFieldMergeResult =
  | { ok: true; patch: JobPatch }
  | { ok: false; code: "InvalidStatusTransition"; message: string };

function normalizeScheduledAt(value: string | undefined) {
  const parsed = parseTimestamp(value);
  return parsed ? parsed.toISOString() : undefined;
}

/** Builds a partial update from the fields the technician mentioned; absent fields stay untouched. */
export function mergeJobFields(job: Job, fields: JobUpdateFields, updatedAt: string): JobFieldMergeResult {
  if (fields.status && !isStatusTransitionAllowed(job.status, fields.status)) {
    return {
      ok: false,
      code: "InvalidStatusTransition",
      message: `Job cannot move from ${job.status} to ${fields.status}`,
    };
  }

  const patch: JobPatch = { updated_at: updatedAt };
  if (fields.status && fields.status !== job.status) patch.status = fields.status;
  if (fields.description !== undefined) patch.description = fields.description;
  if (fields.customerName !== undefined) patch.customer_name = fields.customerName;
  if (fields.jobType !== undefined) patch.job_type = fields.jobType;
  if (fields.laborHours !== undefined) patch.labor_hours = fields.laborHours;
  const scheduledAt = normalizeScheduledAt(fields.scheduledAt);
  if (scheduledAt) patch.scheduled_at = scheduledAt;

  return { ok: true, patch };
}

export function newJobFromFields(fields: JobUpdateFields, now: string): NewJob {
  return {
    customer_name: fields.customerName ?? null,
    job_type: fields.jobType ?? null,
    description: fields.description ?? null,
    status: fields.status ?? "open",
    scheduled_at: normalizeScheduledAt(fields.scheduledAt) ?? null,
    labor_hours: fields.laborHours ?? 0,
    parts_used: [],
    created_at: now,
    updated_at: now,
  };
}

// Same item at the same unit cost collapses into one line.
export function appendJobParts(existing: JobPart[], additions: JobPart[]): JobPart[] {
  const merged = existing.map((part) => ({ ...part }));
  for (const addition of additions) {
    const match = merged.find(
      (part) => part.item_id === addition.item_id && part.unit_cost === addition.unit_cost,
    );
    if (match) {
      match.quantity += addition.quantity;
    } else {
      merged.push({ ...addition });
    }
  }
  return merged;
}

export async function removeJob(store: FieldOpsStore, id: string) {
  const removed = await store.deleteJob(id);
  console.log("[jobs] removeJob", { jobId: id, removed });
  return removed;
}
