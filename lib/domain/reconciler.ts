import { describeError } from "@/lib/domain/errors";
import { resolveDueDate } from "@/lib/domain/followups";
import { DEFAULT_INVENTORY_UNIT, adjustInventoryQuantity } from "@/lib/domain/inventory";
import { appendJobParts, mergeJobFields, newJobFromFields } from "@/lib/domain/jobs";
import { pickBestMatch } from "@/lib/domain/matching";
import type { FieldOpsStore } from "@/lib/domain/store/types";
import type {
  AppliedOutcome,
  CandidateOutcome,
  CandidateRecord,
  EntityRef,
  FlaggedOutcome,
  FollowUpCreateCandidate,
  InventoryAdjustmentCandidate,
  JobUpdateCandidate,
  ReconciliationResult,
  RejectedOutcome,
} from "@/lib/domain/voice/types";
import type {
  IntakeDisposition,
  IntakeMutation,
  IntakeOutcomeRecord,
  InventoryItem,
  Job,
  JobPart,
} from "@/types/domain";

export type ReconcileOptions = {
  now: Date;
  confidenceThreshold: number;
  maxAttempts: number;
  intakeId?: string | null;
};

type BatchState = {
  appliedJobIds: Set<string>;
  consumedParts: JobPart[];
};

// Job updates go first so follow-ups and consumed parts in the same note can attach to them.
const APPLY_ORDER: Record<CandidateRecord["type"], number> = {
  job_update: 0,
  inventory_adjustment: 1,
  followup_create: 2,
};

const hasRef = (ref: EntityRef | null | undefined): ref is EntityRef =>
  Boolean(ref && (ref.id || ref.nameHint));

const describeRef = (ref: EntityRef) => ref.nameHint ?? ref.id ?? "unknown";

function rejected(
  candidate: CandidateRecord,
  code: RejectedOutcome["code"],
  message: string,
): RejectedOutcome {
  return { status: "rejected", candidate, code, message };
}

export async function resolveJob(store: FieldOpsStore, ref: EntityRef): Promise<Job | null> {
  if (ref.id) {
    const job = await store.getJob(ref.id);
    if (job) return job;
  }
  if (!ref.nameHint) {
    return null;
  }
  const jobs = await store.searchJobs(ref.nameHint);
  const best = pickBestMatch(ref.nameHint, jobs, (job) => [job.customer_name, job.description, job.job_type]);
  if (best.tiedWith > 0) {
    console.log("[reconciler] Job reference tied; using most recently updated", {
      nameHint: ref.nameHint,
      chosen: best.match?.id,
      tiedWith: best.tiedWith,
    });
  }
  return best.match;
}

export async function resolveInventoryItem(
  store: FieldOpsStore,
  ref: EntityRef,
): Promise<InventoryItem | null> {
  if (ref.id) {
    const item = await store.getInventoryItem(ref.id);
    if (item) return item;
  }
  if (!ref.nameHint) {
    return null;
  }
  const items = await store.searchInventoryItems(ref.nameHint);
  return pickBestMatch(ref.nameHint, items, (item) => [item.name]).match;
}

async function applyJobUpdate(
  store: FieldOpsStore,
  candidate: JobUpdateCandidate,
  options: ReconcileOptions,
  batch: BatchState,
): Promise<CandidateOutcome> {
  const nowIso = options.now.toISOString();
  const job = hasRef(candidate.ref) ? await resolveJob(store, candidate.ref) : null;

  if (!job) {
    if (!candidate.createIfMissing) {
      const target = hasRef(candidate.ref) ? `"${describeRef(candidate.ref)}"` : "an unnamed job";
      return rejected(candidate, "UnresolvedReference", `No job matches ${target}`);
    }
    const fields = { description: candidate.ref.nameHint ?? undefined, ...candidate.fields };
    const created = await store.insertJob(newJobFromFields(fields, nowIso));
    batch.appliedJobIds.add(created.id);
    return {
      status: "applied",
      candidate,
      mutation: { entity_type: "job", entity_id: created.id, action: "created" },
    };
  }

  let current: Job | null = job;
  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    if (!current) {
      return rejected(candidate, "UnresolvedReference", `Job ${job.id} no longer exists`);
    }
    const merge = mergeJobFields(current, candidate.fields, nowIso);
    if (!merge.ok) {
      return rejected(candidate, merge.code, merge.message);
    }
    const updated = await store.updateJobIfUnchanged(current.id, current.updated_at, merge.patch);
    if (updated) {
      batch.appliedJobIds.add(updated.id);
      return {
        status: "applied",
        candidate,
        mutation: { entity_type: "job", entity_id: updated.id, action: "updated" },
      };
    }
    current = await store.getJob(job.id);
  }

  return rejected(
    candidate,
    "ConcurrentUpdateConflict",
    `Job ${job.id} kept changing; gave up after ${options.maxAttempts} attempts`,
  );
}

async function applyInventoryAdjustment(
  store: FieldOpsStore,
  candidate: InventoryAdjustmentCandidate,
  options: ReconcileOptions,
  batch: BatchState,
): Promise<CandidateOutcome> {
  const nowIso = options.now.toISOString();
  if (!hasRef(candidate.ref)) {
    return rejected(candidate, "UnresolvedReference", "Inventory adjustment names no item");
  }

  const item = await resolveInventoryItem(store, candidate.ref);
  if (!item) {
    // Only restocking may introduce a new item; consuming something we never stocked is an error.
    if (candidate.createIfMissing && candidate.delta > 0 && candidate.ref.nameHint) {
      const created = await store.insertInventoryItem({
        name: candidate.ref.nameHint,
        quantity: candidate.delta,
        unit: candidate.unit ?? DEFAULT_INVENTORY_UNIT,
        low_stock_threshold: null,
        unit_cost: 0,
        updated_at: nowIso,
      });
      return {
        status: "applied",
        candidate,
        mutation: { entity_type: "inventory_item", entity_id: created.id, action: "created" },
        before: 0,
        after: created.quantity,
      };
    }
    return rejected(
      candidate,
      "UnresolvedReference",
      `No inventory item matches "${describeRef(candidate.ref)}"`,
    );
  }

  const result = await adjustInventoryQuantity(store, item, candidate.delta, {
    maxAttempts: options.maxAttempts,
    now: nowIso,
  });
  if (!result.ok) {
    return rejected(candidate, result.code, result.message);
  }

  if (candidate.delta < 0) {
    batch.consumedParts.push({
      item_id: result.item.id,
      item_name: result.item.name,
      quantity: -candidate.delta,
      unit_cost: result.item.unit_cost,
    });
  }

  return {
    status: "applied",
    candidate,
    mutation: { entity_type: "inventory_item", entity_id: result.item.id, action: "adjusted" },
    before: result.before,
    after: result.after,
  };
}

function singleAppliedJobId(batch: BatchState) {
  return batch.appliedJobIds.size === 1 ? Array.from(batch.appliedJobIds)[0] : null;
}

async function applyFollowUpCreate(
  store: FieldOpsStore,
  candidate: FollowUpCreateCandidate,
  options: ReconcileOptions,
  batch: BatchState,
): Promise<CandidateOutcome> {
  let job: Job | null = null;
  if (hasRef(candidate.jobRef)) {
    job = await resolveJob(store, candidate.jobRef);
    if (!job) {
      console.log("[reconciler] Follow-up job reference unresolved; creating without a job", {
        intakeId: options.intakeId,
        jobHint: describeRef(candidate.jobRef),
      });
    }
  } else {
    const jobId = singleAppliedJobId(batch);
    job = jobId ? await store.getJob(jobId) : null;
  }

  const followUp = await store.insertFollowUp({
    job_id: job?.id ?? null,
    customer_name: candidate.customerName ?? job?.customer_name ?? null,
    description: candidate.description,
    due_date: resolveDueDate(candidate, options.now),
    status: "pending",
    created_at: options.now.toISOString(),
  });

  return {
    status: "applied",
    candidate,
    mutation: { entity_type: "follow_up", entity_id: followUp.id, action: "created" },
  };
}

// Parts consumed in a note about exactly one job are billed to that job.
async function attachConsumedParts(store: FieldOpsStore, batch: BatchState, options: ReconcileOptions) {
  const jobId = singleAppliedJobId(batch);
  if (!jobId || !batch.consumedParts.length) {
    return;
  }

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    const job = await store.getJob(jobId);
    if (!job) return;
    const updated = await store.updateJobIfUnchanged(job.id, job.updated_at, {
      parts_used: appendJobParts(job.parts_used, batch.consumedParts),
      updated_at: options.now.toISOString(),
    });
    if (updated) return;
  }

  console.error("[reconciler] Could not record consumed parts on job", {
    intakeId: options.intakeId,
    jobId,
    parts: batch.consumedParts.length,
  });
}

function pushOutcome(result: ReconciliationResult, outcome: CandidateOutcome) {
  switch (outcome.status) {
    case "applied":
      result.applied.push(outcome);
      break;
    case "flagged":
      result.flagged.push(outcome);
      break;
    case "rejected":
      result.rejected.push(outcome);
      break;
  }
}

function applyCandidate(
  store: FieldOpsStore,
  candidate: CandidateRecord,
  options: ReconcileOptions,
  batch: BatchState,
): Promise<CandidateOutcome> {
  switch (candidate.type) {
    case "job_update":
      return applyJobUpdate(store, candidate, options, batch);
    case "inventory_adjustment":
      return applyInventoryAdjustment(store, candidate, options, batch);
    case "followup_create":
      return applyFollowUpCreate(store, candidate, options, batch);
  }
}

/**
 * Applies candidate records to the store. Low-confidence candidates are flagged untouched; every other
 * candidate ends up applied or rejected, and a failure on one never stops the rest.
 */
export async function reconcileCandidates(
  store: FieldOpsStore,
  candidates: CandidateRecord[],
  options: ReconcileOptions,
): Promise<ReconciliationResult> {
  const result: ReconciliationResult = { applied: [], flagged: [], rejected: [] };
  const batch: BatchState = { appliedJobIds: new Set(), consumedParts: [] };

  const ordered = candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => APPLY_ORDER[a.candidate.type] - APPLY_ORDER[b.candidate.type] || a.index - b.index)
    .map(({ candidate }) => candidate);

  for (const candidate of ordered) {
    if (candidate.needsReview || candidate.confidence < options.confidenceThreshold) {
      const flagged: FlaggedOutcome = {
        status: "flagged",
        candidate,
        reason: `Confidence ${candidate.confidence.toFixed(2)} is below the review threshold ${options.confidenceThreshold}`,
      };
      result.flagged.push(flagged);
      continue;
    }

    let outcome: CandidateOutcome;
    try {
      outcome = await applyCandidate(store, candidate, options, batch);
    } catch (error) {
      console.error("[reconciler] Storage failure while applying candidate", {
        intakeId: options.intakeId,
        type: candidate.type,
        error: describeError(error),
      });
      outcome = rejected(candidate, "StorageFailure", describeError(error));
    }
    pushOutcome(result, outcome);
  }

  try {
    await attachConsumedParts(store, batch, options);
  } catch (error) {
    console.error("[reconciler] Storage failure while recording consumed parts", {
      intakeId: options.intakeId,
      error: describeError(error),
    });
  }

  console.log("[reconciler] Reconciled candidates", {
    intakeId: options.intakeId,
    applied: result.applied.length,
    flagged: result.flagged.length,
    rejected: result.rejected.length,
  });
  return result;
}

export function determineDisposition({ applied, flagged, rejected }: ReconciliationResult): IntakeDisposition {
  if (!applied.length && !flagged.length && !rejected.length) return "rejected";
  if (!rejected.length && !flagged.length) return "applied";
  if (!applied.length && !flagged.length) return "rejected";
  return "partially_applied";
}

export function collectMutations(result: ReconciliationResult): IntakeMutation[] {
  return result.applied.map((outcome: AppliedOutcome) => outcome.mutation);
}

export function toOutcomeRecords(result: ReconciliationResult): IntakeOutcomeRecord[] {
  return [
    ...result.applied.map((outcome) => ({
      type: outcome.candidate.type,
      status: outcome.status,
      confidence: outcome.candidate.confidence,
      entity_id: outcome.mutation.entity_id,
    })),
    ...result.flagged.map((outcome) => ({
      type: outcome.candidate.type,
      status: outcome.status,
      confidence: outcome.candidate.confidence,
      reason: outcome.reason,
    })),
    ...result.rejected.map((outcome) => ({
      type: outcome.candidate.type,
      status: outcome.status,
      confidence: outcome.candidate.confidence,
      code: outcome.code,
      reason: outcome.message,
    })),
  ];
}
