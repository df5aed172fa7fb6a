import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  collectMutations,
  determineDisposition,
  reconcileCandidates,
  toOutcomeRecords,
} from "@/lib/domain/reconciler";
import type {
  FollowUpCreateCandidate,
  InventoryAdjustmentCandidate,
  JobUpdateCandidate,
} from "@/lib/domain/voice/types";
import { InMemoryFieldOpsStore } from "@/tests/setup/inMemoryFieldOpsStore";

const NOW = new Date("2025-03-12T15:30:00.000Z");
const options = { now: NOW, confidenceThreshold: 0.6, maxAttempts: 3, intakeId: "intake-test" };

const base = { confidence: 0.9, fieldConfidence: {}, needsReview: false };

const jobUpdate = (overrides: Partial<JobUpdateCandidate> = {}): JobUpdateCandidate => ({
  type: "job_update",
  ...base,
  ref: {},
  createIfMissing: false,
  fields: {},
  ...overrides,
});

const inventoryAdjustment = (
  overrides: Partial<InventoryAdjustmentCandidate> & { delta: number },
): InventoryAdjustmentCandidate => ({
  type: "inventory_adjustment",
  ...base,
  ref: {},
  createIfMissing: false,
  ...overrides,
});

const followUpCreate = (overrides: Partial<FollowUpCreateCandidate> = {}): FollowUpCreateCandidate => ({
  type: "followup_create",
  ...base,
  description: "Check the water heater",
  ...overrides,
});

let store: InMemoryFieldOpsStore;

beforeEach(() => {
  store = new InMemoryFieldOpsStore();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("reconcileCandidates", () => {
  it("applies a job update, consumption and follow-up from one note", async () => {
    const job = store.seedJob({ customer_name: "Priya Sharma", status: "in_progress" });
    const item = store.seedItem({ name: "Oil Filter", quantity: 10, unit_cost: 8.5 });

    const result = await reconcileCandidates(
      store,
      [
        followUpCreate({ dueText: "in 6 months" }),
        inventoryAdjustment({ ref: { nameHint: "oil filters" }, delta: -3 }),
        jobUpdate({ ref: { nameHint: "Sharma" }, fields: { status: "completed", laborHours: 2 } }),
      ],
      options,
    );

    expect(result.flagged).toEqual([]);
    expect(result.rejected).toEqual([]);
    expect(result.applied.map((outcome) => outcome.mutation)).toEqual([
      { entity_type: "job", entity_id: job.id, action: "updated" },
      { entity_type: "inventory_item", entity_id: item.id, action: "adjusted" },
      { entity_type: "follow_up", entity_id: expect.any(String), action: "created" },
    ]);
    expect(result.applied[1]).toMatchObject({ before: 10, after: 7 });
    expect(determineDisposition(result)).toBe("applied");

    expect(store.items.get(item.id)?.quantity).toBe(7);
    expect(store.jobs.get(job.id)).toMatchObject({
      status: "completed",
      labor_hours: 2,
      updated_at: NOW.toISOString(),
      parts_used: [{ item_id: item.id, item_name: "Oil Filter", quantity: 3, unit_cost: 8.5 }],
    });

    const [followUp] = Array.from(store.followUps.values());
    expect(followUp).toMatchObject({
      job_id: job.id,
      customer_name: "Priya Sharma",
      description: "Check the water heater",
      due_date: "2025-09-12",
      status: "pending",
      created_at: NOW.toISOString(),
    });
  });

  it("flags low-confidence candidates without touching storage", async () => {
    const item = store.seedItem({ name: "Oil Filter", quantity: 10 });

    const result = await reconcileCandidates(
      store,
      [inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -3, confidence: 0.5 })],
      options,
    );

    expect(result.applied).toEqual([]);
    expect(result.flagged).toEqual([
      {
        status: "flagged",
        candidate: expect.objectContaining({ type: "inventory_adjustment" }),
        reason: "Confidence 0.50 is below the review threshold 0.6",
      },
    ]);
    expect(store.items.get(item.id)?.quantity).toBe(10);
    expect(determineDisposition(result)).toBe("partially_applied");
  });

  it("flags candidates the extractor marked for review", async () => {
    store.seedItem({ name: "Oil Filter", quantity: 10 });

    const result = await reconcileCandidates(
      store,
      [inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -3, needsReview: true })],
      options,
    );

    expect(result.flagged).toHaveLength(1);
    expect(result.applied).toEqual([]);
  });

  it("breaks ties toward the most recently updated job", async () => {
    store.seedJob({ id: "job-a", customer_name: "Dana Lee", updated_at: "2025-03-01T00:00:00.000Z" });
    store.seedJob({ id: "job-b", customer_name: "Sam Lee", updated_at: "2025-03-10T00:00:00.000Z" });

    const result = await reconcileCandidates(
      store,
      [jobUpdate({ ref: { nameHint: "Lee" }, fields: { laborHours: 1 } })],
      options,
    );

    expect(result.applied[0].mutation.entity_id).toBe("job-b");
    expect(store.jobs.get("job-a")?.labor_hours).toBe(0);
  });

  it("breaks ties on equal recency toward the smallest id", async () => {
    store.seedJob({ id: "job-b", customer_name: "Sam Lee" });
    store.seedJob({ id: "job-a", customer_name: "Dana Lee" });

    const result = await reconcileCandidates(
      store,
      [jobUpdate({ ref: { nameHint: "Lee" }, fields: { laborHours: 1 } })],
      options,
    );

    expect(result.applied[0].mutation.entity_id).toBe("job-a");
  });

  it("prefers an id reference over the name hint", async () => {
    store.seedJob({ id: "job-a", customer_name: "Dana Lee" });
    store.seedJob({ id: "job-b", customer_name: "Sam Lee", updated_at: "2025-03-10T00:00:00.000Z" });

    const result = await reconcileCandidates(
      store,
      [jobUpdate({ ref: { id: "job-a", nameHint: "Lee" }, fields: { laborHours: 1 } })],
      options,
    );

    expect(result.applied[0].mutation.entity_id).toBe("job-a");
  });

  it("rejects references that match nothing", async () => {
    const result = await reconcileCandidates(
      store,
      [
        jobUpdate({ ref: { nameHint: "Nguyen" }, fields: { status: "completed" } }),
        inventoryAdjustment({ ref: { nameHint: "widget" }, delta: -1 }),
        inventoryAdjustment({ delta: -1 }),
      ],
      options,
    );

    expect(result.rejected.map(({ code, message }) => ({ code, message }))).toEqual([
      { code: "UnresolvedReference", message: 'No job matches "Nguyen"' },
      { code: "UnresolvedReference", message: 'No inventory item matches "widget"' },
      { code: "UnresolvedReference", message: "Inventory adjustment names no item" },
    ]);
    expect(determineDisposition(result)).toBe("rejected");
  });

  it("refuses to take stock below zero", async () => {
    const item = store.seedItem({ name: "Oil Filter", quantity: 2 });

    const result = await reconcileCandidates(
      store,
      [inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -5 })],
      options,
    );

    expect(result.rejected).toEqual([
      {
        status: "rejected",
        candidate: expect.objectContaining({ delta: -5 }),
        code: "InsufficientStock",
        message: "Only 2 piece of Oil Filter on hand; cannot remove 5",
      },
    ]);
    expect(store.items.get(item.id)?.quantity).toBe(2);
  });

  it("resolves stored plural names whose singular is spelled differently", async () => {
    const item = store.seedItem({ name: "Batteries", quantity: 10 });

    const result = await reconcileCandidates(
      store,
      [inventoryAdjustment({ ref: { nameHint: "batteries" }, delta: -2 })],
      options,
    );

    expect(result.rejected).toEqual([]);
    expect(result.applied.map((outcome) => outcome.mutation)).toEqual([
      { entity_type: "inventory_item", entity_id: item.id, action: "adjusted" },
    ]);
    expect(store.items.get(item.id)?.quantity).toBe(8);
  });

  it("serializes concurrent consumption of the same item", async () => {
    const item = store.seedItem({ name: "Oil Filter", quantity: 5 });

    const [first, second] = await Promise.all([
      reconcileCandidates(store, [inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -4 })], options),
      reconcileCandidates(store, [inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -3 })], options),
    ]);

    expect(first.applied[0]).toMatchObject({ before: 5, after: 1 });
    expect(second.rejected[0]).toMatchObject({
      code: "InsufficientStock",
      message: "Only 1 piece of Oil Filter on hand; cannot remove 3",
    });
    expect(store.items.get(item.id)?.quantity).toBe(1);
  });

  it("creates a job when asked and nothing matches", async () => {
    const result = await reconcileCandidates(
      store,
      [
        jobUpdate({
          ref: { nameHint: "Boiler service for Ortiz" },
          createIfMissing: true,
          fields: { customerName: "Ortiz" },
        }),
      ],
      options,
    );

    const [mutation] = collectMutations(result);
    expect(mutation).toMatchObject({ entity_type: "job", action: "created" });
    expect(store.jobs.get(mutation.entity_id)).toMatchObject({
      customer_name: "Ortiz",
      description: "Boiler service for Ortiz",
      status: "open",
      labor_hours: 0,
      parts_used: [],
      created_at: NOW.toISOString(),
    });
  });

  it("rejects a backwards status transition", async () => {
    const job = store.seedJob({ customer_name: "Priya Sharma", status: "completed" });

    const result = await reconcileCandidates(
      store,
      [jobUpdate({ ref: { nameHint: "Sharma" }, fields: { status: "in_progress" } })],
      options,
    );

    expect(result.rejected[0]).toMatchObject({
      code: "InvalidStatusTransition",
      message: "Job cannot move from completed to in_progress",
    });
    expect(store.jobs.get(job.id)?.status).toBe("completed");
  });

  it("creates restocked items only for positive deltas", async () => {
    const result = await reconcileCandidates(
      store,
      [
        inventoryAdjustment({ ref: { nameHint: "Pipe Tape" }, delta: 12, unit: "roll", createIfMissing: true }),
        inventoryAdjustment({ ref: { nameHint: "Flux" }, delta: -1, createIfMissing: true }),
      ],
      options,
    );

    expect(result.applied[0]).toMatchObject({
      mutation: { entity_type: "inventory_item", action: "created" },
      before: 0,
      after: 12,
    });
    expect(store.items.get(result.applied[0].mutation.entity_id)).toMatchObject({
      name: "Pipe Tape",
      quantity: 12,
      unit: "roll",
      unit_cost: 0,
    });
    expect(result.rejected[0]).toMatchObject({
      code: "UnresolvedReference",
      message: 'No inventory item matches "Flux"',
    });
    expect(determineDisposition(result)).toBe("partially_applied");
  });

  it("creates a follow-up without a job when its reference does not resolve", async () => {
    const result = await reconcileCandidates(
      store,
      [followUpCreate({ jobRef: { nameHint: "Okafor" }, customerName: "Ada Okafor", dueText: "friday" })],
      options,
    );

    const followUp = store.followUps.get(result.applied[0].mutation.entity_id);
    expect(followUp).toMatchObject({ job_id: null, customer_name: "Ada Okafor", due_date: "2025-03-14" });
  });

  it("leaves parts off jobs when the note touched more than one", async () => {
    const first = store.seedJob({ customer_name: "Dana Lee" });
    const second = store.seedJob({ customer_name: "Ortiz" });
    store.seedItem({ name: "Oil Filter", quantity: 10 });

    await reconcileCandidates(
      store,
      [
        jobUpdate({ ref: { id: first.id }, fields: { laborHours: 1 } }),
        jobUpdate({ ref: { id: second.id }, fields: { laborHours: 2 } }),
        inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -1 }),
      ],
      options,
    );

    expect(store.jobs.get(first.id)?.parts_used).toEqual([]);
    expect(store.jobs.get(second.id)?.parts_used).toEqual([]);
  });

  it("turns a storage error into a StorageFailure and keeps going", async () => {
    store.seedItem({ name: "Oil Filter", quantity: 10 });
    vi.spyOn(store, "insertFollowUp").mockRejectedValueOnce(
      new Error("Failed to insert follow-up: connection reset"),
    );

    const result = await reconcileCandidates(
      store,
      [followUpCreate(), inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -1 })],
      options,
    );

    expect(result.applied).toHaveLength(1);
    expect(result.rejected[0]).toMatchObject({
      code: "StorageFailure",
      message: "Failed to insert follow-up: connection reset",
    });
    expect(determineDisposition(result)).toBe("partially_applied");
  });
});

describe("determineDisposition", () => {
  it("treats an empty result as rejected", () => {
    expect(determineDisposition({ applied: [], flagged: [], rejected: [] })).toBe("rejected");
  });
});

describe("toOutcomeRecords", () => {
  it("summarizes each outcome for the intake audit row", async () => {
    const item = store.seedItem({ name: "Oil Filter", quantity: 1 });

    const result = await reconcileCandidates(
      store,
      [
        inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -1 }),
        inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -1, confidence: 0.3 }),
        inventoryAdjustment({ ref: { nameHint: "oil filter" }, delta: -2, confidence: 0.8 }),
      ],
      options,
    );

    expect(toOutcomeRecords(result)).toEqual([
      { type: "inventory_adjustment", status: "applied", confidence: 0.9, entity_id: item.id },
      {
        type: "inventory_adjustment",
        status: "flagged",
        confidence: 0.3,
        reason: "Confidence 0.30 is below the review threshold 0.6",
      },
      {
        type: "inventory_adjustment",
        status: "rejected",
        confidence: 0.8,
        code: "InsufficientStock",
        reason: "Only 0 piece of Oil Filter on hand; cannot remove 2",
      },
    ]);
  });
});
