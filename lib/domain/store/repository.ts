import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { searchTokens } from "@/lib/domain/matching";
import type { Database, Json } from "@/lib/supabase/types";
import type {
  Alert,
  FollowUp,
  FollowUpStatus,
  IntakeMutation,
  IntakeOutcomeRecord,
  InventoryItem,
  Job,
  JobPart,
  VoiceIntake,
} from "@/types/domain";
import { createAdminClient } from "@/utils/supabase/admin";

import type {
  AlertScanChanges,
  FieldOpsStore,
  JobPatch,
  NewFollowUp,
  NewInventoryItem,
  NewJob,
  NewVoiceIntake,
  VoiceIntakeFinalization,
} from "./types";

type DbClient = SupabaseClient<Database>;
type JobRow = Database["public"]["Tables"]["jobs"]["Row"];
type VoiceIntakeRow = Database["public"]["Tables"]["voice_intakes"]["Row"];

const SEARCH_LIMIT = 50;

const jobPartsSchema = z.array(
  z.object({
    item_id: z.string(),
    item_name: z.string(),
    quantity: z.number(),
    unit_cost: z.number(),
  }),
);

const mutationsSchema = z.array(
  z.object({
    entity_type: z.enum(["job", "inventory_item", "follow_up"]),
    entity_id: z.string(),
    action: z.enum(["created", "updated", "adjusted"]),
  }),
);

const outcomesSchema = z.array(
  z.object({
    type: z.enum(["job_update", "inventory_adjustment", "followup_create"]),
    status: z.enum(["applied", "flagged", "rejected"]),
    confidence: z.number(),
    entity_id: z.string().nullish(),
    code: z.string().nullish(),
    reason: z.string().nullish(),
  }),
);

function parseJsonColumn<T>(
  schema: z.ZodType<T[]>,
  value: Json,
  context: Record<string, string>,
): T[] {
  const parsed = schema.safeParse(value ?? []);
  if (parsed.success) {
    return parsed.data;
  }
  console.warn("[fieldops-store] Ignoring malformed JSON column", {
    ...context,
    issues: parsed.error.issues.length,
  });
  return [];
}

function toJob(row: JobRow): Job {
  const parts: JobPart[] = parseJsonColumn(jobPartsSchema, row.parts_used, {
    table: "jobs",
    id: row.id,
  });
  return {
    id: row.id,
    customer_name: row.customer_name,
    job_type: row.job_type,
    description: row.description,
    status: row.status,
    scheduled_at: row.scheduled_at,
    labor_hours: Number(row.labor_hours ?? 0),
    parts_used: parts,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function toVoiceIntake(row: VoiceIntakeRow): VoiceIntake {
  const mutations: IntakeMutation[] = parseJsonColumn(mutationsSchema, row.mutations, {
    table: "voice_intakes",
    id: row.id,
  });
  const outcomes: IntakeOutcomeRecord[] = parseJsonColumn(outcomesSchema, row.outcomes, {
    table: "voice_intakes",
    id: row.id,
  });
  return { ...row, mutations, outcomes };
}

// Tokens are already reduced to [a-z0-9], so they are safe inside a PostgREST filter string.
function ilikeFilter(columns: string[], nameHint: string) {
  const tokens = searchTokens(nameHint);
  if (!tokens.length) {
    return null;
  }
  return tokens.flatMap((token) => columns.map((column) => `${column}.ilike.%${token}%`)).join(",");
}

export async function getJob(supabase: DbClient, id: string): Promise<Job | null> {
  const { data, error } = await supabase.from("jobs").select("*").eq("id", id).maybeSingle();
  if (error) {
    throw new Error(`Failed to load job: ${error.message}`);
  }
  return data ? toJob(data) : null;
}

export async function listJobs(
  supabase: DbClient,
  { limit }: { limit?: number } = {},
): Promise<Job[]> {
  let query = supabase.from("jobs").select("*").order("updated_at", { ascending: false });
  if (limit) {
    query = query.limit(limit);
  }
  const { data, error } = await query;
  if (error) {
    throw new Error(`Failed to list jobs: ${error.message}`);
  }
  return (data ?? []).map(toJob);
}

export async function searchJobs(supabase: DbClient, nameHint: string): Promise<Job[]> {
  const filter = ilikeFilter(["customer_name", "description", "job_type"], nameHint);
  if (!filter) {
    return [];
  }
  // Ordered like the tie-break in pickBestMatch so the limit never drops the preferred match.
  const { data, error } = await supabase
    .from("jobs")
    .select("*")
    .or(filter)
    .order("updated_at", { ascending: false })
    .order("id", { ascending: true })
    .limit(SEARCH_LIMIT);
  if (error) {
    throw new Error(`Failed to search jobs: ${error.message}`);
  }
  return (data ?? []).map(toJob);
}

export async function insertJob(supabase: DbClient, job: NewJob): Promise<Job> {
  const { data, error } = await supabase
    .from("jobs")
    .insert(job)
    .select("*")
    .single();
  if (error || !data) {
    throw new Error(`Failed to create job: ${error?.message ?? "Unknown error"}`);
  }
  return toJob(data);
}

export async function updateJobIfUnchanged(
  supabase: DbClient,
  id: string,
  expectedUpdatedAt: string,
  patch: JobPatch,
): Promise<Job | null> {
  const { data, error } = await supabase
    .from("jobs")
    .update(patch)
    .eq("id", id)
    .eq("updated_at", expectedUpdatedAt)
    .select("*")
    .maybeSingle();
  if (error) {
    throw new Error(`Failed to update job: ${error.message}`);
  }
  return data ? toJob(data) : null;
}

// follow_ups.job_id is ON DELETE SET NULL, so the delete detaches follow-ups in the same statement.
export async function deleteJob(supabase: DbClient, id: string): Promise<boolean> {
  const { data, error } = await supabase.from("jobs").delete().eq("id", id).select("id");
  if (error) {
    throw new Error(`Failed to delete job: ${error.message}`);
  }
  return (data ?? []).length > 0;
}

export async function getInventoryItem(
  supabase: DbClient,
  id: string,
): Promise<InventoryItem | null> {
  const { data, error } = await supabase
    .from("inventory_items")
    .select("*")
    .eq("id", id)
    .maybeSingle();
  if (error) {
    throw new Error(`Failed to load inventory item: ${error.message}`);
  }
  return data;
}

export async function listInventoryItems(supabase: DbClient): Promise<InventoryItem[]> {
  const { data, error } = await supabase
    .from("inventory_items")
    .select("*")
    .order("name", { ascending: true });
  if (error) {
    throw new Error(`Failed to list inventory: ${error.message}`);
  }
  return data ?? [];
}

export async function searchInventoryItems(
  supabase: DbClient,
  nameHint: string,
): Promise<InventoryItem[]> {
  const filter = ilikeFilter(["name"], nameHint);
  if (!filter) {
    return [];
  }
  const { data, error } = await supabase
    .from("inventory_items")
    .select("*")
    .or(filter)
    .order("updated_at", { ascending: false })
    .order("id", { ascending: true })
    .limit(SEARCH_LIMIT);
  if (error) {
    throw new Error(`Failed to search inventory: ${error.message}`);
  }
  return data ?? [];
}

export async function insertInventoryItem(
  supabase: DbClient,
  item: NewInventoryItem,
): Promise<InventoryItem> {
  const { data, error } = await supabase.from("inventory_items").insert(item).select("*").single();
  if (error || !data) {
    throw new Error(`Failed to create inventory item: ${error?.message ?? "Unknown error"}`);
  }
  return data;
}

export async function compareAndSetQuantity(
  supabase: DbClient,
  id: string,
  expectedQuantity: number,
  nextQuantity: number,
  updatedAt: string,
): Promise<InventoryItem | null> {
  const { data, error } = await supabase
    .from("inventory_items")
    .update({ quantity: nextQuantity, updated_at: updatedAt })
    .eq("id", id)
    .eq("quantity", expectedQuantity)
    .select("*")
    .maybeSingle();
  if (error) {
    throw new Error(`Failed to adjust inventory quantity: ${error.message}`);
  }
  return data;
}

export async function listFollowUps(
  supabase: DbClient,
  { status }: { status?: FollowUpStatus } = {},
): Promise<FollowUp[]> {
  let query = supabase.from("follow_ups").select("*").order("due_date", { ascending: true });
  if (status) {
    query = query.eq("status", status);
  }
  const { data, error } = await query;
  if (error) {
    throw new Error(`Failed to list follow-ups: ${error.message}`);
  }
  return data ?? [];
}

export async function insertFollowUp(supabase: DbClient, followUp: NewFollowUp): Promise<FollowUp> {
  const { data, error } = await supabase.from("follow_ups").insert(followUp).select("*").single();
  if (error || !data) {
    throw new Error(`Failed to create follow-up: ${error?.message ?? "Unknown error"}`);
  }
  return data;
}

export async function listAlerts(supabase: DbClient): Promise<Alert[]> {
  const { data, error } = await supabase
    .from("alerts")
    .select("*")
    .order("last_observed_at", { ascending: false });
  if (error) {
    throw new Error(`Failed to list alerts: ${error.message}`);
  }
  return data ?? [];
}

/** Upserts and purges run inside the `apply_alert_scan` function so a scan lands all-or-nothing. */
export async function applyAlertScan(supabase: DbClient, changes: AlertScanChanges) {
  if (!changes.upserts.length && !changes.purgeIds.length) {
    return;
  }
  const { error } = await supabase.rpc("apply_alert_scan", {
    upserts: changes.upserts,
    purge_ids: changes.purgeIds,
  });
  if (error) {
    throw new Error(`Failed to apply alert scan: ${error.message}`);
  }
}

export async function insertVoiceIntake(
  supabase: DbClient,
  intake: NewVoiceIntake,
): Promise<VoiceIntake> {
  const { data, error } = await supabase
    .from("voice_intakes")
    .insert(intake)
    .select("*")
    .single();
  if (error || !data) {
    throw new Error(`Failed to record voice intake: ${error?.message ?? "Unknown error"}`);
  }
  return toVoiceIntake(data);
}

export async function finalizeVoiceIntake(
  supabase: DbClient,
  id: string,
  finalization: VoiceIntakeFinalization,
) {
  const { error } = await supabase
    .from("voice_intakes")
    .update({
      disposition: finalization.disposition,
      mutations: finalization.mutations,
      outcomes: finalization.outcomes,
    })
    .eq("id", id);
  if (error) {
    throw new Error(`Failed to finalize voice intake: ${error.message}`);
  }
}

export function createSupabaseFieldOpsStore(supabase: DbClient): FieldOpsStore {
  return {
    getJob: (id) => getJob(supabase, id),
    listJobs: (options) => listJobs(supabase, options),
    searchJobs: (nameHint) => searchJobs(supabase, nameHint),
    insertJob: (job) => insertJob(supabase, job),
    updateJobIfUnchanged: (id, expectedUpdatedAt, patch) =>
      updateJobIfUnchanged(supabase, id, expectedUpdatedAt, patch),
    deleteJob: (id) => deleteJob(supabase, id),
    getInventoryItem: (id) => getInventoryItem(supabase, id),
    listInventoryItems: () => listInventoryItems(supabase),
    searchInventoryItems: (nameHint) => searchInventoryItems(supabase, nameHint),
    insertInventoryItem: (item) => insertInventoryItem(supabase, item),
    compareAndSetQuantity: (id, expectedQuantity, nextQuantity, updatedAt) =>
      compareAndSetQuantity(supabase, id, expectedQuantity, nextQuantity, updatedAt),
    listFollowUps: (options) => listFollowUps(supabase, options),
    insertFollowUp: (followUp) => insertFollowUp(supabase, followUp),
    listAlerts: () => listAlerts(supabase),
    applyAlertScan: (changes) => applyAlertScan(supabase, changes),
    insertVoiceIntake: (intake) => insertVoiceIntake(supabase, intake),
    finalizeVoiceIntake: (id, finalization) => finalizeVoiceIntake(supabase, id, finalization),
  };
}

export function createFieldOpsStore(): FieldOpsStore {
  return createSupabaseFieldOpsStore(createAdminClient());
}
