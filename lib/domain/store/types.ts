import type {
  Alert,
  FollowUp,
  FollowUpStatus,
  IntakeDisposition,
  IntakeMutation,
  IntakeOutcomeRecord,
  InventoryItem,
  Job,
  VoiceIntake,
} from "@/types/domain";

export type NewJob = Omit<Job, "id">;

export type JobPatch = Partial<Omit<Job, "id" | "created_at">> & { updated_at: string };

export type NewInventoryItem = Omit<InventoryItem, "id">;

export type NewFollowUp = Omit<FollowUp, "id">;

export type NewVoiceIntake = Omit<VoiceIntake, "id">;

export type AlertUpsert = Omit<Alert, "id">;

export type AlertScanChanges = {
  upserts: AlertUpsert[];
  purgeIds: string[];
};

export type VoiceIntakeFinalization = {
  disposition: IntakeDisposition;
  mutations: IntakeMutation[];
  outcomes: IntakeOutcomeRecord[];
};

/**
 * Persistence primitives the intake pipeline relies on. Whatever backs this must provide point lookup,
 * fuzzy name search, compare-and-swap updates and alert upsert-by-identity with the stated atomicity.
 */
export interface FieldOpsStore {
  getJob(id: string): Promise<Job | null>;
  listJobs(options?: { limit?: number }): Promise<Job[]>;
  /** Jobs whose customer name, description or job type shares a word with `nameHint`. */
  searchJobs(nameHint: string): Promise<Job[]>;
  insertJob(job: NewJob): Promise<Job>;
  /** Writes `patch` only if the job's `updated_at` still equals `expectedUpdatedAt`; null on conflict. */
  updateJobIfUnchanged(id: string, expectedUpdatedAt: string, patch: JobPatch): Promise<Job | null>;
  /** Deletes the job and detaches its follow-ups. Returns false when no such job exists. */
  deleteJob(id: string): Promise<boolean>;

  getInventoryItem(id: string): Promise<InventoryItem | null>;
  listInventoryItems(): Promise<InventoryItem[]>;
  searchInventoryItems(nameHint: string): Promise<InventoryItem[]>;
  insertInventoryItem(item: NewInventoryItem): Promise<InventoryItem>;
  /** Sets `quantity` to `nextQuantity` only if it still equals `expectedQuantity`; null on conflict. */
  compareAndSetQuantity(
    id: string,
    expectedQuantity: number,
    nextQuantity: number,
    updatedAt: string,
  ): Promise<InventoryItem | null>;

  listFollowUps(options?: { status?: FollowUpStatus }): Promise<FollowUp[]>;
  insertFollowUp(followUp: NewFollowUp): Promise<FollowUp>;

  listAlerts(): Promise<Alert[]>;
  /** Applies every upsert (keyed on kind + subject_id) and purge in one atomic write. */
  applyAlertScan(changes: AlertScanChanges): Promise<void>;

  insertVoiceIntake(intake: NewVoiceIntake): Promise<VoiceIntake>;
  finalizeVoiceIntake(id: string, finalization: VoiceIntakeFinalization): Promise<void>;
}
