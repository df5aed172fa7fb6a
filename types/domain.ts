// Central domain models to prevent inline duplicates and keep entity shapes consistent.
// Rows mirror the Postgres tables (snake_case); pipeline types live under lib/domain.

export const JOB_STATUSES = ["open", "in_progress", "completed", "cancelled"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const FOLLOWUP_STATUSES = ["pending", "done", "dismissed"] as const;
export type FollowUpStatus = (typeof FOLLOWUP_STATUSES)[number];

export const ALERT_KINDS = ["low_stock", "overdue_followup", "stale_job"] as const;
export type AlertKind = (typeof ALERT_KINDS)[number];

export type AlertSeverity = "info" | "warning" | "critical";

export type AlertSubjectType = "inventory_item" | "follow_up" | "job";

export const INTAKE_DISPOSITIONS = ["applied", "partially_applied", "rejected"] as const;
export type IntakeDisposition = (typeof INTAKE_DISPOSITIONS)[number];

export type JobPart = {
  item_id: string;
  item_name: string;
  quantity: number;
  unit_cost: number;
};

export type Job = {
  id: string;
  customer_name: string | null;
  job_type: string | null;
  description: string | null;
  status: JobStatus;
  scheduled_at: string | null;
  labor_hours: number;
  parts_used: JobPart[];
  created_at: string;
  updated_at: string;
};

export type InventoryItem = {
  id: string;
  name: string;
  quantity: number;
  unit: string;
  low_stock_threshold: number | null;
  unit_cost: number;
  updated_at: string;
};

export type FollowUp = {
  id: string;
  job_id: string | null;
  customer_name: string | null;
  description: string;
  due_date: string;
  status: FollowUpStatus;
  created_at: string;
};

export type Alert = {
  id: string;
  kind: AlertKind;
  subject_type: AlertSubjectType;
  subject_id: string;
  severity: AlertSeverity;
  message: string;
  first_observed_at: string;
  last_observed_at: string;
  cleared_at: string | null;
};

export type IntakeMutation = {
  entity_type: "job" | "inventory_item" | "follow_up";
  entity_id: string;
  action: "created" | "updated" | "adjusted";
};

export type IntakeOutcomeRecord = {
  type: "job_update" | "inventory_adjustment" | "followup_create";
  status: "applied" | "flagged" | "rejected";
  confidence: number;
  entity_id?: string | null;
  code?: string | null;
  reason?: string | null;
};

export type VoiceIntake = {
  id: string;
  transcript: string;
  transcription_confidence: number;
  extraction_confidence: number | null;
  duration_seconds: number;
  unmatched_text: string;
  mutations: IntakeMutation[];
  outcomes: IntakeOutcomeRecord[];
  error_code: string | null;
  disposition: IntakeDisposition | null;
  created_at: string;
};
