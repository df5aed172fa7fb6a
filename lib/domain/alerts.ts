// Alert/retention engine. Alerts are derived state: each scan re-evaluates every condition, upserts by
// (kind, subject_id), clears what no longer holds and purges cleared alerts past retention.

import { OPEN_JOB_STATUSES } from "@/lib/domain/jobs";
import { effectiveThreshold, isLowStock } from "@/lib/domain/inventory";
import { isOverdue } from "@/lib/domain/followups";
import type { AlertScanChanges, AlertUpsert, FieldOpsStore } from "@/lib/domain/store/types";
import type {
  Alert,
  AlertKind,
  AlertSeverity,
  AlertSubjectType,
  FollowUp,
  InventoryItem,
  Job,
} from "@/types/domain";
import {
  daysBetween,
  hoursBetween,
  parseDateKey,
  parseTimestamp,
  startOfUtcDay,
} from "@/utils/dashboard/time";

export type AlertScanOptions = {
  lowStockThreshold: number;
  staleJobHours: number;
  followupCriticalAfterDays: number;
  alertRetentionHours: number;
};

export type AlertObservation = {
  kind: AlertKind;
  subject_type: AlertSubjectType;
  subject_id: string;
  severity: AlertSeverity;
  message: string;
};

type ScanInputs = {
  items: InventoryItem[];
  followUps: FollowUp[];
  jobs: Job[];
};

const SEVERITY_RANK: Record<AlertSeverity, number> = { critical: 0, warning: 1, info: 2 };

const alertKey = (kind: AlertKind, subjectId: string) => `${kind}:${subjectId}`;

function lowStockObservation(item: InventoryItem, fallbackThreshold: number): AlertObservation | null {
  if (!isLowStock(item, fallbackThreshold)) return null;
  const threshold = effectiveThreshold(item, fallbackThreshold);
  return {
    kind: "low_stock",
    subject_type: "inventory_item",
    subject_id: item.id,
    severity: item.quantity === 0 ? "critical" : "warning",
    message:
      item.quantity === 0
        ? `${item.name} is out of stock`
        : `${item.name} is low: ${item.quantity} ${item.unit} left (threshold ${threshold})`,
  };
}

function overdueObservation(
  followUp: FollowUp,
  now: Date,
  criticalAfterDays: number,
): AlertObservation | null {
  if (followUp.status !== "pending" || !isOverdue(followUp.due_date, now)) return null;
  const due = parseDateKey(followUp.due_date);
  const daysOverdue = due ? Math.round(daysBetween(due, startOfUtcDay(now))) : 0;
  return {
    kind: "overdue_followup",
    subject_type: "follow_up",
    subject_id: followUp.id,
    severity: daysOverdue > criticalAfterDays ? "critical" : "warning",
    message: `Follow-up "${followUp.description}" was due ${followUp.due_date} (${daysOverdue} days overdue)`,
  };
}

function staleJobObservation(job: Job, now: Date, staleJobHours: number): AlertObservation | null {
  if (!OPEN_JOB_STATUSES.includes(job.status)) return null;
  const updatedAt = parseTimestamp(job.updated_at);
  if (!updatedAt) return null;
  const idleHours = hoursBetween(updatedAt, now);
  if (idleHours <= staleJobHours) return null;
  const label = job.customer_name ?? job.description ?? job.id;
  return {
    kind: "stale_job",
    subject_type: "job",
    subject_id: job.id,
    severity: "warning",
    message: `Job for ${label} has had no update in ${Math.floor(idleHours)} hours`,
  };
}

export function evaluateAlertConditions(
  { items, followUps, jobs }: ScanInputs,
  now: Date,
  options: AlertScanOptions,
): AlertObservation[] {
  const observations: (AlertObservation | null)[] = [
    ...items.map((item) => lowStockObservation(item, options.lowStockThreshold)),
    ...followUps.map((followUp) => overdueObservation(followUp, now, options.followupCriticalAfterDays)),
    ...jobs.map((job) => staleJobObservation(job, now, options.staleJobHours)),
  ];
  return observations.filter((observation): observation is AlertObservation => observation !== null);
}

/**
 * Diffs current observations against stored alerts. Re-observed alerts keep their first_observed_at, a
 * cleared alert that fires again opens a new episode, and cleared alerts older than retention are purged.
 */
export function planAlertScan(
  existing: Alert[],
  observations: AlertObservation[],
  now: Date,
  retentionHours: number,
): AlertScanChanges {
  const nowIso = now.toISOString();
  const existingByKey = new Map(existing.map((alert) => [alertKey(alert.kind, alert.subject_id), alert]));
  const observedKeys = new Set<string>();
  const upserts: AlertUpsert[] = [];
  const purgeIds: string[] = [];

  for (const observation of observations) {
    const key = alertKey(observation.kind, observation.subject_id);
    observedKeys.add(key);
    const previous = existingByKey.get(key);
    const continuing = previous && previous.cleared_at === null;
    upserts.push({
      ...observation,
      first_observed_at: continuing ? previous.first_observed_at : nowIso,
      last_observed_at: nowIso,
      cleared_at: null,
    });
  }

  for (const alert of existing) {
    if (observedKeys.has(alertKey(alert.kind, alert.subject_id))) continue;

    if (alert.cleared_at === null) {
      upserts.push({
        kind: alert.kind,
        subject_type: alert.subject_type,
        subject_id: alert.subject_id,
        severity: alert.severity,
        message: alert.message,
        first_observed_at: alert.first_observed_at,
        last_observed_at: alert.last_observed_at,
        cleared_at: nowIso,
      });
      continue;
    }

    const clearedAt = parseTimestamp(alert.cleared_at);
    if (!clearedAt || hoursBetween(clearedAt, now) >= retentionHours) {
      purgeIds.push(alert.id);
    }
  }

  return { upserts, purgeIds };
}

export function sortAlerts(alerts: Alert[]) {
  return [...alerts].sort((a, b) => {
    const activeA = a.cleared_at === null ? 0 : 1;
    const activeB = b.cleared_at === null ? 0 : 1;
    if (activeA !== activeB) return activeA - activeB;
    const severity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
    if (severity !== 0) return severity;
    return alertKey(a.kind, a.subject_id).localeCompare(alertKey(b.kind, b.subject_id));
  });
}

export async function scanAlerts(
  store: FieldOpsStore,
  now: Date,
  options: AlertScanOptions,
): Promise<Alert[]> {
  const [items, followUps, jobs, existing] = await Promise.all([
    store.listInventoryItems(),
    store.listFollowUps({ status: "pending" }),
    store.listJobs(),
    store.listAlerts(),
  ]);

  const observations = evaluateAlertConditions({ items, followUps, jobs }, now, options);
  const changes = planAlertScan(existing, observations, now, options.alertRetentionHours);
  await store.applyAlertScan(changes);

  console.log("[alerts] Scan complete", {
    observed: observations.length,
    upserts: changes.upserts.length,
    purged: changes.purgeIds.length,
  });

  return sortAlerts(await store.listAlerts());
}
