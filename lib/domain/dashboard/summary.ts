// Dashboard read projections. Everything here is computed on read; only `listAlertsView` writes, because
// alerts are pull-based and a listing runs a scan first.

import { scanAlerts, type AlertScanOptions } from "@/lib/domain/alerts";
import { effectiveThreshold, isLowStock } from "@/lib/domain/inventory";
import { computeJobCost, roundCurrency } from "@/lib/domain/jobs";
import type { FieldOpsStore } from "@/lib/domain/store/types";
import type { EnvConfig } from "@/schemas/env";
import { buildLog } from "@/utils/buildLog";
import { addDays, startOfUtcDay, toDateKey } from "@/utils/dashboard/time";
import type { Alert, FollowUp, InventoryItem, Job, JobStatus } from "@/types/domain";

buildLog("lib/domain/dashboard/summary loaded");

const DASHBOARD_WINDOWS = {
  RECENT_JOBS: 10,
  JOB_LIST_LIMIT: 50,
  REVENUE_WEEK_DAYS: 7,
  REVENUE_MONTH_DAYS: 30,
  UPCOMING_FOLLOWUP_DAYS: 7,
};

export type DashboardOptions = AlertScanOptions & {
  laborRatePerHour: number;
};

export type JobView = Job & { cost: number };

export type InventoryView = InventoryItem & {
  effective_threshold: number;
  is_low_stock: boolean;
};

export type DashboardSummary = {
  generated_at: string;
  jobs: {
    total: number;
    by_status: Record<JobStatus, number>;
    created_today: number;
  };
  revenue: {
    today: number;
    last_7_days: number;
    last_30_days: number;
  };
  inventory: {
    total_items: number;
    stock_value: number;
    low_stock_items: Pick<InventoryView, "id" | "name" | "quantity" | "unit" | "effective_threshold">[];
  };
  follow_ups: {
    pending: number;
    overdue: number;
    due_next_7_days: number;
  };
  alerts: {
    active: number;
    critical: number;
  };
  recent_jobs: JobView[];
};

export function dashboardOptionsFromConfig(config: EnvConfig): DashboardOptions {
  return {
    laborRatePerHour: config.laborRatePerHour,
    lowStockThreshold: config.lowStockThreshold,
    staleJobHours: config.staleJobHours,
    followupCriticalAfterDays: config.followupCriticalAfterDays,
    alertRetentionHours: config.alertRetentionHours,
  };
}

const toJobView = (job: Job, laborRatePerHour: number): JobView => ({
  ...job,
  cost: computeJobCost(job, laborRatePerHour),
});

const toInventoryView = (item: InventoryItem, fallbackThreshold: number): InventoryView => ({
  ...item,
  effective_threshold: effectiveThreshold(item, fallbackThreshold),
  is_low_stock: isLowStock(item, fallbackThreshold),
});

// Completion time is approximated by the job's last update.
function revenueSince(jobs: JobView[], since: Date) {
  const sinceMs = since.getTime();
  return roundCurrency(
    jobs
      .filter((job) => job.status === "completed" && Date.parse(job.updated_at) >= sinceMs)
      .reduce((sum, job) => sum + job.cost, 0),
  );
}

function summarizeFollowUps(followUps: FollowUp[], now: Date) {
  const today = toDateKey(now);
  const horizon = toDateKey(addDays(startOfUtcDay(now), DASHBOARD_WINDOWS.UPCOMING_FOLLOWUP_DAYS));
  const pending = followUps.filter((followUp) => followUp.status === "pending");
  return {
    pending: pending.length,
    overdue: pending.filter((followUp) => followUp.due_date < today).length,
    due_next_7_days: pending.filter(
      (followUp) => followUp.due_date >= today && followUp.due_date <= horizon,
    ).length,
  };
}

function summarizeAlerts(alerts: Alert[]) {
  const active = alerts.filter((alert) => alert.cleared_at === null);
  return {
    active: active.length,
    critical: active.filter((alert) => alert.severity === "critical").length,
  };
}

export async function getDashboardSummary(
  store: FieldOpsStore,
  now: Date,
  options: DashboardOptions,
): Promise<DashboardSummary> {
  const [jobs, items, followUps, alerts] = await Promise.all([
    store.listJobs(),
    store.listInventoryItems(),
    store.listFollowUps({ status: "pending" }),
    store.listAlerts(),
  ]);

  const jobViews = jobs.map((job) => toJobView(job, options.laborRatePerHour));
  const byStatus: Record<JobStatus, number> = { open: 0, in_progress: 0, completed: 0, cancelled: 0 };
  for (const job of jobs) {
    byStatus[job.status] += 1;
  }

  const startOfToday = startOfUtcDay(now);
  const inventoryViews = items.map((item) => toInventoryView(item, options.lowStockThreshold));

  return {
    generated_at: now.toISOString(),
    jobs: {
      total: jobs.length,
      by_status: byStatus,
      created_today: jobs.filter((job) => Date.parse(job.created_at) >= startOfToday.getTime()).length,
    },
    revenue: {
      today: revenueSince(jobViews, startOfToday),
      last_7_days: revenueSince(jobViews, addDays(now, -DASHBOARD_WINDOWS.REVENUE_WEEK_DAYS)),
      last_30_days: revenueSince(jobViews, addDays(now, -DASHBOARD_WINDOWS.REVENUE_MONTH_DAYS)),
    },
    inventory: {
      total_items: items.length,
      stock_value: roundCurrency(items.reduce((sum, item) => sum + item.quantity * item.unit_cost, 0)),
      low_stock_items: inventoryViews
        .filter((item) => item.is_low_stock)
        .map(({ id, name, quantity, unit, effective_threshold }) => ({
          id,
          name,
          quantity,
          unit,
          effective_threshold,
        })),
    },
    follow_ups: summarizeFollowUps(followUps, now),
    alerts: summarizeAlerts(alerts),
    recent_jobs: [...jobViews]
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at))
      .slice(0, DASHBOARD_WINDOWS.RECENT_JOBS),
  };
}

export async function listJobsView(store: FieldOpsStore, options: Pick<DashboardOptions, "laborRatePerHour">) {
  const jobs = await store.listJobs({ limit: DASHBOARD_WINDOWS.JOB_LIST_LIMIT });
  return jobs.map((job) => toJobView(job, options.laborRatePerHour));
}

export async function listInventoryView(
  store: FieldOpsStore,
  options: Pick<DashboardOptions, "lowStockThreshold">,
) {
  const items = await store.listInventoryItems();
  return items
    .map((item) => toInventoryView(item, options.lowStockThreshold))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export async function listPendingFollowUps(store: FieldOpsStore) {
  const followUps = await store.listFollowUps({ status: "pending" });
  return [...followUps].sort((a, b) => a.due_date.localeCompare(b.due_date) || a.id.localeCompare(b.id));
}

export async function listAlertsView(store: FieldOpsStore, now: Date, options: AlertScanOptions) {
  return scanAlerts(store, now, options);
}
