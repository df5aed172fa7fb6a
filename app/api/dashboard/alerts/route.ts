import { NextResponse } from "next/server";

import { dashboardOptionsFromConfig, listAlertsView } from "@/lib/domain/dashboard/summary";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { parseEnvConfig } from "@/schemas/env";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Alerts are pull-based: listing runs a scan first so the response reflects current conditions.
export async function GET() {
  try {
    const options = dashboardOptionsFromConfig(parseEnvConfig());
    const alerts = await listAlertsView(createFieldOpsStore(), new Date(), options);
    return NextResponse.json({ alerts });
  } catch (error) {
    logServerError({ entityType: "alerts", message: "Alert scan failed" }, error);
    return NextResponse.json({ error: "Failed to scan alerts" }, { status: 500 });
  }
}
