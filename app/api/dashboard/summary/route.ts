import { NextResponse } from "next/server";

import { dashboardOptionsFromConfig, getDashboardSummary } from "@/lib/domain/dashboard/summary";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { parseEnvConfig } from "@/schemas/env";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const options = dashboardOptionsFromConfig(parseEnvConfig());
    const summary = await getDashboardSummary(createFieldOpsStore(), new Date(), options);
    return NextResponse.json(summary);
  } catch (error) {
    logServerError({ entityType: "dashboard", message: "Failed to build dashboard summary" }, error);
    return NextResponse.json({ error: "Failed to load dashboard summary" }, { status: 500 });
  }
}
