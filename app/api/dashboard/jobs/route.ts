import { NextResponse } from "next/server";

import { listJobsView } from "@/lib/domain/dashboard/summary";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { parseEnvConfig } from "@/schemas/env";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { laborRatePerHour } = parseEnvConfig();
    const jobs = await listJobsView(createFieldOpsStore(), { laborRatePerHour });
    return NextResponse.json({ jobs });
  } catch (error) {
    logServerError({ entityType: "dashboard", message: "Failed to list jobs" }, error);
    return NextResponse.json({ error: "Failed to load jobs" }, { status: 500 });
  }
}
