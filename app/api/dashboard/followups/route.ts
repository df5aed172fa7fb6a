import { NextResponse } from "next/server";

import { listPendingFollowUps } from "@/lib/domain/dashboard/summary";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const followUps = await listPendingFollowUps(createFieldOpsStore());
    return NextResponse.json({ follow_ups: followUps });
  } catch (error) {
    logServerError({ entityType: "dashboard", message: "Failed to list follow-ups" }, error);
    return NextResponse.json({ error: "Failed to load follow-ups" }, { status: 500 });
  }
}
