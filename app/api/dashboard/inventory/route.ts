import { NextResponse } from "next/server";

import { listInventoryView } from "@/lib/domain/dashboard/summary";
import { createFieldOpsStore } from "@/lib/domain/store/repository";
import { parseEnvConfig } from "@/schemas/env";
import { logServerError } from "@/utils/errors/logServerError";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  try {
    const { lowStockThreshold } = parseEnvConfig();
    const items = await listInventoryView(createFieldOpsStore(), { lowStockThreshold });
    return NextResponse.json({ items });
  } catch (error) {
    logServerError({ entityType: "dashboard", message: "Failed to list inventory" }, error);
    return NextResponse.json({ error: "Failed to load inventory" }, { status: 500 });
  }
}
