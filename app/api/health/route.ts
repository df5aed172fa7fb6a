import { NextResponse } from "next/server";

export const dynamic = "force-dynamic";

// Liveness only; /api/health/supabase checks the database.
export function GET() {
  return NextResponse.json({ status: "healthy", time: new Date().toISOString() });
}
