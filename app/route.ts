import { NextResponse } from "next/server";

export function GET() {
  return NextResponse.json({
    service: "fieldops-voice-intake",
    status: "running",
    endpoints: {
      voice: "POST /api/voice",
      health: "GET /api/health",
      readiness: "GET /api/health/supabase",
      dashboard: [
        "GET /api/dashboard/summary",
        "GET /api/dashboard/jobs",
        "GET /api/dashboard/inventory",
        "GET /api/dashboard/followups",
        "GET /api/dashboard/alerts",
      ],
    },
  });
}
