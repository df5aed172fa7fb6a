// utils/supabase/admin.ts
import { createClient } from "@supabase/supabase-js";

import type { Database } from "@/lib/supabase/types";
import { getServiceRoleKey, getSupabaseUrl } from "@/utils/env/server";

// Accesses Supabase with the service role key. Server-only: route handlers and the intake pipeline run without user sessions.
export function createAdminClient() {
  return createClient<Database>(getSupabaseUrl(), getServiceRoleKey(), {
    auth: { persistSession: false },
  });
}
