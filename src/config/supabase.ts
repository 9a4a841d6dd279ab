import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { env } from "./env.js";

let client: SupabaseClient | null = null;

export function getSupabase(): SupabaseClient {
  if (client) return client;

  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new Error(
      "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set for the supabase storage driver"
    );
  }

  client = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: "public",
    },
  });
  return client;
}

interface QueryResponse {
  data: unknown;
  error: { message: string; code?: string } | null;
}

export async function executeQuery(
  queryBuilder: PromiseLike<QueryResponse>,
  operation: string = "query"
): Promise<unknown> {
  const { data, error } = await queryBuilder;

  if (error) {
    throw new Error(`Supabase ${operation} failed: ${error.message}`);
  }

  return data;
}

// PostgREST "no rows" for .single()
export const NO_ROWS = "PGRST116";
