import { vi } from "vitest";

/** Minimal response shape that mirrors Supabase's PostgREST result set. */
export type SupabaseQueryResponse = {
  data: unknown;
  error: { message: string } | null;
};

/** Chainable stub for PostgREST queries. Supports the methods the store triggers. */
export type SupabaseQuery = {
  select: ReturnType<typeof vi.fn>;
  eq: ReturnType<typeof vi.fn>;
  or: ReturnType<typeof vi.fn>;
  order: ReturnType<typeof vi.fn>;
  limit: ReturnType<typeof vi.fn>;
  insert: ReturnType<typeof vi.fn>;
  update: ReturnType<typeof vi.fn>;
  delete: ReturnType<typeof vi.fn>;
  maybeSingle: ReturnType<typeof vi.fn>;
  single: ReturnType<typeof vi.fn>;
  then: (
    onFulfilled: (value: SupabaseQueryResponse) => unknown,
    onRejected?: (reason: unknown) => unknown,
  ) => Promise<unknown>;
};

/** Shared mock state exposed to tests so their assertions can inspect query usage. */
export type SupabaseMockState = {
  supabase: {
    from: ReturnType<typeof vi.fn>;
    rpc: ReturnType<typeof vi.fn>;
  };
  queries: Record<string, SupabaseQuery[]>;
  responses: Record<string, SupabaseQueryResponse[]>;
  rpcResponses: Record<string, SupabaseQueryResponse[]>;
};

const EMPTY_RESPONSE: SupabaseQueryResponse = { data: [], error: null };

function nextResponse(queue: SupabaseQueryResponse[] | undefined): SupabaseQueryResponse {
  return queue?.shift() ?? EMPTY_RESPONSE;
}

function firstRow(response: SupabaseQueryResponse): SupabaseQueryResponse {
  const value = Array.isArray(response.data) ? response.data[0] ?? null : response.data;
  return { data: value, error: response.error };
}

function createQuery(table: string, state: SupabaseMockState): SupabaseQuery {
  const query: SupabaseQuery = {
    select: vi.fn(() => query),
    eq: vi.fn(() => query),
    or: vi.fn(() => query),
    order: vi.fn(() => query),
    limit: vi.fn(() => query),
    insert: vi.fn(() => query),
    update: vi.fn(() => query),
    delete: vi.fn(() => query),
    maybeSingle: vi.fn(async () => firstRow(nextResponse(state.responses[table]))),
    single: vi.fn(async () => firstRow(nextResponse(state.responses[table]))),
    then: (onFulfilled, onRejected) =>
      Promise.resolve(nextResponse(state.responses[table])).then(onFulfilled, onRejected),
  };
  return query;
}

/**
 * Sets up a lightweight Supabase client mock used by store tests. Each `from(table)` call returns a new
 * chainable query; responses are consumed per table in the order they were queued.
 */
export function setupSupabaseMock(
  initialResponses: Record<string, SupabaseQueryResponse[]> = {},
): SupabaseMockState {
  const state: SupabaseMockState = {
    supabase: {
      from: vi.fn(),
      rpc: vi.fn(),
    },
    queries: {},
    responses: Object.fromEntries(
      Object.entries(initialResponses).map(([table, queue]) => [table, [...queue]]),
    ),
    rpcResponses: {},
  };

  state.supabase.from.mockImplementation((table: string) => {
    const query = createQuery(table, state);
    state.queries[table] = [...(state.queries[table] ?? []), query];
    return query;
  });

  state.supabase.rpc.mockImplementation(async (functionName: string) =>
    nextResponse(state.rpcResponses[functionName]),
  );

  return state;
}
