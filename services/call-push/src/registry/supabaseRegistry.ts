import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { RegistryUnavailableError } from "../contracts/errors.js";
import type { PushRegistration, PushRegistrationInput } from "../types.js";
import type { PushRegistry } from "./types.js";

const TABLE = "push_registrations";
const COLUMNS = "jid,device_id,platform,push_token,app_id,registered_at";

const rowSchema = z.object({
  jid: z.string(),
  device_id: z.string(),
  platform: z.enum(["ios", "android"]),
  push_token: z.string(),
  app_id: z.string(),
  registered_at: z.string(),
});

type PushRegistrationRow = z.infer<typeof rowSchema>;

function rowToRegistration(row: PushRegistrationRow): PushRegistration {
  return {
    identity: row.jid,
    deviceId: row.device_id,
    platform: row.platform,
    pushToken: row.push_token,
    appIdentifier: row.app_id,
    registeredAt: row.registered_at,
  };
}

export interface SupabaseRegistryOptions {
  url: string;
  serviceRoleKey: string;
  /** Upper bound for each PostgREST request. */
  requestTimeoutMs: number;
  fetch?: typeof fetch;
}

// A request that outlives its deadline comes back as a 504 so PostgREST
// reports it like any other storage error.
function fetchWithDeadline(fetchImpl: typeof fetch, timeoutMs: number): typeof fetch {
  return async (input, init) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
    try {
      return await fetchImpl(input, { ...init, signal });
    } catch (error) {
      if (!timeout.aborted) {
        throw error;
      }
      return new Response(JSON.stringify({ message: `timed out after ${timeoutMs}ms` }), {
        status: 504,
        headers: { "content-type": "application/json" },
      });
    }
  };
}

export class SupabasePushRegistry implements PushRegistry {
  private readonly supabase: SupabaseClient;

  constructor(options: SupabaseRegistryOptions) {
    this.supabase = createClient(options.url, options.serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
      global: { fetch: fetchWithDeadline(options.fetch ?? fetch, options.requestTimeoutMs) },
    });
  }

  async upsert(registration: PushRegistrationInput): Promise<void> {
    const { error } = await this.supabase.from(TABLE).upsert(
      {
        jid: registration.identity,
        device_id: registration.deviceId,
        platform: registration.platform,
        push_token: registration.pushToken,
        app_id: registration.appIdentifier,
        registered_at: new Date().toISOString(),
      },
      { onConflict: "jid,device_id" },
    );
    if (error) {
      throw new RegistryUnavailableError("upsert", error.message);
    }
  }

  async remove(identity: string, deviceId: string): Promise<void> {
    const { error } = await this.supabase.from(TABLE).delete().eq("jid", identity).eq("device_id", deviceId);
    if (error) {
      throw new RegistryUnavailableError("remove", error.message);
    }
  }

  async removeByToken(pushToken: string): Promise<void> {
    const { error } = await this.supabase.from(TABLE).delete().eq("push_token", pushToken);
    if (error) {
      throw new RegistryUnavailableError("removeByToken", error.message);
    }
  }

  async listForIdentity(identity: string): Promise<PushRegistration[]> {
    const { data, error } = await this.supabase
      .from(TABLE)
      .select(COLUMNS)
      .eq("jid", identity)
      .order("registered_at", { ascending: true })
      .order("device_id", { ascending: true });

    if (error) {
      throw new RegistryUnavailableError("listForIdentity", error.message);
    }

    const rows = z.array(rowSchema).safeParse(data ?? []);
    if (!rows.success) {
      throw new RegistryUnavailableError("listForIdentity", `unexpected row shape: ${rows.error.message}`);
    }
    return rows.data.map(rowToRegistration);
  }

  async removeAllForIdentity(identity: string): Promise<void> {
    const { error } = await this.supabase.from(TABLE).delete().eq("jid", identity);
    if (error) {
      throw new RegistryUnavailableError("removeAllForIdentity", error.message);
    }
  }
}
