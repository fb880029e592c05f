import type { AppConfig } from "../config.js";
import { MemoryPushRegistry } from "./memoryRegistry.js";
import { SupabasePushRegistry } from "./supabaseRegistry.js";
import type { PushRegistry } from "./types.js";

export function createPushRegistry(config: AppConfig): PushRegistry {
  if (config.registry === "memory") {
    return new MemoryPushRegistry();
  }

  if (!config.supabase) {
    throw new Error("Supabase configuration is required for the supabase registry");
  }

  return new SupabasePushRegistry({
    url: config.supabase.url,
    serviceRoleKey: config.supabase.serviceRoleKey,
    requestTimeoutMs: config.sendTimeoutMs,
  });
}
