import { readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage, logWarn } from "./observability/logger.js";
import type { RegistryKind } from "./types.js";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v : undefined));

const envSchema = z.object({
  CALL_PUSH_PORT: z.coerce.number().int().positive().default(8095),
  CALL_PUSH_REGISTRY: z.enum(["supabase", "memory"]).default("supabase"),
  CALL_PUSH_SEND_TIMEOUT_MS: z.coerce.number().int().positive().max(30_000).default(5000),
  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  XMPP_DOMAIN: z.string().min(1).default("example.com"),
  JWT_SECRET: z.string().min(1),
  APNS_KEY_ID: optionalString,
  APNS_TEAM_ID: optionalString,
  APNS_PRIVATE_KEY: optionalString,
  APNS_KEY_PATH: optionalString,
  APNS_USE_SANDBOX: z
    .string()
    .optional()
    .transform((v) => v === "true" || v === "1"),
  FCM_PROJECT_ID: optionalString,
  FCM_CLIENT_EMAIL: optionalString,
  FCM_PRIVATE_KEY: optionalString,
  FCM_SERVICE_ACCOUNT_PATH: optionalString,
});

const serviceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export interface ApnsCredentials {
  keyId: string;
  teamId: string;
  privateKey: string;
  useSandbox: boolean;
}

export interface FcmCredentials {
  projectId: string;
  clientEmail: string;
  privateKey: string;
}

export type AppConfig = {
  port: number;
  registry: RegistryKind;
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
  xmppDomain: string;
  jwtSecret: string;
  sendTimeoutMs: number;
  apns?: ApnsCredentials;
  fcm?: FcmCredentials;
};

type ParsedEnv = z.infer<typeof envSchema>;

// Keys pasted into env files usually carry literal "\n" sequences.
function normalizePem(value: string): string {
  return value.replaceAll("\\n", "\n");
}

function readApnsKey(parsed: ParsedEnv): string | undefined {
  if (parsed.APNS_PRIVATE_KEY) {
    return normalizePem(parsed.APNS_PRIVATE_KEY);
  }
  if (!parsed.APNS_KEY_PATH) {
    return undefined;
  }
  try {
    return readFileSync(parsed.APNS_KEY_PATH, "utf8");
  } catch (error) {
    logWarn("apns_key_unreadable", { path: parsed.APNS_KEY_PATH, error: errorMessage(error) });
    return undefined;
  }
}

function loadApnsCredentials(parsed: ParsedEnv): ApnsCredentials | undefined {
  const privateKey = readApnsKey(parsed);
  if (!parsed.APNS_KEY_ID || !parsed.APNS_TEAM_ID || !privateKey) {
    logWarn("apns_not_configured", { missing: "APNS_KEY_ID, APNS_TEAM_ID or key material" });
    return undefined;
  }
  return {
    keyId: parsed.APNS_KEY_ID,
    teamId: parsed.APNS_TEAM_ID,
    privateKey,
    useSandbox: parsed.APNS_USE_SANDBOX,
  };
}

function readServiceAccount(path: string): FcmCredentials | undefined {
  try {
    const account = serviceAccountSchema.parse(JSON.parse(readFileSync(path, "utf8")));
    return {
      projectId: account.project_id,
      clientEmail: account.client_email,
      privateKey: account.private_key,
    };
  } catch (error) {
    logWarn("fcm_service_account_unreadable", { path, error: errorMessage(error) });
    return undefined;
  }
}

function loadFcmCredentials(parsed: ParsedEnv): FcmCredentials | undefined {
  if (parsed.FCM_PROJECT_ID && parsed.FCM_CLIENT_EMAIL && parsed.FCM_PRIVATE_KEY) {
    return {
      projectId: parsed.FCM_PROJECT_ID,
      clientEmail: parsed.FCM_CLIENT_EMAIL,
      privateKey: normalizePem(parsed.FCM_PRIVATE_KEY),
    };
  }
  const fromFile = parsed.FCM_SERVICE_ACCOUNT_PATH
    ? readServiceAccount(parsed.FCM_SERVICE_ACCOUNT_PATH)
    : undefined;
  if (!fromFile) {
    logWarn("fcm_not_configured", { missing: "FCM_PROJECT_ID, FCM_CLIENT_EMAIL, FCM_PRIVATE_KEY" });
  }
  return fromFile;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.CALL_PUSH_REGISTRY === "supabase" && (!parsed.SUPABASE_URL || !parsed.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when CALL_PUSH_REGISTRY=supabase");
  }

  return {
    port: parsed.CALL_PUSH_PORT,
    registry: parsed.CALL_PUSH_REGISTRY,
    supabase:
      parsed.SUPABASE_URL && parsed.SUPABASE_SERVICE_ROLE_KEY
        ? { url: parsed.SUPABASE_URL, serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
    xmppDomain: parsed.XMPP_DOMAIN,
    jwtSecret: parsed.JWT_SECRET,
    sendTimeoutMs: parsed.CALL_PUSH_SEND_TIMEOUT_MS,
    apns: loadApnsCredentials(parsed),
    fcm: loadFcmCredentials(parsed),
  };
}
