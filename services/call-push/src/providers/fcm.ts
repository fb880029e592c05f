import jwt from "jsonwebtoken";
import { z } from "zod";
import type { FcmCredentials } from "../config.js";
import type { CallNotification, DeliveryOutcome, PushSender } from "../types.js";
import { buildFcmCallData } from "./payload.js";
import { DELIVERED, invalidToken, isAbortError, transient } from "./outcome.js";

const OAUTH_TOKEN_URL = "https://oauth2.googleapis.com/token";
const FCM_SCOPE = "https://www.googleapis.com/auth/firebase.messaging";
const DEAD_TOKEN_CODES = ["UNREGISTERED", "SENDER_ID_MISMATCH"];

const accessTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
});

const fcmErrorSchema = z.object({
  error: z.object({
    status: z.string().optional(),
    details: z.array(z.object({ errorCode: z.string().optional() }).passthrough()).optional(),
  }),
});

class AccessTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AccessTokenError";
  }
}

function readErrorCode(body: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = fcmErrorSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const detailCode = parsed.data.error.details?.find((d) => d.errorCode)?.errorCode;
  return detailCode ?? parsed.data.error.status;
}

export function classifyFcmResponse(status: number, body: string): DeliveryOutcome {
  if (status >= 200 && status < 300) {
    return DELIVERED;
  }

  const code = readErrorCode(body) ?? `http_${status}`;
  if (status === 404 || DEAD_TOKEN_CODES.includes(code)) {
    return invalidToken(code);
  }

  return transient(code);
}

export interface FcmSenderOptions {
  fetch?: typeof fetch;
}

/**
 * Sends high-priority, data-only FCM messages. The client decides how to ring;
 * nothing here ever shows a notification by itself.
 */
export class FcmSender implements PushSender {
  readonly platform = "android" as const;
  private readonly credentials?: FcmCredentials;
  private readonly fetchImpl: typeof fetch;
  private cachedAccessToken: { token: string; expiresAtMs: number } | null = null;

  constructor(credentials: FcmCredentials | undefined, options: FcmSenderOptions = {}) {
    this.credentials = credentials;
    this.fetchImpl = options.fetch ?? fetch;
  }

  isConfigured(): boolean {
    return this.credentials !== undefined;
  }

  private async accessToken(credentials: FcmCredentials, signal?: AbortSignal): Promise<string> {
    if (this.cachedAccessToken && this.cachedAccessToken.expiresAtMs > Date.now() + 60_000) {
      return this.cachedAccessToken.token;
    }

    const assertion = jwt.sign({ scope: FCM_SCOPE }, credentials.privateKey, {
      algorithm: "RS256",
      issuer: credentials.clientEmail,
      audience: OAUTH_TOKEN_URL,
      expiresIn: 3600,
    });

    const response = await this.fetchImpl(OAUTH_TOKEN_URL, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
        assertion,
      }).toString(),
      signal,
    });

    if (!response.ok) {
      throw new AccessTokenError(`oauth token request failed: HTTP ${response.status}`);
    }

    const data = accessTokenSchema.parse(await response.json());
    this.cachedAccessToken = {
      token: data.access_token,
      expiresAtMs: Date.now() + Math.max(30, data.expires_in - 60) * 1000,
    };
    return data.access_token;
  }

  async send(
    pushToken: string,
    _appIdentifier: string,
    notification: CallNotification,
    signal?: AbortSignal,
  ): Promise<DeliveryOutcome> {
    const credentials = this.credentials;
    if (!credentials) {
      return transient("fcm_not_configured");
    }

    try {
      const accessToken = await this.accessToken(credentials, signal);
      const response = await this.fetchImpl(
        `https://fcm.googleapis.com/v1/projects/${credentials.projectId}/messages:send`,
        {
          method: "POST",
          headers: {
            authorization: `Bearer ${accessToken}`,
            "content-type": "application/json",
          },
          body: JSON.stringify({
            message: {
              token: pushToken,
              data: buildFcmCallData(notification),
              android: {
                priority: "HIGH",
                ttl: "60s",
              },
            },
          }),
          signal,
        },
      );

      return classifyFcmResponse(response.status, await response.text());
    } catch (error) {
      if (isAbortError(error)) {
        return transient("fcm_timeout");
      }
      if (error instanceof AccessTokenError) {
        return transient(`fcm_auth: ${error.message}`);
      }
      return transient(`fcm_network: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
