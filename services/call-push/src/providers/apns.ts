import http2, { type ClientHttp2Session } from "node:http2";
import jwt from "jsonwebtoken";
import type { ApnsCredentials } from "../config.js";
import { errorMessage, logWarn } from "../observability/logger.js";
import type { CallNotification, DeliveryOutcome, PushSender } from "../types.js";
import { buildCallPayload } from "./payload.js";
import { DELIVERED, invalidToken, isAbortError, transient } from "./outcome.js";

const APNS_HOST_PROD = "https://api.push.apple.com";
const APNS_HOST_SANDBOX = "https://api.sandbox.push.apple.com";
const APNS_TOKEN_TTL_SECONDS = 50 * 60;

const DEAD_TOKEN_REASONS = ["BadDeviceToken", "Unregistered", "DeviceTokenNotForTopic", "ExpiredToken"];

export interface ApnsHttpResponse {
  status: number;
  body: string;
}

export type ApnsTransport = (
  authority: string,
  path: string,
  headers: Record<string, string>,
  body: string,
  signal?: AbortSignal,
) => Promise<ApnsHttpResponse>;

const SESSION_IDLE_MS = 10 * 60 * 1000;

/**
 * Keeps one HTTP/2 session per gateway so a fan-out multiplexes its pushes
 * over a single connection. A session that errors, closes or idles out is
 * dropped and the next request reconnects.
 */
export class Http2SessionPool {
  private readonly sessions = new Map<string, ClientHttp2Session>();

  private session(authority: string): ClientHttp2Session {
    const existing = this.sessions.get(authority);
    if (existing && !existing.closed && !existing.destroyed) {
      return existing;
    }

    const session = http2.connect(authority);
    const forget = () => {
      if (this.sessions.get(authority) === session) {
        this.sessions.delete(authority);
      }
    };
    session.on("error", (error) => {
      logWarn("apns_session_error", { authority, error: errorMessage(error) });
      forget();
    });
    session.on("close", forget);
    session.on("goaway", forget);
    session.setTimeout(SESSION_IDLE_MS, () => session.close());
    this.sessions.set(authority, session);
    return session;
  }

  readonly request: ApnsTransport = (authority, path, headers, body, signal) =>
    new Promise((resolve, reject) => {
      const req = this.session(authority).request(
        {
          ":method": "POST",
          ":path": path,
          ...headers,
        },
        { signal },
      );

      let status = 0;
      let responseBody = "";
      req.setEncoding("utf8");
      req.on("response", (h) => {
        status = Number(h[":status"] ?? 0);
      });
      req.on("data", (chunk: string) => {
        responseBody += chunk;
      });
      req.on("end", () => resolve({ status, body: responseBody }));
      req.on("error", reject);
      req.write(body);
      req.end();
    });

  close(): void {
    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
  }
}

function readReason(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === "object" && "reason" in parsed && typeof parsed.reason === "string") {
      return parsed.reason;
    }
  } catch {
    // APNs sometimes answers 5xx with an empty body
  }
  return undefined;
}

export function classifyApnsResponse(response: ApnsHttpResponse): DeliveryOutcome {
  if (response.status >= 200 && response.status < 300) {
    return DELIVERED;
  }

  const reason = readReason(response.body) ?? `http_${response.status}`;
  if (response.status === 410 || DEAD_TOKEN_REASONS.includes(reason)) {
    return invalidToken(reason);
  }

  // 429, 5xx and provider-side problems (expired provider token, bad topic)
  // say nothing about the device token itself.
  return transient(reason);
}

export interface ApnsSenderOptions {
  transport?: ApnsTransport;
}

/**
 * Delivers PushKit VoIP pushes so iOS wakes the app in the background and
 * hands the call to CallKit.
 */
export class ApnsSender implements PushSender {
  readonly platform = "ios" as const;
  private readonly credentials?: ApnsCredentials;
  private readonly transport: ApnsTransport;
  private cachedJwt: { token: string; expiresAt: number } | null = null;

  constructor(credentials: ApnsCredentials | undefined, options: ApnsSenderOptions = {}) {
    this.credentials = credentials;
    this.transport = options.transport ?? new Http2SessionPool().request;
  }

  isConfigured(): boolean {
    return this.credentials !== undefined;
  }

  private providerToken(credentials: ApnsCredentials): string {
    const now = Math.floor(Date.now() / 1000);
    if (this.cachedJwt && this.cachedJwt.expiresAt > now + 5) {
      return this.cachedJwt.token;
    }

    const token = jwt.sign({}, credentials.privateKey, {
      algorithm: "ES256",
      keyid: credentials.keyId,
      issuer: credentials.teamId,
    });
    this.cachedJwt = { token, expiresAt: now + APNS_TOKEN_TTL_SECONDS };
    return token;
  }

  async send(
    pushToken: string,
    appIdentifier: string,
    notification: CallNotification,
    signal?: AbortSignal,
  ): Promise<DeliveryOutcome> {
    const credentials = this.credentials;
    if (!credentials) {
      return transient("apns_not_configured");
    }

    let authorization: string;
    try {
      authorization = `bearer ${this.providerToken(credentials)}`;
    } catch (error) {
      return transient(`apns_provider_token: ${error instanceof Error ? error.message : String(error)}`);
    }

    const authority = credentials.useSandbox ? APNS_HOST_SANDBOX : APNS_HOST_PROD;
    const headers: Record<string, string> = {
      authorization,
      "content-type": "application/json",
      "apns-topic": `${appIdentifier}.voip`,
      "apns-push-type": "voip",
      "apns-priority": "10",
      "apns-expiration": "0",
    };

    try {
      const response = await this.transport(
        authority,
        `/3/device/${encodeURIComponent(pushToken)}`,
        headers,
        JSON.stringify(buildCallPayload(notification)),
        signal,
      );
      return classifyApnsResponse(response);
    } catch (error) {
      if (isAbortError(error)) {
        return transient("apns_timeout");
      }
      return transient(`apns_network: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
