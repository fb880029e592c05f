import express, { type Request, type Response } from "express";
import { z } from "zod";
import { RegistryUnavailableError } from "../contracts/errors.js";
import type { CallDispatcher } from "../dispatch/dispatcher.js";
import { errorMessage, logError } from "../observability/logger.js";
import type { SenderTable } from "../providers/index.js";
import type { PushRegistry } from "../registry/types.js";
import type { CallNotification } from "../types.js";
import { callerIdentity, requireIdentity } from "./auth.js";

const callNotifySchema = z.object({
  callee_username: z.string().trim().min(1).max(320),
  caller_username: z.string().trim().min(1).max(320),
  caller_display_name: z.string().trim().max(256).optional(),
  call_id: z.string().min(1).max(512),
  call_type: z.enum(["audio", "video"]).default("audio"),
});

const registerSchema = z.object({
  jid: z.string().trim().min(3).max(320),
  device_id: z.string().min(1).max(128),
  platform: z.enum(["ios", "android"]),
  push_token: z.string().min(1).max(4096),
  app_id: z.string().min(1).max(255),
});

const deregisterSchema = z.object({
  jid: z.string().trim().min(3).max(320),
  device_id: z.string().min(1).max(128),
});

const accountSchema = z.object({
  jid: z.string().trim().min(3).max(320),
});

export interface ApiDeps {
  xmppDomain: string;
  jwtSecret: string;
  registry: PushRegistry;
  dispatcher: CallDispatcher;
  senders: SenderTable;
}

export function qualifyIdentity(usernameOrJid: string, xmppDomain: string): string {
  return usernameOrJid.includes("@") ? usernameOrJid : `${usernameOrJid}@${xmppDomain}`;
}

function sendError(res: Response, route: string, error: unknown): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ ok: false, error: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") });
    return;
  }

  if (error instanceof RegistryUnavailableError) {
    logError("registry_unavailable", { route, error: error.message });
    res.status(503).json({ ok: false, error: "registry unavailable" });
    return;
  }

  logError("request_failed", { route, error: errorMessage(error) });
  res.status(500).json({ ok: false, error: "internal error" });
}

function ensureSameIdentity(res: Response, jid: string): boolean {
  if (jid !== callerIdentity(res)) {
    res.status(403).json({ ok: false, error: "token identity does not match request jid" });
    return false;
  }
  return true;
}

export function createApi(deps: ApiDeps) {
  const app = express();
  app.use(express.json({ limit: "16kb" }));

  const authenticated = requireIdentity(deps.jwtSecret);

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      service: "call-push",
      apns: deps.senders.ios.isConfigured(),
      fcm: deps.senders.android.isConfigured(),
      ts: new Date().toISOString(),
    });
  });

  // Internal webhook for the SIP proxy; protected by network isolation only.
  app.post("/push/call-notify", async (req: Request, res: Response) => {
    try {
      const payload = callNotifySchema.parse(req.body);
      const notification: CallNotification = {
        calleeIdentity: qualifyIdentity(payload.callee_username, deps.xmppDomain),
        callerName: payload.caller_display_name || payload.caller_username,
        callId: payload.call_id,
        callType: payload.call_type,
      };

      const result = await deps.dispatcher.handle(notification.calleeIdentity, notification);
      res.status(200).json({ ok: true, ...result });
    } catch (error) {
      sendError(res, "call-notify", error);
    }
  });

  app.post("/push/register", authenticated, async (req: Request, res: Response) => {
    try {
      const payload = registerSchema.parse(req.body);
      if (!ensureSameIdentity(res, payload.jid)) {
        return;
      }

      await deps.registry.upsert({
        identity: payload.jid,
        deviceId: payload.device_id,
        platform: payload.platform,
        pushToken: payload.push_token,
        appIdentifier: payload.app_id,
      });
      res.status(200).json({ ok: true, status: "registered" });
    } catch (error) {
      sendError(res, "register", error);
    }
  });

  app.delete("/push/register", authenticated, async (req: Request, res: Response) => {
    try {
      const payload = deregisterSchema.parse(req.body);
      if (!ensureSameIdentity(res, payload.jid)) {
        return;
      }

      await deps.registry.remove(payload.jid, payload.device_id);
      res.status(200).json({ ok: true, status: "deregistered" });
    } catch (error) {
      sendError(res, "deregister", error);
    }
  });

  // Called by the account store when an account is deleted.
  app.delete("/push/registrations", authenticated, async (req: Request, res: Response) => {
    try {
      const payload = accountSchema.parse(req.body);
      if (!ensureSameIdentity(res, payload.jid)) {
        return;
      }

      await deps.registry.removeAllForIdentity(payload.jid);
      res.status(200).json({ ok: true, status: "deleted" });
    } catch (error) {
      sendError(res, "delete-registrations", error);
    }
  });

  return app;
}
