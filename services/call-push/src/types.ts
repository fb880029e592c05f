export type Platform = "ios" | "android";

export type CallType = "audio" | "video";

export type RegistryKind = "supabase" | "memory";

export interface PushRegistration {
  identity: string;
  deviceId: string;
  platform: Platform;
  pushToken: string;
  appIdentifier: string;
  registeredAt: string;
}

export type PushRegistrationInput = Omit<PushRegistration, "registeredAt">;

/**
 * Wake-up request for one incoming call. Deliberately carries no message
 * content: the pushed payload is derived from these fields only.
 */
export interface CallNotification {
  calleeIdentity: string;
  callerName: string;
  callId: string;
  callType: CallType;
}

export type DeliveryOutcome =
  | { kind: "delivered" }
  | { kind: "invalid_token"; reason: string }
  | { kind: "transient"; reason: string };

export interface PushSender {
  readonly platform: Platform;
  isConfigured(): boolean;
  send(
    pushToken: string,
    appIdentifier: string,
    notification: CallNotification,
    signal?: AbortSignal,
  ): Promise<DeliveryOutcome>;
}

export type DeviceDispatchStatus = "sent" | "skipped" | "failed" | "removed";

export interface DispatchResult {
  status: "no_registrations" | "dispatched";
  sent: number;
  skipped: number;
  failed: number;
  removed: number;
}
