import { RegistryUnavailableError } from "../contracts/errors.js";
import { errorMessage, logInfo, logWarn } from "../observability/logger.js";
import type { SenderTable } from "../providers/index.js";
import type { PushRegistry } from "../registry/types.js";
import type {
  CallNotification,
  DeliveryOutcome,
  DeviceDispatchStatus,
  DispatchResult,
  PushRegistration,
} from "../types.js";

export interface CallDispatcherOptions {
  registry: PushRegistry;
  senders: SenderTable;
  sendTimeoutMs: number;
}

function emptyResult(status: DispatchResult["status"]): DispatchResult {
  return { status, sent: 0, skipped: 0, failed: 0, removed: 0 };
}

// Resolves once the signal fires, so work that ignores it still cannot hold
// the dispatch past its deadline.
function expired(signal: AbortSignal): Promise<"expired"> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve("expired");
      return;
    }
    signal.addEventListener("abort", () => resolve("expired"), { once: true });
  });
}

/**
 * Fans one incoming call out to every registered device of the callee.
 *
 * Per-device outcomes never escalate: a dead or slow destination only shows up
 * in the counts. Only a registry read failure rejects `handle`.
 */
export class CallDispatcher {
  private readonly registry: PushRegistry;
  private readonly senders: SenderTable;
  private readonly sendTimeoutMs: number;

  constructor(options: CallDispatcherOptions) {
    this.registry = options.registry;
    this.senders = options.senders;
    this.sendTimeoutMs = options.sendTimeoutMs;
  }

  async handle(calleeIdentity: string, notification: CallNotification): Promise<DispatchResult> {
    const registrations = await this.listRegistrations(calleeIdentity);

    if (registrations.length === 0) {
      logInfo("call_push_no_registrations", { callId: notification.callId });
      return emptyResult("no_registrations");
    }

    const statuses = await Promise.all(
      registrations.map((registration) => this.deliverToDevice(registration, notification)),
    );

    const result = emptyResult("dispatched");
    for (const status of statuses) {
      result[status] += 1;
    }

    logInfo("call_push_dispatched", {
      callId: notification.callId,
      devices: registrations.length,
      sent: result.sent,
      skipped: result.skipped,
      failed: result.failed,
      removed: result.removed,
    });
    return result;
  }

  private async deliverToDevice(
    registration: PushRegistration,
    notification: CallNotification,
  ): Promise<DeviceDispatchStatus> {
    const sender = this.senders[registration.platform];
    if (!sender.isConfigured()) {
      return "skipped";
    }

    // One deadline covers the send and the cleanup that may follow it.
    const signal = AbortSignal.timeout(this.sendTimeoutMs);
    const outcome = await this.sendWithDeadline(registration, notification, signal);

    switch (outcome.kind) {
      case "delivered":
        return "sent";
      case "invalid_token":
        await this.dropToken(registration, outcome.reason, signal);
        return "removed";
      case "transient":
        logWarn("call_push_device_failed", {
          callId: notification.callId,
          platform: registration.platform,
          reason: outcome.reason,
        });
        return "failed";
    }
  }

  private async listRegistrations(calleeIdentity: string): Promise<PushRegistration[]> {
    const signal = AbortSignal.timeout(this.sendTimeoutMs);
    const listed = await Promise.race([this.registry.listForIdentity(calleeIdentity), expired(signal)]);
    if (listed === "expired") {
      throw new RegistryUnavailableError("listForIdentity", `timed out after ${this.sendTimeoutMs}ms`);
    }
    return listed;
  }

  private async sendWithDeadline(
    registration: PushRegistration,
    notification: CallNotification,
    signal: AbortSignal,
  ): Promise<DeliveryOutcome> {
    const sender = this.senders[registration.platform];
    try {
      const outcome = await Promise.race([
        sender.send(registration.pushToken, registration.appIdentifier, notification, signal),
        expired(signal),
      ]);
      return outcome === "expired" ? { kind: "transient", reason: "timeout" } : outcome;
    } catch (error) {
      return { kind: "transient", reason: `sender_error: ${errorMessage(error)}` };
    }
  }

  private async dropToken(registration: PushRegistration, reason: string, signal: AbortSignal): Promise<void> {
    try {
      const removed = await Promise.race([
        this.registry.removeByToken(registration.pushToken).then(() => "removed" as const),
        expired(signal),
      ]);
      if (removed === "expired") {
        logWarn("call_push_token_cleanup_failed", { platform: registration.platform, reason, error: "timeout" });
        return;
      }
      logInfo("call_push_token_removed", { platform: registration.platform, reason });
    } catch (error) {
      logWarn("call_push_token_cleanup_failed", {
        platform: registration.platform,
        reason,
        error: errorMessage(error),
      });
    }
  }
}
