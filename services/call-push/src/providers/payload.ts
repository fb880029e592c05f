import type { CallNotification } from "../types.js";

/** The only fields a wake push may carry. */
export interface CallPushPayload {
  caller_name: string;
  call_id: string;
  call_type: CallNotification["callType"];
}

export interface FcmCallData extends CallPushPayload {
  type: "call";
}

export function buildCallPayload(notification: CallNotification): CallPushPayload {
  return {
    caller_name: notification.callerName,
    call_id: notification.callId,
    call_type: notification.callType,
  };
}

export function buildFcmCallData(notification: CallNotification): FcmCallData {
  return { type: "call", ...buildCallPayload(notification) };
}
