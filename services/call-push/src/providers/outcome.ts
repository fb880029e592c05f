import type { DeliveryOutcome } from "../types.js";

export const DELIVERED: DeliveryOutcome = { kind: "delivered" };

export function invalidToken(reason: string): DeliveryOutcome {
  return { kind: "invalid_token", reason };
}

export function transient(reason: string): DeliveryOutcome {
  return { kind: "transient", reason };
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
