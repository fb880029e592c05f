import type { PushRegistration, PushRegistrationInput } from "../types.js";

/**
 * Durable (identity, deviceId) → push destination mapping.
 *
 * Every method rejects with `RegistryUnavailableError` when the backing store
 * cannot be reached; none of them treat a missing row as an error.
 */
export interface PushRegistry {
  /** Insert or replace the row for `(identity, deviceId)`. */
  upsert(registration: PushRegistrationInput): Promise<void>;
  remove(identity: string, deviceId: string): Promise<void>;
  /** Drops every row holding `pushToken`; gateways report dead tokens without a device id. */
  removeByToken(pushToken: string): Promise<void>;
  /** Ordered by registration time, then device id. */
  listForIdentity(identity: string): Promise<PushRegistration[]>;
  removeAllForIdentity(identity: string): Promise<void>;
}
