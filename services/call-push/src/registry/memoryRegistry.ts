import type { PushRegistration, PushRegistrationInput } from "../types.js";
import type { PushRegistry } from "./types.js";

function rowKey(identity: string, deviceId: string): string {
  return `${identity}\u0000${deviceId}`;
}

function compareRegistrations(a: PushRegistration, b: PushRegistration): number {
  if (a.registeredAt !== b.registeredAt) {
    return a.registeredAt < b.registeredAt ? -1 : 1;
  }
  if (a.deviceId === b.deviceId) return 0;
  return a.deviceId < b.deviceId ? -1 : 1;
}

export class MemoryPushRegistry implements PushRegistry {
  private readonly rows = new Map<string, PushRegistration>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async upsert(registration: PushRegistrationInput): Promise<void> {
    this.rows.set(rowKey(registration.identity, registration.deviceId), {
      ...registration,
      registeredAt: this.now().toISOString(),
    });
  }

  async remove(identity: string, deviceId: string): Promise<void> {
    this.rows.delete(rowKey(identity, deviceId));
  }

  async removeByToken(pushToken: string): Promise<void> {
    for (const [key, row] of this.rows.entries()) {
      if (row.pushToken === pushToken) this.rows.delete(key);
    }
  }

  async listForIdentity(identity: string): Promise<PushRegistration[]> {
    return [...this.rows.values()]
      .filter((row) => row.identity === identity)
      .map((row) => ({ ...row }))
      .sort(compareRegistrations);
  }

  async removeAllForIdentity(identity: string): Promise<void> {
    for (const [key, row] of this.rows.entries()) {
      if (row.identity === identity) this.rows.delete(key);
    }
  }
}
