import type { AppConfig } from "../config.js";
import type { Platform, PushSender } from "../types.js";
import { ApnsSender } from "./apns.js";
import { FcmSender } from "./fcm.js";

export type SenderTable = Record<Platform, PushSender>;

export function createSenders(config: AppConfig): SenderTable {
  return {
    ios: new ApnsSender(config.apns),
    android: new FcmSender(config.fcm),
  };
}
