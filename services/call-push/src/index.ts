import { loadConfig } from "./config.js";
import { CallDispatcher } from "./dispatch/dispatcher.js";
import { createApi } from "./http/api.js";
import { errorMessage, logError, logInfo } from "./observability/logger.js";
import { createSenders } from "./providers/index.js";
import { createPushRegistry } from "./registry/index.js";

function main(): void {
  const config = loadConfig();
  const registry = createPushRegistry(config);
  const senders = createSenders(config);
  const dispatcher = new CallDispatcher({
    registry,
    senders,
    sendTimeoutMs: config.sendTimeoutMs,
  });
  const app = createApi({
    xmppDomain: config.xmppDomain,
    jwtSecret: config.jwtSecret,
    registry,
    dispatcher,
    senders,
  });

  app.listen(config.port, () => {
    logInfo("call_push_started", {
      port: config.port,
      registry: config.registry,
      apns: senders.ios.isConfigured(),
      apnsSandbox: config.apns?.useSandbox ?? false,
      fcm: senders.android.isConfigured(),
    });
  });
}

try {
  main();
} catch (error) {
  logError("call_push_fatal", { error: errorMessage(error) });
  process.exit(1);
}
