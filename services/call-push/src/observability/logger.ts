const SERVICE = "call-push";

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  console.log(JSON.stringify({ level: "info", service: SERVICE, message, ...extra }));
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  console.warn(JSON.stringify({ level: "warn", service: SERVICE, message, ...extra }));
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  console.error(JSON.stringify({ level: "error", service: SERVICE, message, ...extra }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
