export class RegistryUnavailableError extends Error {
  code: string;

  constructor(operation: string, message: string) {
    super(`[call-push] registry ${operation} failed: ${message}`);
    this.name = "RegistryUnavailableError";
    this.code = "registry_unavailable";
  }
}
