import { generateKeyPairSync } from "node:crypto";
import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import type { ApnsCredentials } from "../config.js";
import { ApnsSender, classifyApnsResponse, type ApnsHttpResponse, type ApnsTransport } from "../providers/apns.js";
import { callFor } from "./fakes.js";

const { privateKey, publicKey } = generateKeyPairSync("ec", {
  namedCurve: "prime256v1",
  privateKeyEncoding: { type: "pkcs8", format: "pem" },
  publicKeyEncoding: { type: "spki", format: "pem" },
});

const credentials: ApnsCredentials = {
  keyId: "TESTKEY123",
  teamId: "TESTTEAM45",
  privateKey,
  useSandbox: true,
};

interface RecordedApnsRequest {
  authority: string;
  path: string;
  headers: Record<string, string>;
  body: string;
}

function fakeTransport(response: ApnsHttpResponse | Error) {
  const requests: RecordedApnsRequest[] = [];
  const transport: ApnsTransport = async (authority, path, headers, body) => {
    requests.push({ authority, path, headers, body });
    if (response instanceof Error) throw response;
    return response;
  };
  return { transport, requests };
}

describe("ApnsSender", () => {
  it("sends a VoIP push carrying only the three call fields", async () => {
    const { transport, requests } = fakeTransport({ status: 200, body: "" });
    const sender = new ApnsSender(credentials, { transport });

    const outcome = await sender.send("a1b2c3", "com.example.app", callFor("bob@example.com"));

    expect(outcome).toEqual({ kind: "delivered" });
    expect(requests).toHaveLength(1);
    const [req] = requests;
    expect(req.authority).toBe("https://api.sandbox.push.apple.com");
    expect(req.path).toBe("/3/device/a1b2c3");
    expect(req.headers["apns-push-type"]).toBe("voip");
    expect(req.headers["apns-priority"]).toBe("10");
    expect(req.headers["apns-topic"]).toBe("com.example.app.voip");
    expect(JSON.parse(req.body)).toEqual({
      caller_name: "Alice",
      call_id: "abc123@sip.example.com",
      call_type: "audio",
    });
  });

  it("targets the production gateway when sandbox is off", async () => {
    const { transport, requests } = fakeTransport({ status: 200, body: "" });
    const sender = new ApnsSender({ ...credentials, useSandbox: false }, { transport });

    await sender.send("a1b2c3", "com.example.app", callFor("bob@example.com"));

    expect(requests[0].authority).toBe("https://api.push.apple.com");
  });

  it("signs an ES256 provider token and reuses it across sends", async () => {
    const { transport, requests } = fakeTransport({ status: 200, body: "" });
    const sender = new ApnsSender(credentials, { transport });

    await sender.send("a1b2c3", "com.example.app", callFor("bob@example.com"));
    await sender.send("d4e5f6", "com.example.app", callFor("bob@example.com"));

    const [first, second] = requests.map((r) => r.headers.authorization);
    expect(first).toBe(second);
    const token = first.replace(/^bearer /, "");
    const decoded = jwt.decode(token, { complete: true });
    expect(decoded?.header.alg).toBe("ES256");
    expect(decoded?.header.kid).toBe("TESTKEY123");
    const claims = jwt.verify(token, publicKey, { algorithms: ["ES256"] });
    expect(typeof claims === "object" ? claims.iss : undefined).toBe("TESTTEAM45");
  });

  it("maps a network error to a transient outcome", async () => {
    const { transport } = fakeTransport(new Error("ECONNRESET"));
    const sender = new ApnsSender(credentials, { transport });

    await expect(sender.send("a1b2c3", "com.example.app", callFor("bob@example.com"))).resolves.toEqual({
      kind: "transient",
      reason: "apns_network: ECONNRESET",
    });
  });

  it("maps an aborted request to a timeout", async () => {
    const abort = new Error("The operation was aborted");
    abort.name = "AbortError";
    const { transport } = fakeTransport(abort);
    const sender = new ApnsSender(credentials, { transport });

    await expect(sender.send("a1b2c3", "com.example.app", callFor("bob@example.com"))).resolves.toEqual({
      kind: "transient",
      reason: "apns_timeout",
    });
  });

  it("is not configured without credentials", () => {
    expect(new ApnsSender(undefined).isConfigured()).toBe(false);
    expect(new ApnsSender(credentials).isConfigured()).toBe(true);
  });
});

describe("classifyApnsResponse", () => {
  it("treats unregistered and bad tokens as permanently invalid", () => {
    expect(classifyApnsResponse({ status: 410, body: '{"reason":"Unregistered"}' })).toEqual({
      kind: "invalid_token",
      reason: "Unregistered",
    });
    expect(classifyApnsResponse({ status: 400, body: '{"reason":"BadDeviceToken"}' })).toEqual({
      kind: "invalid_token",
      reason: "BadDeviceToken",
    });
    expect(classifyApnsResponse({ status: 400, body: '{"reason":"DeviceTokenNotForTopic"}' })).toEqual({
      kind: "invalid_token",
      reason: "DeviceTokenNotForTopic",
    });
  });

  it("treats throttling, server errors and provider problems as transient", () => {
    expect(classifyApnsResponse({ status: 429, body: '{"reason":"TooManyRequests"}' })).toEqual({
      kind: "transient",
      reason: "TooManyRequests",
    });
    expect(classifyApnsResponse({ status: 503, body: "" })).toEqual({ kind: "transient", reason: "http_503" });
    expect(classifyApnsResponse({ status: 403, body: '{"reason":"ExpiredProviderToken"}' })).toEqual({
      kind: "transient",
      reason: "ExpiredProviderToken",
    });
  });
});
