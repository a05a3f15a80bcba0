import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("env", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    delete process.env.EXTRACT_TLS_VERIFY;
    delete process.env.LLM_TIMEOUT_MS;
  });

  it("verifies TLS by default", async () => {
    delete process.env.EXTRACT_TLS_VERIFY;
    const { env } = await import("@/lib/env");

    expect(env.EXTRACT_TLS_VERIFY).toBe(true);
    expect(env.EXTRACT_MODEL_ID).toBe("glm-4");
  });

  it.each([
    ["false", false],
    ["0", false],
    ["TRUE", true],
    ["/etc/ssl/certs/internal-ca.pem", "/etc/ssl/certs/internal-ca.pem"],
  ])("parses EXTRACT_TLS_VERIFY=%s", async (raw, expected) => {
    process.env.EXTRACT_TLS_VERIFY = raw;
    const { env } = await import("@/lib/env");

    expect(env.EXTRACT_TLS_VERIFY).toBe(expected);
  });

  it("coerces and bounds the request timeout", async () => {
    process.env.LLM_TIMEOUT_MS = "15000";
    const { env } = await import("@/lib/env");

    expect(env.LLM_TIMEOUT_MS).toBe(15000);
  });

  it("rejects a timeout below one second", async () => {
    process.env.LLM_TIMEOUT_MS = "10";

    await expect(import("@/lib/env")).rejects.toThrow();
  });
});
