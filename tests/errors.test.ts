import { describe, expect, it } from "vitest";

import {
  AppError,
  InferenceConfigError,
  InferenceRuntimeError,
  NoProviderFoundError,
  toAppError,
} from "@/lib/errors";

describe("InferenceRuntimeError", () => {
  it.each([
    [{ kind: "network" as const }, true],
    [{ kind: "timeout" as const }, true],
    [{ kind: "http" as const, upstreamStatus: 500 }, true],
    [{ kind: "http" as const, upstreamStatus: 503 }, true],
    [{ kind: "http" as const, upstreamStatus: 429 }, true],
    [{ kind: "http" as const, upstreamStatus: 408 }, true],
    [{ kind: "http" as const, upstreamStatus: 400 }, false],
    [{ kind: "http" as const, upstreamStatus: 401 }, false],
    [{ kind: "http" as const, upstreamStatus: 403 }, false],
    [{ kind: "malformed_response" as const }, false],
  ])("classifies %o as transient=%s", (options, transient) => {
    expect(new InferenceRuntimeError("failed", options).transient).toBe(transient);
  });

  it("keeps the original cause", () => {
    const cause = new Error("socket hang up");
    const error = new InferenceRuntimeError("failed", { kind: "network", cause });

    expect(error.cause).toBe(cause);
    expect(error).toMatchObject({ code: "INFERENCE_RUNTIME", status: 502, name: "InferenceRuntimeError" });
  });
});

describe("error taxonomy", () => {
  it("gives each kind a distinct code", () => {
    expect(new InferenceConfigError().code).toBe("INFERENCE_CONFIG");
    expect(new NoProviderFoundError("unknown-model", ["^glm-"])).toMatchObject({
      code: "NO_PROVIDER_FOUND",
      modelId: "unknown-model",
      message: 'No provider registered for model id "unknown-model". Tried: ^glm-',
    });
  });

  it("normalizes unknown errors", () => {
    const wrapped = toAppError(new Error("boom"));

    expect(wrapped).toBeInstanceOf(AppError);
    expect(wrapped).toMatchObject({ code: "INTERNAL_ERROR", message: "boom", status: 500 });
    expect(toAppError("weird", "Fallback")).toMatchObject({ message: "Fallback", details: "weird" });
  });
});
