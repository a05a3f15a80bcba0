export type AppErrorCode =
  | "INFERENCE_CONFIG"
  | "INFERENCE_RUNTIME"
  | "NO_PROVIDER_FOUND"
  | "MODEL_OUTPUT_INVALID"
  | "BAD_REQUEST"
  | "INTERNAL_ERROR";

export interface AppErrorOptions {
  code: AppErrorCode;
  message: string;
  status?: number;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly details?: unknown;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = "AppError";
    this.code = options.code;
    this.status = options.status ?? 500;
    this.details = options.details;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class InferenceConfigError extends AppError {
  constructor(message = "Invalid inference configuration", details?: unknown) {
    super({
      code: "INFERENCE_CONFIG",
      message,
      status: 400,
      details,
    });
    this.name = "InferenceConfigError";
  }
}

export type InferenceFailureKind = "network" | "timeout" | "http" | "malformed_response";

export interface InferenceRuntimeErrorOptions {
  kind: InferenceFailureKind;
  upstreamStatus?: number;
  cause?: unknown;
  details?: unknown;
}

export class InferenceRuntimeError extends AppError {
  readonly kind: InferenceFailureKind;
  readonly upstreamStatus?: number;

  constructor(message: string, options: InferenceRuntimeErrorOptions) {
    super({
      code: "INFERENCE_RUNTIME",
      message,
      status: 502,
      details: options.details,
      cause: options.cause,
    });
    this.name = "InferenceRuntimeError";
    this.kind = options.kind;
    this.upstreamStatus = options.upstreamStatus;
  }

  /** Whether retrying the same request could plausibly succeed. */
  get transient(): boolean {
    if (this.kind === "network" || this.kind === "timeout") {
      return true;
    }

    if (this.kind === "malformed_response" || this.upstreamStatus === undefined) {
      return false;
    }

    return this.upstreamStatus === 408 || this.upstreamStatus === 429 || this.upstreamStatus >= 500;
  }
}

export class NoProviderFoundError extends AppError {
  readonly modelId: string;

  constructor(modelId: string, patterns: string[]) {
    super({
      code: "NO_PROVIDER_FOUND",
      message: `No provider registered for model id "${modelId}". Tried: ${
        patterns.length > 0 ? patterns.join(", ") : "(none registered)"
      }`,
      status: 404,
      details: { modelId, patterns },
    });
    this.name = "NoProviderFoundError";
    this.modelId = modelId;
  }
}

export class ModelOutputInvalidError extends AppError {
  constructor(message = "Model response was invalid", details?: unknown) {
    super({
      code: "MODEL_OUTPUT_INVALID",
      message,
      status: 422,
      details,
    });
    this.name = "ModelOutputInvalidError";
  }
}

export function toAppError(error: unknown, fallbackMessage = "Internal error"): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError({
      code: "INTERNAL_ERROR",
      message: error.message || fallbackMessage,
      status: 500,
      cause: error,
    });
  }

  return new AppError({
    code: "INTERNAL_ERROR",
    message: fallbackMessage,
    status: 500,
    details: error,
  });
}
