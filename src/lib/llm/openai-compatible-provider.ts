import { readFileSync } from "node:fs";

import { env } from "@/lib/env";
import { InferenceConfigError } from "@/lib/errors";
import type { LanguageModel, ProviderConfig } from "@/lib/llm/base";
import { InferenceClient, runBatch, type InferenceClientOptions } from "@/lib/llm/inference-client";
import { logger } from "@/lib/logger";
import type { SchemaConstraint } from "@/lib/schema/builder";
import { inferenceParamsSchema } from "@/lib/schemas";
import type {
  InferenceOutcome,
  InferenceParams,
  ProviderState,
  TlsVerification,
} from "@/lib/types";

const log = logger.child({ module: "provider" });

function normalizeBaseURL(baseURL: string): string {
  let parsed: URL;
  try {
    parsed = new URL(baseURL);
  } catch {
    throw new InferenceConfigError(`Invalid base URL "${baseURL}"`);
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new InferenceConfigError(`Unsupported base URL protocol "${parsed.protocol}"`);
  }

  return parsed.toString().replace(/\/+$/, "");
}

function readCaBundle(tlsVerification: TlsVerification): Buffer | undefined {
  if (typeof tlsVerification !== "string") {
    return undefined;
  }

  try {
    return readFileSync(tlsVerification);
  } catch (error) {
    throw new InferenceConfigError(`Unable to read CA bundle at "${tlsVerification}"`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

function validateParams(params: InferenceParams): InferenceParams {
  const parsed = inferenceParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new InferenceConfigError("Invalid inference parameters", parsed.error.issues);
  }

  return parsed.data;
}

/**
 * Language model served over an OpenAI-compatible `/chat/completions` endpoint.
 *
 * Credentials are checked at construction, before any network activity. The persistent
 * transport used by `inferAsync` is created on first use and must be released with `close()`.
 */
export class OpenAICompatibleProvider implements LanguageModel {
  readonly name: string;
  readonly modelId: string;
  readonly baseURL: string;
  readonly temperature: number;
  readonly tlsVerification: TlsVerification;
  readonly timeoutMs: number;

  private readonly clientOptions: InferenceClientOptions;
  private client: InferenceClient | null = null;
  private schema: SchemaConstraint | null = null;

  constructor(config: ProviderConfig, defaults: { name: string; defaultBaseURL: string }) {
    const apiKey = config.apiKey?.trim();
    if (!apiKey) {
      throw new InferenceConfigError(
        `API key required for ${defaults.name}. Set EXTRACT_API_KEY or pass apiKey.`,
        { provider: defaults.name, modelId: config.modelId },
      );
    }

    if (!config.modelId.trim()) {
      throw new InferenceConfigError("Model id must not be empty", { provider: defaults.name });
    }

    this.name = defaults.name;
    this.modelId = config.modelId;
    this.baseURL = normalizeBaseURL(config.baseURL ?? defaults.defaultBaseURL);
    this.temperature = config.temperature ?? 0;
    this.tlsVerification = config.tlsVerification ?? true;
    this.timeoutMs = config.timeoutMs ?? env.LLM_TIMEOUT_MS;

    this.clientOptions = {
      modelId: this.modelId,
      apiKey,
      baseURL: this.baseURL,
      temperature: this.temperature,
      timeoutMs: this.timeoutMs,
      rejectUnauthorized: this.tlsVerification !== false,
      ca: readCaBundle(this.tlsVerification),
    };

    if (this.tlsVerification === false) {
      log.warn({ provider: this.name, baseURL: this.baseURL }, "TLS verification disabled");
    }

    this.applySchema(config.schema ?? null);
  }

  get state(): ProviderState {
    return this.client ? "active" : "unconfigured";
  }

  get responseSchema(): SchemaConstraint | null {
    return this.schema;
  }

  get structuredOutputEnabled(): boolean {
    return this.schema !== null;
  }

  applySchema(schema: SchemaConstraint | null): void {
    this.schema = schema ? schema.toProviderConfig().responseSchema : null;
  }

  private get jsonMode(): boolean {
    return this.schema?.supportsStrictMode ?? false;
  }

  private ensureClient(): InferenceClient {
    if (!this.client) {
      this.client = new InferenceClient(this.clientOptions);
    }

    return this.client;
  }

  async infer(
    prompts: readonly string[],
    params: InferenceParams = {},
    signal?: AbortSignal,
  ): Promise<InferenceOutcome[]> {
    const validated = validateParams(params);
    const scoped = new InferenceClient(this.clientOptions);
    try {
      return await runBatch(scoped, this.modelId, prompts, validated, {
        jsonMode: this.jsonMode,
        signal,
      });
    } finally {
      scoped.close();
    }
  }

  async inferAsync(
    prompts: readonly string[],
    params: InferenceParams = {},
    signal?: AbortSignal,
  ): Promise<InferenceOutcome[]> {
    const validated = validateParams(params);
    return runBatch(this.ensureClient(), this.modelId, prompts, validated, {
      jsonMode: this.jsonMode,
      signal,
    });
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }

    this.client = null;
    client.close();
  }
}

export async function withProvider<T>(
  provider: LanguageModel,
  task: (provider: LanguageModel) => Promise<T>,
): Promise<T> {
  try {
    return await task(provider);
  } finally {
    await provider.close();
  }
}
