import { env } from "@/lib/env";
import type { LanguageModel } from "@/lib/llm/base";
import { registerBuiltinProviders } from "@/lib/llm/providers";
import { ProviderRegistry } from "@/lib/llm/registry";
import { buildSchemaConstraint } from "@/lib/schema/builder";
import type { ExampleAnnotation, TlsVerification } from "@/lib/types";

export interface ModelConfig {
  modelId?: string;
  /** Provider name to use instead of resolving by model id. */
  provider?: string;
  apiKey?: string;
  baseURL?: string;
  temperature?: number;
  tlsVerification?: TlsVerification;
  timeoutMs?: number;
  /** When given, a schema is inferred from these examples and attached to the model. */
  examples?: readonly ExampleAnnotation[];
}

export function createDefaultRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.loadPluginsOnce(registerBuiltinProviders);
  return registry;
}

export function createModel(config: ModelConfig, registry: ProviderRegistry): LanguageModel {
  const modelId = config.modelId ?? env.EXTRACT_MODEL_ID;
  const descriptor = config.provider
    ? registry.resolveByName(config.provider)
    : registry.resolve(modelId);

  return descriptor.create({
    modelId,
    apiKey: config.apiKey ?? env.EXTRACT_API_KEY,
    baseURL: config.baseURL ?? env.EXTRACT_BASE_URL,
    temperature: config.temperature,
    tlsVerification: config.tlsVerification ?? env.EXTRACT_TLS_VERIFY,
    timeoutMs: config.timeoutMs ?? env.LLM_TIMEOUT_MS,
    schema: config.examples ? buildSchemaConstraint(config.examples) : null,
  });
}
