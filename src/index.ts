export {
  AppError,
  InferenceConfigError,
  InferenceRuntimeError,
  ModelOutputInvalidError,
  NoProviderFoundError,
  toAppError,
} from "@/lib/errors";
export type { AppErrorCode, InferenceFailureKind } from "@/lib/errors";
export { buildSchemaConstraint, SchemaConstraint } from "@/lib/schema/builder";
export type { JsonSchema, ProviderSchemaConfig } from "@/lib/schema/builder";
export { ProviderRegistry } from "@/lib/llm/registry";
export type { PluginLoader, RegistryEntry } from "@/lib/llm/registry";
export type { LanguageModel, ProviderConfig, ProviderDescriptor } from "@/lib/llm/base";
export { InferenceClient, buildChatPayload, runBatch } from "@/lib/llm/inference-client";
export { OpenAICompatibleProvider, withProvider } from "@/lib/llm/openai-compatible-provider";
export {
  deepSeekProvider,
  glmProvider,
  openAIProvider,
  registerBuiltinProviders,
} from "@/lib/llm/providers";
export { createDefaultRegistry, createModel } from "@/lib/llm/factory";
export type { ModelConfig } from "@/lib/llm/factory";
export { extract, extractDocuments, summarizeResults } from "@/lib/extraction/extract";
export type {
  DocumentBatchOptions,
  DocumentOutcome,
  ExtractionRequest,
  ExtractionSummary,
  InputDocument,
} from "@/lib/extraction/extract";
export { buildExtractionPrompt } from "@/lib/extraction/prompt";
export { locateExtractions, parseExtractions } from "@/lib/extraction/parser";
export type {
  CharInterval,
  ExampleAnnotation,
  Extraction,
  ExtractionResult,
  InferenceOutcome,
  InferenceParams,
  LocatedExtraction,
  ProviderState,
  ScoredOutput,
  TlsVerification,
} from "@/lib/types";
