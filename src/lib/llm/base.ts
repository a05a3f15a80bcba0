import type { SchemaConstraint } from "@/lib/schema/builder";
import type {
  InferenceOutcome,
  InferenceParams,
  ProviderState,
  TlsVerification,
} from "@/lib/types";

export interface ProviderConfig {
  modelId: string;
  apiKey?: string;
  baseURL?: string;
  temperature?: number;
  tlsVerification?: TlsVerification;
  timeoutMs?: number;
  schema?: SchemaConstraint | null;
}

export interface LanguageModel {
  readonly modelId: string;
  readonly state: ProviderState;
  readonly structuredOutputEnabled: boolean;
  readonly responseSchema: SchemaConstraint | null;
  applySchema(schema: SchemaConstraint | null): void;
  /** Scoped form: owns a transport for the duration of the call and tears it down afterwards. */
  infer(prompts: readonly string[], params?: InferenceParams, signal?: AbortSignal): Promise<InferenceOutcome[]>;
  /** Persistent form: reuses one lazily created transport until `close()`. */
  inferAsync(
    prompts: readonly string[],
    params?: InferenceParams,
    signal?: AbortSignal,
  ): Promise<InferenceOutcome[]>;
  close(): Promise<void>;
}

export interface ProviderDescriptor {
  readonly name: string;
  readonly defaultBaseURL: string;
  create(config: ProviderConfig): LanguageModel;
}
