import type { InferenceRuntimeError } from "@/lib/errors";

export interface Extraction {
  extractionClass: string;
  extractionText: string;
  attributes: Record<string, string>;
}

export interface ExampleAnnotation {
  text: string;
  extractions: Extraction[];
}

export interface CharInterval {
  start: number;
  end: number;
}

export interface LocatedExtraction extends Extraction {
  /** Offsets of `extractionText` in the source text, or null when it is not a verbatim substring. */
  charInterval: CharInterval | null;
}

export interface ScoredOutput {
  score: number;
  output: string;
}

/**
 * Sampling parameters forwarded to the endpoint. Only the keys present are sent;
 * `temperature` falls back to the provider's configured value.
 */
export interface InferenceParams {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
}

export type InferenceOutcome =
  | { ok: true; outputs: ScoredOutput[] }
  | { ok: false; error: InferenceRuntimeError };

export type TlsVerification = boolean | string;

export type ProviderState = "unconfigured" | "active";

export interface ExtractionResult {
  documentId: string;
  extractions: LocatedExtraction[];
}
