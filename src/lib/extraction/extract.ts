import { env } from "@/lib/env";
import { AppError, toAppError } from "@/lib/errors";
import { locateExtractions, parseExtractions } from "@/lib/extraction/parser";
import { buildExtractionPrompt } from "@/lib/extraction/prompt";
import type { LanguageModel } from "@/lib/llm/base";
import { logger } from "@/lib/logger";
import { buildSchemaConstraint } from "@/lib/schema/builder";
import type {
  ExampleAnnotation,
  Extraction,
  ExtractionResult,
  InferenceParams,
} from "@/lib/types";
import { mapWithConcurrency } from "@/lib/utils/concurrency";
import { documentIdFor } from "@/lib/utils/hash";

export interface ExtractionRequest {
  text: string;
  promptDescription: string;
  examples: readonly ExampleAnnotation[];
  /** Number of independent model calls whose results are merged. */
  extractionPasses?: number;
  documentId?: string;
  /**
   * Attach a schema inferred from `examples`; `false` detaches any schema on the model.
   * Either way the model keeps this schema after the call: one attached earlier, for
   * example by `createModel({ examples })`, is replaced and not restored.
   */
  useSchema?: boolean;
  params?: InferenceParams;
}

export interface InputDocument {
  text: string;
  documentId?: string;
}

export interface DocumentBatchOptions extends Omit<ExtractionRequest, "text" | "documentId"> {
  model: LanguageModel;
  maxConcurrency?: number;
  signal?: AbortSignal;
}

export type DocumentOutcome =
  | { status: "success"; result: ExtractionResult }
  | { status: "error"; documentId: string; error: AppError };

export interface ExtractionSummary {
  totalDocuments: number;
  succeeded: number;
  failed: number;
  successRate: number;
  totalExtractions: number;
  extractionsByClass: Record<string, number>;
}

const log = logger.child({ module: "extraction" });

function mergePasses(passes: Extraction[][]): Extraction[] {
  const seen = new Set<string>();
  const merged: Extraction[] = [];

  for (const pass of passes) {
    for (const extraction of pass) {
      const key = `${extraction.extractionClass}\u0000${extraction.extractionText}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      merged.push(extraction);
    }
  }

  return merged;
}

export async function extract(
  request: ExtractionRequest,
  deps: { model: LanguageModel },
): Promise<ExtractionResult> {
  const passes = request.extractionPasses ?? 1;
  if (!Number.isInteger(passes) || passes < 1) {
    throw new AppError({
      code: "BAD_REQUEST",
      message: `extractionPasses must be a positive integer, got ${passes}`,
      status: 400,
    });
  }

  const documentId = request.documentId ?? documentIdFor(request.text);
  deps.model.applySchema(request.useSchema === false ? null : buildSchemaConstraint(request.examples));

  const prompt = buildExtractionPrompt(request.promptDescription, request.examples, request.text);
  const outcomes = await deps.model.inferAsync(
    Array.from({ length: passes }, () => prompt),
    request.params,
  );

  const parsedPasses: Extraction[][] = [];
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      throw outcome.error;
    }
    parsedPasses.push(parseExtractions(outcome.outputs[0]?.output ?? ""));
  }

  return {
    documentId,
    extractions: locateExtractions(request.text, mergePasses(parsedPasses)),
  };
}

/**
 * Extracts from many documents behind a fixed concurrency budget. Each document reports
 * its own outcome, in input order.
 */
export async function extractDocuments(
  documents: readonly InputDocument[],
  options: DocumentBatchOptions,
): Promise<DocumentOutcome[]> {
  const { model, maxConcurrency = env.EXTRACT_MAX_CONCURRENCY, signal, ...shared } = options;
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new AppError({
      code: "BAD_REQUEST",
      message: `maxConcurrency must be a positive integer, got ${maxConcurrency}`,
      status: 400,
    });
  }

  const settled = await mapWithConcurrency(
    documents,
    maxConcurrency,
    (document) => extract({ ...shared, text: document.text, documentId: document.documentId }, { model }),
    signal,
  );

  return settled.map((entry, index): DocumentOutcome => {
    if (entry.status === "fulfilled") {
      return { status: "success", result: entry.value };
    }

    const documentId = documents[index].documentId ?? documentIdFor(documents[index].text);
    const error = toAppError(entry.reason, "Extraction failed");
    log.warn({ documentId, code: error.code, reason: error.message }, "document extraction failed");
    return { status: "error", documentId, error };
  });
}

export function summarizeResults(outcomes: readonly DocumentOutcome[]): ExtractionSummary {
  const extractionsByClass: Record<string, number> = {};
  let succeeded = 0;
  let totalExtractions = 0;

  for (const outcome of outcomes) {
    if (outcome.status !== "success") {
      continue;
    }
    succeeded += 1;
    for (const extraction of outcome.result.extractions) {
      totalExtractions += 1;
      extractionsByClass[extraction.extractionClass] =
        (extractionsByClass[extraction.extractionClass] ?? 0) + 1;
    }
  }

  const totalDocuments = outcomes.length;
  return {
    totalDocuments,
    succeeded,
    failed: totalDocuments - succeeded,
    successRate: totalDocuments > 0 ? Math.round((succeeded / totalDocuments) * 10000) / 100 : 0,
    totalExtractions,
    extractionsByClass,
  };
}
