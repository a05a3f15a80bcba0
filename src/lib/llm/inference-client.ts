import http from "node:http";
import https from "node:https";

import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import { InferenceRuntimeError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { chatCompletionResponseSchema } from "@/lib/schemas";
import type { InferenceOutcome, InferenceParams, ScoredOutput } from "@/lib/types";

export interface InferenceClientOptions {
  modelId: string;
  apiKey: string;
  baseURL: string;
  temperature: number;
  timeoutMs: number;
  rejectUnauthorized: boolean;
  ca?: Buffer;
}

export interface CompletionOptions {
  jsonMode: boolean;
  signal?: AbortSignal;
}

const log = logger.child({ module: "inference-client" });

export function buildChatPayload(
  modelId: string,
  prompt: string,
  params: InferenceParams,
  defaultTemperature: number,
  jsonMode: boolean,
): ChatCompletionCreateParamsNonStreaming {
  return {
    model: modelId,
    messages: [{ role: "user", content: prompt }],
    temperature: params.temperature ?? defaultTemperature,
    ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
    ...(params.topP !== undefined ? { top_p: params.topP } : {}),
    ...(params.frequencyPenalty !== undefined ? { frequency_penalty: params.frequencyPenalty } : {}),
    ...(params.presencePenalty !== undefined ? { presence_penalty: params.presencePenalty } : {}),
    ...(jsonMode ? { response_format: { type: "json_object" as const } } : {}),
  };
}

export function toInferenceRuntimeError(error: unknown, modelId: string): InferenceRuntimeError {
  if (error instanceof InferenceRuntimeError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);

  if (error instanceof APIConnectionTimeoutError) {
    return new InferenceRuntimeError(`Request to ${modelId} timed out`, {
      kind: "timeout",
      cause: error,
      details: { modelId, reason },
    });
  }

  if (error instanceof APIUserAbortError) {
    return new InferenceRuntimeError(`Request to ${modelId} was aborted`, {
      kind: "network",
      cause: error,
      details: { modelId, reason },
    });
  }

  if (error instanceof APIError && typeof error.status === "number") {
    return new InferenceRuntimeError(`${modelId} API error (${error.status}): ${reason}`, {
      kind: "http",
      upstreamStatus: error.status,
      cause: error,
      details: { modelId, reason },
    });
  }

  return new InferenceRuntimeError(`${modelId} request failed: ${reason}`, {
    kind: "network",
    cause: error,
    details: { modelId, reason },
  });
}

/**
 * One OpenAI-compatible chat completion transport. The underlying keep-alive agent is
 * created with the client and released by `close()`.
 */
export class InferenceClient {
  private readonly options: InferenceClientOptions;
  private agent: http.Agent | null;
  private readonly client: OpenAI;

  constructor(options: InferenceClientOptions) {
    this.options = options;
    const agent = options.baseURL.startsWith("http://")
      ? new http.Agent({ keepAlive: true })
      : new https.Agent({
          keepAlive: true,
          rejectUnauthorized: options.rejectUnauthorized,
          ...(options.ca ? { ca: options.ca } : {}),
        });
    this.agent = agent;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
      httpAgent: agent,
    });
    log.debug({ modelId: options.modelId, baseURL: options.baseURL }, "transport created");
  }

  get closed(): boolean {
    return this.agent === null;
  }

  async complete(
    prompt: string,
    params: InferenceParams,
    options: CompletionOptions,
  ): Promise<ScoredOutput[]> {
    if (this.closed) {
      throw new InferenceRuntimeError("Inference client is closed", {
        kind: "network",
        cause: new Error(`Transport for ${this.options.modelId} was released by close()`),
        details: { modelId: this.options.modelId },
      });
    }

    const payload = buildChatPayload(
      this.options.modelId,
      prompt,
      params,
      this.options.temperature,
      options.jsonMode,
    );

    let response: unknown;
    try {
      response = await this.client.chat.completions.create(
        payload,
        options.signal ? { signal: options.signal } : undefined,
      );
    } catch (error) {
      throw toInferenceRuntimeError(error, this.options.modelId);
    }

    const parsed = chatCompletionResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new InferenceRuntimeError(`${this.options.modelId} returned a malformed response body`, {
        kind: "malformed_response",
        cause: parsed.error,
        details: { modelId: this.options.modelId, issues: parsed.error.issues },
      });
    }

    return [{ score: 1.0, output: parsed.data.choices[0].message.content }];
  }

  close(): void {
    const agent = this.agent;
    if (!agent) {
      return;
    }

    this.agent = null;
    agent.destroy();
    log.debug({ modelId: this.options.modelId }, "transport closed");
  }
}

function abortedBeforeDispatch(modelId: string, signal: AbortSignal): InferenceRuntimeError {
  return new InferenceRuntimeError(`Request to ${modelId} was cancelled before dispatch`, {
    kind: "network",
    cause: signal.reason,
    details: { modelId },
  });
}

/**
 * Sends every prompt concurrently and reports one outcome per prompt, in prompt order.
 * A failed prompt never discards its siblings.
 */
export async function runBatch(
  client: InferenceClient,
  modelId: string,
  prompts: readonly string[],
  params: InferenceParams,
  options: CompletionOptions,
): Promise<InferenceOutcome[]> {
  const outcomes = await Promise.all(
    prompts.map(async (prompt, index): Promise<InferenceOutcome> => {
      if (options.signal?.aborted) {
        return { ok: false, error: abortedBeforeDispatch(modelId, options.signal) };
      }

      try {
        const outputs = await client.complete(prompt, params, { jsonMode: options.jsonMode });
        return { ok: true, outputs };
      } catch (error) {
        const runtimeError = toInferenceRuntimeError(error, modelId);
        log.warn(
          {
            modelId,
            index,
            kind: runtimeError.kind,
            status: runtimeError.upstreamStatus,
            transient: runtimeError.transient,
          },
          "inference request failed",
        );
        return { ok: false, error: runtimeError };
      }
    }),
  );

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  log.info({ modelId, total: outcomes.length, failed }, "batch complete");
  return outcomes;
}
