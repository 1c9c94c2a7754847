/**
 * Native engine backend, reached through an Ollama runtime.
 *
 * Prompts are sent with `raw: true` so Ollama applies no template of its own.
 * Ollama reports no logprobs and has no tokenizer endpoint, so prompt tokens
 * are estimated.
 */

import { Ollama } from "ollama";

import { logger } from "../../logging/index.js";

import { toBackendError } from "./backendErrors.js";
import { estimateTokens } from "./estimateTokens.js";

import type { LocalBackendConfig } from "../../config.js";
import type { ToolCallFormat } from "../../parsers/toolcalls/index.js";
import type { ChatTemplateName } from "../../templates/chatTemplates.js";
import type {
  BackendCapabilities,
  BackendGenerateParams,
  BackendModel,
  BackendStateHandle,
  EngineTimings,
  GenerationBackend,
  TokenIncrement,
} from "../../types/backend.js";
import type { GenerateRequest, Options } from "ollama";

/** Durations are in nanoseconds and come only with the final chunk. */
export interface OllamaGenerateChunk {
  response: string;
  done: boolean;
  done_reason?: string;
  prompt_eval_count?: number;
  prompt_eval_duration?: number;
  eval_count?: number;
  eval_duration?: number;
}

/** The slice of the `ollama` client this backend uses. */
export interface OllamaClient {
  generate(request: GenerateRequest & { stream: true }): Promise<AsyncIterable<OllamaGenerateChunk> & { abort(): void }>;
  list(): Promise<{ models: Array<{ name: string }> }>;
}

const NS_PER_MS = 1_000_000;

function toEngineTimings(part: OllamaGenerateChunk): EngineTimings | null {
  if (part.eval_count === undefined || part.eval_duration === undefined) {
    return null;
  }
  return {
    promptTokens: part.prompt_eval_count ?? 0,
    promptMs: (part.prompt_eval_duration ?? 0) / NS_PER_MS,
    predictedTokens: part.eval_count,
    predictedMs: part.eval_duration / NS_PER_MS,
  };
}

export interface OllamaBackendOptions {
  id?: string;
  client?: OllamaClient;
}

export class OllamaBackend implements GenerationBackend {
  readonly id: string;
  readonly kind = "native" as const;
  readonly model: string;
  readonly aliases: readonly string[];
  readonly template: ChatTemplateName;
  readonly modelType: string | null;
  readonly toolCallParser: ToolCallFormat | null;
  readonly contextLength: number;
  readonly capabilities: BackendCapabilities = { logprobs: false };
  private readonly client: OllamaClient;

  constructor(config: LocalBackendConfig, options: OllamaBackendOptions = {}) {
    this.id = options.id ?? "native";
    this.model = config.model;
    this.aliases = config.alias === null ? [] : [config.alias];
    this.template = config.template;
    this.modelType = config.modelType;
    this.toolCallParser = config.toolCallParser;
    this.contextLength = config.contextLength;
    this.client = options.client ?? new Ollama({ host: config.baseUrl });
  }

  listModels(): Promise<BackendModel[]> {
    return Promise.resolve([{ id: this.model, modelType: this.modelType }]);
  }

  async health(): Promise<boolean> {
    try {
      const { models } = await this.client.list();
      const installed = models.some((entry) => entry.name === this.model || entry.name === `${this.model}:latest`);
      if (!installed) {
        logger.warn(`[NATIVE BACKEND] Model ${this.model} is not installed in Ollama`);
      }
      return installed;
    } catch (error: unknown) {
      logger.debug(`[NATIVE BACKEND] Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  tokenize(text: string): Promise<number[]> {
    return Promise.resolve(estimateTokens(text));
  }

  allocateState(model: string): BackendStateHandle {
    return { backendId: this.id, model, slot: null };
  }

  invalidateState(handle: BackendStateHandle): Promise<void> {
    // Ollama reuses its own prompt prefix; dropping the handle is all there is to do.
    logger.debug(`[NATIVE BACKEND] Dropped state for ${handle.model}`);
    return Promise.resolve();
  }

  async *generate(params: BackendGenerateParams, signal: AbortSignal): AsyncGenerator<TokenIncrement> {
    if (signal.aborted) { return; }

    let stream: AsyncIterable<OllamaGenerateChunk> & { abort(): void };
    try {
      stream = await this.client.generate({
        model: params.model,
        prompt: params.prompt,
        raw: true,
        stream: true,
        options: this.buildOptions(params),
      });
    } catch (error: unknown) {
      throw await toBackendError(this.id, error);
    }

    const onAbort = (): void => stream.abort();
    signal.addEventListener("abort", onAbort, { once: true });

    let counted = 0;
    try {
      for await (const part of stream) {
        const increment: TokenIncrement = { text: part.response, isFinal: part.done };
        if (part.done) {
          increment.finishReason = part.done_reason === "length" ? "length" : "stop";
          if (part.eval_count !== undefined) {
            // Ollama's own count replaces the one-per-chunk estimate.
            increment.tokenCount = Math.max(0, part.eval_count - counted);
          }
          const timings = toEngineTimings(part);
          if (timings !== null) { increment.timings = timings; }
        } else if (part.response !== "") {
          counted += 1;
        }
        yield increment;
        if (part.done) { break; }
      }
    } catch (error: unknown) {
      if (signal.aborted) { return; }
      throw await toBackendError(this.id, error);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private buildOptions(params: BackendGenerateParams): Partial<Options> {
    const { sampling } = params;
    const options: Partial<Options> = {
      num_predict: params.maxTokens,
      num_ctx: this.contextLength,
    };
    if (sampling.temperature !== undefined) { options.temperature = sampling.temperature; }
    if (sampling.topP !== undefined) { options.top_p = sampling.topP; }
    if (sampling.topK !== undefined) { options.top_k = sampling.topK; }
    if (sampling.repetitionPenalty !== undefined) { options.repeat_penalty = sampling.repetitionPenalty; }
    if (sampling.presencePenalty !== undefined) { options.presence_penalty = sampling.presencePenalty; }
    if (sampling.seed !== undefined) { options.seed = sampling.seed; }
    return options;
  }
}
