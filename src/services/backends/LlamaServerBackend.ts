/**
 * Tensor engine backend: a llama.cpp `llama-server` process.
 *
 * Generation goes through the native `/completion` endpoint rather than the
 * OpenAI one, so the pipeline gets raw text and per-token probabilities and the
 * prompt is exactly what the chat template rendered.
 */

import axios, { type AxiosInstance } from "axios";

import { LLAMA_SERVER_ENDPOINTS } from "../../constants/endpoints.js";
import { logger } from "../../logging/index.js";
import { readSSEData } from "../../utils/http/index.js";
import { isRecord, readArray, readBoolean, readNumber, readString } from "../../utils/typeGuards.js";

import { toBackendError } from "./backendErrors.js";

import type { TensorBackendConfig } from "../../config.js";
import type { ToolCallFormat } from "../../parsers/toolcalls/index.js";
import type { ChatTemplateName } from "../../templates/chatTemplates.js";
import type {
  BackendCapabilities,
  BackendGenerateParams,
  BackendModel,
  BackendStateHandle,
  EngineTimings,
  GenerationBackend,
  TokenAlternative,
  TokenIncrement,
  TokenLogprob,
} from "../../types/backend.js";
import type { Readable } from "stream";

export interface LlamaServerBackendOptions {
  id?: string;
  connectionTimeout?: number;
  /** Injected in tests; defaults to an axios instance bound to `baseUrl`. */
  http?: AxiosInstance;
}

function toBytes(value: unknown): number[] | null {
  return Array.isArray(value) && value.every((byte): byte is number => typeof byte === "number") ? value : null;
}

/** Reads one candidate in either the current (`logprob`) or legacy (`prob`) shape. */
function toAlternative(entry: unknown): TokenAlternative | null {
  if (!isRecord(entry)) { return null; }
  const token = readString(entry, "token") ?? readString(entry, "tok_str");
  if (token === undefined) { return null; }
  const logprob = readNumber(entry, "logprob");
  const prob = readNumber(entry, "prob");
  let value: number;
  if (logprob !== undefined) {
    value = logprob;
  } else if (prob !== undefined) {
    value = prob > 0 ? Math.log(prob) : Number.NEGATIVE_INFINITY;
  } else {
    return null;
  }
  return {
    token,
    logprob: Math.max(value, -9999),
    bytes: toBytes(entry["bytes"]) ?? [...Buffer.from(token, "utf8")],
  };
}

function toTokenLogprob(entry: unknown, fallbackToken: string): TokenLogprob | null {
  if (!isRecord(entry)) { return null; }
  const alternatives = (readArray(entry, "top_logprobs") ?? readArray(entry, "probs") ?? [])
    .map(toAlternative)
    .filter((alt): alt is TokenAlternative => alt !== null);

  const chosen = toAlternative(entry)
    ?? alternatives.find((alt) => alt.token === (readString(entry, "content") ?? fallbackToken))
    ?? null;
  if (chosen === null) { return null; }
  return { ...chosen, topLogprobs: alternatives };
}

function toEngineTimings(value: unknown): EngineTimings | null {
  if (!isRecord(value)) { return null; }
  const predictedTokens = readNumber(value, "predicted_n");
  const predictedMs = readNumber(value, "predicted_ms");
  if (predictedTokens === undefined || predictedMs === undefined) { return null; }
  return {
    promptTokens: readNumber(value, "prompt_n") ?? 0,
    promptMs: readNumber(value, "prompt_ms") ?? 0,
    predictedTokens,
    predictedMs,
  };
}

export class LlamaServerBackend implements GenerationBackend {
  readonly id: string;
  readonly kind = "tensor" as const;
  readonly model: string;
  readonly aliases: readonly string[];
  readonly template: ChatTemplateName;
  readonly modelType: string | null;
  readonly toolCallParser: ToolCallFormat | null;
  readonly contextLength: number;
  readonly capabilities: BackendCapabilities = { logprobs: true };
  private readonly slot: number;
  private readonly http: AxiosInstance;

  constructor(config: TensorBackendConfig, options: LlamaServerBackendOptions = {}) {
    this.id = options.id ?? "tensor";
    this.model = config.model;
    this.aliases = config.alias === null ? [] : [config.alias];
    this.template = config.template;
    this.modelType = config.modelType;
    this.toolCallParser = config.toolCallParser;
    this.contextLength = config.contextLength;
    this.slot = config.slot;
    this.http = options.http ?? axios.create({
      baseURL: config.baseUrl,
      timeout: options.connectionTimeout ?? 0,
    });
  }

  listModels(): Promise<BackendModel[]> {
    return Promise.resolve([{ id: this.model, modelType: this.modelType }]);
  }

  async health(): Promise<boolean> {
    try {
      const response = await this.http.get(LLAMA_SERVER_ENDPOINTS.HEALTH);
      return response.status === 200;
    } catch (error: unknown) {
      logger.debug(`[TENSOR BACKEND] Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async tokenize(text: string): Promise<number[]> {
    try {
      const response = await this.http.post<unknown>(LLAMA_SERVER_ENDPOINTS.TOKENIZE, { content: text, add_special: false });
      const tokens = isRecord(response.data) ? readArray(response.data, "tokens") : undefined;
      if (tokens === undefined) {
        throw new Error("tokenize response has no tokens array");
      }
      return tokens.map((token) => {
        if (typeof token === "number") { return token; }
        if (isRecord(token)) { return readNumber(token, "id") ?? -1; }
        return -1;
      });
    } catch (error: unknown) {
      throw await toBackendError(this.id, error);
    }
  }

  allocateState(model: string): BackendStateHandle {
    return { backendId: this.id, model, slot: this.slot };
  }

  async invalidateState(handle: BackendStateHandle): Promise<void> {
    if (handle.slot === null) { return; }
    try {
      await this.http.post(LLAMA_SERVER_ENDPOINTS.SLOTS(handle.slot), null, { params: { action: "erase" } });
      logger.debug(`[TENSOR BACKEND] Erased slot ${handle.slot}`);
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response !== undefined) {
        // Slot management disabled on the server; cache_prompt still re-evaluates the prompt.
        logger.warn(`[TENSOR BACKEND] Slot erase returned ${error.response.status}; continuing`);
        return;
      }
      throw await toBackendError(this.id, error);
    }
  }

  async *generate(params: BackendGenerateParams, signal: AbortSignal): AsyncGenerator<TokenIncrement> {
    if (signal.aborted) { return; }

    const body = this.buildCompletionBody(params);
    logger.debug(`[TENSOR BACKEND] /completion n_predict=${params.maxTokens} prompt=${params.prompt.length} chars`);

    let stream: Readable;
    try {
      const response = await this.http.post<Readable>(LLAMA_SERVER_ENDPOINTS.COMPLETION, body, { responseType: "stream", signal });
      stream = response.data;
    } catch (error: unknown) {
      if (signal.aborted) { return; }
      throw await toBackendError(this.id, error);
    }

    let counted = 0;
    try {
      for await (const payload of readSSEData(stream)) {
        if (payload === "[DONE]") { break; }
        const increment = this.toIncrement(payload, counted);
        if (increment === null) { continue; }
        counted += increment.tokenCount ?? 0;
        yield increment;
        if (increment.isFinal) { break; }
      }
    } catch (error: unknown) {
      if (signal.aborted) { return; }
      throw await toBackendError(this.id, error);
    } finally {
      stream.destroy();
    }
  }

  private buildCompletionBody(params: BackendGenerateParams): Record<string, unknown> {
    const { sampling } = params;
    const body: Record<string, unknown> = {
      prompt: params.prompt,
      stream: true,
      n_predict: params.maxTokens,
      cache_prompt: true,
    };
    if (params.state.slot !== null) { body["id_slot"] = params.state.slot; }
    if (sampling.temperature !== undefined) { body["temperature"] = sampling.temperature; }
    if (sampling.topP !== undefined) { body["top_p"] = sampling.topP; }
    if (sampling.topK !== undefined) { body["top_k"] = sampling.topK; }
    if (sampling.minP !== undefined) { body["min_p"] = sampling.minP; }
    if (sampling.repetitionPenalty !== undefined) { body["repeat_penalty"] = sampling.repetitionPenalty; }
    if (sampling.presencePenalty !== undefined) { body["presence_penalty"] = sampling.presencePenalty; }
    if (sampling.seed !== undefined) { body["seed"] = sampling.seed; }
    if (params.topLogprobs !== null) { body["n_probs"] = Math.max(1, params.topLogprobs); }
    return body;
  }

  private toIncrement(payload: string, countedSoFar: number): TokenIncrement | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      logger.warn(`[TENSOR BACKEND] Skipping unparseable stream line: ${payload.slice(0, 80)}`);
      return null;
    }
    if (!isRecord(parsed)) { return null; }

    const text = readString(parsed, "content") ?? "";
    const isFinal = readBoolean(parsed, "stop") === true;
    const probabilities = readArray(parsed, "completion_probabilities");

    const increment: TokenIncrement = { text, isFinal };

    if (probabilities !== undefined && probabilities.length > 0) {
      increment.logprobs = probabilities
        .map((entry) => toTokenLogprob(entry, text))
        .filter((entry): entry is TokenLogprob => entry !== null);
      increment.tokenCount = probabilities.length;
    } else {
      increment.tokenCount = text === "" ? 0 : 1;
    }

    if (isFinal) {
      const predicted = readNumber(parsed, "tokens_predicted");
      if (predicted !== undefined && text === "") {
        increment.tokenCount = Math.max(0, predicted - countedSoFar);
      }
      const limited = readString(parsed, "stop_type") === "limit" || readBoolean(parsed, "stopped_limit") === true;
      increment.finishReason = limited ? "length" : "stop";
      const timings = toEngineTimings(parsed["timings"]);
      if (timings !== null) { increment.timings = timings; }
    }
    return increment;
  }
}
