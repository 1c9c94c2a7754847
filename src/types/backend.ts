/**
 * Backend Token Source contract.
 *
 * A backend renders nothing itself: it receives an already-templated prompt and
 * yields a lazy, finite, non-restartable sequence of increments. Cancellation is
 * cooperative through the AbortSignal passed to `generate`.
 */

import type { ToolCallFormat } from "../parsers/toolcalls/ToolCallFormat.js";
import type { ChatTemplateName } from "../templates/chatTemplates.js";

export type BackendKind = "native" | "tensor";

export interface TokenAlternative {
  token: string;
  logprob: number;
  bytes: number[] | null;
}

export interface TokenLogprob extends TokenAlternative {
  topLogprobs: TokenAlternative[];
}

/** Measured by the engine itself; durations in milliseconds. */
export interface EngineTimings {
  promptTokens: number;
  promptMs: number;
  predictedTokens: number;
  predictedMs: number;
}

export interface TokenIncrement {
  text: string;
  isFinal: boolean;
  finishReason?: "stop" | "length";
  /** Tokens this increment stands for; defaults to 1 when `text` is non-empty. */
  tokenCount?: number;
  logprobs?: TokenLogprob[];
  /** Only on the final increment, when the engine reports them. */
  timings?: EngineTimings;
}

export interface SamplingParameters {
  temperature?: number;
  topP?: number;
  topK?: number;
  minP?: number;
  repetitionPenalty?: number;
  presencePenalty?: number;
  seed?: number;
}

/** Opaque reference to backend-side KV state for one (backend, model) pair. */
export interface BackendStateHandle {
  readonly backendId: string;
  readonly model: string;
  readonly slot: number | null;
}

export interface BackendGenerateParams {
  model: string;
  prompt: string;
  sampling: SamplingParameters;
  maxTokens: number;
  /** null when the caller did not ask for logprobs. */
  topLogprobs: number | null;
  state: BackendStateHandle;
}

export interface BackendModel {
  id: string;
  modelType: string | null;
}

export interface BackendCapabilities {
  logprobs: boolean;
}

export interface GenerationBackend {
  readonly id: string;
  readonly kind: BackendKind;
  readonly model: string;
  readonly aliases: readonly string[];
  readonly template: ChatTemplateName;
  readonly modelType: string | null;
  readonly toolCallParser: ToolCallFormat | null;
  readonly contextLength: number;
  readonly capabilities: BackendCapabilities;

  listModels(): Promise<BackendModel[]>;
  health(): Promise<boolean>;
  tokenize(text: string): Promise<number[]>;
  allocateState(model: string): BackendStateHandle;
  invalidateState(handle: BackendStateHandle): Promise<void>;
  generate(params: BackendGenerateParams, signal: AbortSignal): AsyncIterable<TokenIncrement>;
}
