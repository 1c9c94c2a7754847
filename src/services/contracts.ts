/**
 * Service Layer Contracts
 *
 * Defines the interfaces between HTTP handlers and the generation services.
 * Handlers depend on these, never on concrete backends.
 */

import type { GenerationPipeline } from "../handlers/stream/GenerationPipeline.js";
import type { GenerationBackend } from "../types/backend.js";
import type { GenerationRequest, PipelineEvent } from "../types/generation.js";
import type { OpenAIMessage, OpenAIModel, OpenAIResponseFormat } from "../types/openai.js";

/**
 * Remote OpenAI-compatible server reachable in gateway mode.
 */
export interface RemoteBackend {
  name: string;
  baseUrl: string;
  apiKey?: string;
}

/**
 * Where a request is served. `responseModel` is echoed back to the client.
 */
export type RouteTarget =
  | { kind: "local"; backend: GenerationBackend; model: string; responseModel: string }
  | { kind: "remote"; remote: RemoteBackend; model: string };

export interface BackendHealth {
  id: string;
  kind: GenerationBackend["kind"] | "remote";
  healthy: boolean;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  backends: BackendHealth[];
}

/**
 * Router service - picks the backend for a request `model`
 */
export interface RouterService {
  resolve(model: string | null): Promise<RouteTarget>;
  listModels(): Promise<OpenAIModel[]>;
  health(): Promise<HealthReport>;
  readonly localBackends: readonly GenerationBackend[];
  readonly gatewayEnabled: boolean;
  /** First configured remote, the target of gateway pass-through. */
  readonly defaultRemote: RemoteBackend | null;
}

export interface GuidedOutputPlan {
  mode: "json_object" | "json_schema" | null;
  messages: OpenAIMessage[];
}

/**
 * Guided output service - response_format prompt injection and extraction
 */
export interface GuidedOutputService {
  plan(messages: readonly OpenAIMessage[], responseFormat: OpenAIResponseFormat | null): GuidedOutputPlan;
  extract(text: string): string;
}

/**
 * One prepared generation. `events()` may be iterated once; `close()`
 * releases the backend and is safe to call more than once.
 */
export interface GenerationRun {
  readonly pipeline: GenerationPipeline;
  events(): AsyncGenerator<PipelineEvent>;
  close(): void;
}

/**
 * Generation service - prompt rendering, cache lease and pipeline setup
 */
export interface GenerationService {
  start(
    request: GenerationRequest,
    backend: GenerationBackend,
    model: string,
    controller: AbortController,
  ): Promise<GenerationRun>;
}
