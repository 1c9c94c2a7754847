/**
 * API Endpoint Constants - SSOT for all API routes
 *
 * Every route path, served or called upstream, is defined here once.
 */

/**
 * OpenAI-compatible routes served by localrelay, also used when proxying to
 * remote backends.
 * https://platform.openai.com/docs/api-reference
 */
export const OPENAI_ENDPOINTS = {
  /** Chat completions endpoint */
  CHAT_COMPLETIONS: "/v1/chat/completions",

  /** List models */
  MODELS: "/v1/models",

  /** Get model info */
  MODEL_INFO: "/v1/models/:model",

  /** Prefix passed through to the default remote in gateway mode */
  PASSTHROUGH_PREFIX: "/v1",
} as const;

/**
 * llama.cpp server routes: called on the tensor engine, and `/props` is also
 * served here for llama.cpp webui compatibility.
 * https://github.com/ggml-org/llama.cpp/tree/master/tools/server
 */
export const LLAMA_SERVER_ENDPOINTS = {
  COMPLETION: "/completion",
  TOKENIZE: "/tokenize",
  HEALTH: "/health",
  PROPS: "/props",
  SLOTS: (slot: number) => `/slots/${slot}`,
} as const;

/**
 * Service endpoints
 */
export const SERVICE_ENDPOINTS = {
  ROOT: "/",
  HEALTH: "/health",
  PROPS: "/props",
} as const;
