/**
 * OpenAI Chat Completions wire types.
 *
 * Request types describe what clients may send (validated in payloadHandler);
 * response types describe what the pipeline emits.
 */

// ============================================================
// REQUEST TYPES
// ============================================================

export interface OpenAIFunction {
  name: string;
  description?: string;
  parameters?: JsonSchemaObject;
}

export interface OpenAITool {
  type: "function";
  function: OpenAIFunction;
}

export interface JsonSchemaObject {
  type?: string | string[];
  properties?: Record<string, JsonSchemaObject>;
  required?: string[];
  items?: JsonSchemaObject;
  description?: string;
  enum?: unknown[];
  [key: string]: unknown;
}

export interface OpenAIContentPart {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export type OpenAIMessageContent = string | null | OpenAIContentPart[];

export type OpenAIRole = "system" | "developer" | "user" | "assistant" | "tool";

export interface OpenAIMessage {
  role: OpenAIRole;
  content: OpenAIMessageContent;
  name?: string;
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
}

export type OpenAIToolChoice =
  | "none"
  | "auto"
  | "required"
  | { type: "function"; function: { name: string } };

export interface JsonSchemaFormat {
  name?: string;
  description?: string;
  schema?: Record<string, unknown>;
  strict?: boolean;
}

export type OpenAIResponseFormat =
  | { type: "text" }
  | { type: "json_object" }
  | { type: "json_schema"; json_schema: JsonSchemaFormat };

export interface OpenAIRequest {
  model?: string;
  messages: OpenAIMessage[];
  tools?: OpenAITool[];
  tool_choice?: OpenAIToolChoice;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  min_p?: number;
  repetition_penalty?: number;
  repeat_penalty?: number;
  presence_penalty?: number;
  seed?: number;
  max_tokens?: number;
  max_completion_tokens?: number;
  stream?: boolean;
  stream_options?: { include_usage?: boolean };
  stop?: string | string[];
  response_format?: OpenAIResponseFormat;
  logprobs?: boolean;
  top_logprobs?: number;
  [key: string]: unknown;
}

// ============================================================
// RESPONSE TYPES
// ============================================================

export interface OpenAIToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export interface OpenAIStreamToolCall extends OpenAIToolCall {
  index: number;
}

export interface OpenAITopLogprob {
  token: string;
  logprob: number;
  bytes: number[] | null;
}

export interface OpenAITokenLogprob extends OpenAITopLogprob {
  top_logprobs: OpenAITopLogprob[];
}

export interface OpenAIChoiceLogprobs {
  content: OpenAITokenLogprob[];
}

export interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  prompt_tokens_details: {
    cached_tokens: number;
  };
}

/** llama.cpp-style `timings` block; durations in milliseconds. */
export interface GenerationTimings {
  prompt_n: number;
  prompt_ms: number;
  predicted_n: number;
  predicted_ms: number;
}

export type FinishReason = "stop" | "length" | "tool_calls";

export interface OpenAIResponseMessage {
  role: "assistant";
  content: string | null;
  reasoning_content?: string;
  tool_calls?: OpenAIToolCall[];
}

export interface OpenAIChoice {
  index: number;
  message: OpenAIResponseMessage;
  finish_reason: FinishReason;
  logprobs: OpenAIChoiceLogprobs | null;
}

export interface OpenAIResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  system_fingerprint: string;
  choices: OpenAIChoice[];
  usage: OpenAIUsage;
  timings?: GenerationTimings;
}

export interface OpenAIStreamDelta {
  role?: "assistant";
  content?: string;
  reasoning_content?: string;
  tool_calls?: OpenAIStreamToolCall[];
}

export interface OpenAIStreamChoice {
  index: number;
  delta: OpenAIStreamDelta;
  finish_reason: FinishReason | null;
  logprobs: OpenAIChoiceLogprobs | null;
}

export interface OpenAIStreamChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  system_fingerprint: string;
  choices: OpenAIStreamChoice[];
  usage?: OpenAIUsage;
  timings?: GenerationTimings;
}

export interface OpenAIModel {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
}

export interface OpenAIModelsListResponse {
  object: "list";
  data: OpenAIModel[];
}

export interface OpenAIErrorBody {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}
