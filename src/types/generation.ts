import type { SamplingParameters } from "./backend.js";
import type {
  FinishReason,
  OpenAIMessage,
  OpenAIResponseFormat,
  OpenAITool,
  OpenAIToolCall,
  OpenAIToolChoice,
} from "./openai.js";

/** Validated, merged request handed to the pipeline. Never mutated after construction. */
export interface GenerationRequest {
  readonly model: string | null;
  readonly messages: readonly OpenAIMessage[];
  readonly sampling: Readonly<SamplingParameters>;
  readonly stop: readonly string[];
  readonly maxTokens: number;
  readonly tools: readonly OpenAITool[];
  readonly toolChoice: OpenAIToolChoice;
  readonly responseFormat: OpenAIResponseFormat | null;
  readonly stream: boolean;
  readonly includeUsage: boolean;
  /** null when logprobs were not requested. */
  readonly topLogprobs: number | null;
}

export type Channel = "reasoning" | "content";

export interface ChannelSegment {
  channel: Channel;
  text: string;
}

export type PipelineEvent =
  | { type: "reasoning"; text: string }
  | { type: "content"; text: string }
  | { type: "tool_call"; index: number; call: OpenAIToolCall };

export interface GenerationSummary {
  content: string;
  reasoning: string;
  toolCalls: OpenAIToolCall[];
  finishReason: FinishReason;
}
