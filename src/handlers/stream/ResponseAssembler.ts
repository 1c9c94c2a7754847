/**
 * ResponseAssembler - builds chat.completion objects and chat.completion.chunk
 * frames. All chunks of one response share its id, timestamp and fingerprint.
 */

import { generateId, getCurrentTimestamp } from "../../utils/ids.js";

import type { GenerationSummary } from "../../types/generation.js";
import type {
  FinishReason,
  GenerationTimings,
  OpenAIChoiceLogprobs,
  OpenAIResponse,
  OpenAIResponseMessage,
  OpenAIStreamChunk,
  OpenAIStreamDelta,
  OpenAITokenLogprob,
  OpenAIToolCall,
  OpenAIUsage,
} from "../../types/openai.js";

export interface ResponseIdentity {
  id: string;
  created: number;
  model: string;
  systemFingerprint: string;
}

function toChoiceLogprobs(records: OpenAITokenLogprob[] | null): OpenAIChoiceLogprobs | null {
  return records === null ? null : { content: records };
}

export class ResponseAssembler {
  readonly identity: ResponseIdentity;

  constructor(model: string, backendId: string) {
    this.identity = {
      id: generateId("chatcmpl-"),
      created: getCurrentTimestamp(),
      model,
      systemFingerprint: `fp_${backendId}`,
    };
  }

  completion(
    summary: GenerationSummary,
    usage: OpenAIUsage,
    logprobs: OpenAITokenLogprob[] | null,
    timings?: GenerationTimings,
  ): OpenAIResponse {
    const hasToolCalls = summary.toolCalls.length > 0;
    const message: OpenAIResponseMessage = {
      role: "assistant",
      content: hasToolCalls ? null : summary.content,
    };
    if (summary.reasoning !== "") {
      message.reasoning_content = summary.reasoning;
    }
    if (hasToolCalls) {
      message.tool_calls = summary.toolCalls;
    }

    const response: OpenAIResponse = {
      id: this.identity.id,
      object: "chat.completion",
      created: this.identity.created,
      model: this.identity.model,
      system_fingerprint: this.identity.systemFingerprint,
      choices: [
        {
          index: 0,
          message,
          finish_reason: summary.finishReason,
          logprobs: toChoiceLogprobs(logprobs),
        },
      ],
      usage,
    };
    if (timings !== undefined) {
      response.timings = timings;
    }
    return response;
  }

  roleChunk(): OpenAIStreamChunk {
    return this.chunk({ role: "assistant", content: "" }, null, null);
  }

  /** @param logprobs records since the previous content chunk; null when logprobs are off */
  contentChunk(text: string, logprobs: OpenAITokenLogprob[] | null): OpenAIStreamChunk {
    return this.chunk({ content: text }, null, toChoiceLogprobs(logprobs));
  }

  reasoningChunk(text: string): OpenAIStreamChunk {
    return this.chunk({ reasoning_content: text }, null, null);
  }

  toolCallChunk(index: number, call: OpenAIToolCall): OpenAIStreamChunk {
    return this.chunk({ tool_calls: [{ index, ...call }] }, null, null);
  }

  finalChunk(
    finishReason: FinishReason,
    usage?: OpenAIUsage,
    logprobs?: OpenAITokenLogprob[] | null,
    timings?: GenerationTimings,
  ): OpenAIStreamChunk {
    const leftovers = logprobs !== undefined && logprobs !== null && logprobs.length > 0 ? logprobs : null;
    const chunk = this.chunk({}, finishReason, toChoiceLogprobs(leftovers));
    if (usage !== undefined) {
      chunk.usage = usage;
    }
    if (timings !== undefined) {
      chunk.timings = timings;
    }
    return chunk;
  }

  private chunk(
    delta: OpenAIStreamDelta,
    finishReason: FinishReason | null,
    logprobs: OpenAIChoiceLogprobs | null,
  ): OpenAIStreamChunk {
    return {
      id: this.identity.id,
      object: "chat.completion.chunk",
      created: this.identity.created,
      model: this.identity.model,
      system_fingerprint: this.identity.systemFingerprint,
      choices: [{ index: 0, delta, finish_reason: finishReason, logprobs }],
    };
  }
}
