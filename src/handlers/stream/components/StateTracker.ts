/**
 * StateTracker - per-request generation state.
 *
 * Owns what the pipeline has accumulated so far and decides the finish
 * reason once the stream is over.
 */

import { logger } from "../../../logging/index.js";

import type { Channel } from "../../../types/generation.js";
import type { FinishReason, OpenAIToolCall } from "../../../types/openai.js";

export interface GenerationState {
  channel: Channel;
  content: string;
  reasoning: string;
  toolCalls: OpenAIToolCall[];
  stopMatched: boolean;
  backendFinish: "stop" | "length" | null;
  /** Chunks emitted so far, the role chunk included. */
  chunkCount: number;
}

export class StateTracker {
  private readonly state: GenerationState = {
    channel: "content",
    content: "",
    reasoning: "",
    toolCalls: [],
    stopMatched: false,
    backendFinish: null,
    chunkCount: 0,
  };

  constructor(private readonly maxTokens: number) {}

  setChannel(channel: Channel): void {
    this.state.channel = channel;
  }

  appendContent(text: string): void {
    this.state.content += text;
  }

  appendReasoning(text: string): void {
    this.state.reasoning += text;
  }

  /** Returns the index the call is streamed under. */
  addToolCall(call: OpenAIToolCall): number {
    this.state.toolCalls.push(call);
    logger.debug(`[STATE TRACKER] Tool call recorded: ${call.function.name}`);
    return this.state.toolCalls.length - 1;
  }

  markStopMatched(): void {
    this.state.stopMatched = true;
  }

  markBackendFinish(reason: "stop" | "length"): void {
    this.state.backendFinish = reason;
  }

  recordChunk(): void {
    this.state.chunkCount++;
  }

  finishReason(completionTokens: number): FinishReason {
    if (this.state.toolCalls.length > 0) {
      return "tool_calls";
    }
    if (this.state.stopMatched) {
      return "stop";
    }
    if (this.state.backendFinish === "length" || completionTokens >= this.maxTokens) {
      return "length";
    }
    return "stop";
  }

  getState(): Readonly<GenerationState> {
    return { ...this.state, toolCalls: [...this.state.toolCalls] };
  }
}
