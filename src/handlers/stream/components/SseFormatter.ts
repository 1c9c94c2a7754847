/**
 * SseFormatter - Server-Sent Events framing for chat completion chunks.
 */

import { formatSSEChunk, SSE_DONE } from "../../../utils/http/index.js";

import type { OpenAIStreamChunk } from "../../../types/openai.js";

export class SseFormatter {
  formatChunk(chunk: OpenAIStreamChunk): string {
    return formatSSEChunk(chunk);
  }

  formatDone(): string {
    return SSE_DONE;
  }
}
