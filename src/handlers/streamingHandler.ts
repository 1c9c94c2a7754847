/**
 * Streaming chat completions: drains the run's pipeline events into SSE
 * `chat.completion.chunk` frames, always ending with `data: [DONE]`.
 */

import { logger } from "../logging/index.js";
import { SSE_HEADERS, handleStreamingBackendError } from "../utils/http/index.js";

import { SseFormatter } from "./stream/components/index.js";

import type { GenerationRun } from "../services/contracts.js";
import type { OpenAIStreamChunk, OpenAITokenLogprob } from "../types/openai.js";
import type { StreamResponseWriter } from "../utils/http/index.js";
import type { ResponseAssembler } from "./stream/ResponseAssembler.js";

export interface StreamingOptions {
  includeUsage: boolean;
}

export async function handleStreamingCompletion(
  res: StreamResponseWriter,
  run: GenerationRun,
  assembler: ResponseAssembler,
  options: StreamingOptions,
): Promise<void> {
  const formatter = new SseFormatter();
  const { pipeline } = run;

  const send = (chunk: OpenAIStreamChunk): void => {
    if (res.writableEnded || res.destroyed) {
      return;
    }
    res.write(formatter.formatChunk(chunk));
    pipeline.state.recordChunk();
  };
  const pendingLogprobs = (): OpenAITokenLogprob[] | null =>
    pipeline.usage.logprobsEnabled ? pipeline.usage.takePendingLogprobs() : null;

  res.status(200);
  for (const [name, value] of Object.entries(SSE_HEADERS)) {
    res.setHeader(name, value);
  }
  res.flushHeaders();

  try {
    send(assembler.roleChunk());

    for await (const event of run.events()) {
      switch (event.type) {
        case "content":
          send(assembler.contentChunk(event.text, pendingLogprobs()));
          break;
        case "reasoning":
          send(assembler.reasoningChunk(event.text));
          break;
        case "tool_call":
          send(assembler.toolCallChunk(event.index, event.call));
          break;
      }
    }

    const summary = pipeline.summary();
    send(assembler.finalChunk(
      summary.finishReason,
      options.includeUsage ? pipeline.usage.toUsage() : undefined,
      pendingLogprobs(),
      pipeline.usage.toTimings(),
    ));

    if (!res.writableEnded && !res.destroyed) {
      res.write(formatter.formatDone());
      res.end();
    }
    logger.debug(`[STREAM] Completed: ${pipeline.state.getState().chunkCount} chunks, finish_reason=${summary.finishReason}`);
  } catch (error: unknown) {
    handleStreamingBackendError(res, error, "STREAM");
  } finally {
    run.close();
  }
}
