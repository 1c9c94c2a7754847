import { logger } from "../logging/index.js";

import type { GenerationRun } from "../services/contracts.js";
import type { OpenAIResponse } from "../types/openai.js";
import type { ResponseAssembler } from "./stream/ResponseAssembler.js";

/**
 * Runs the pipeline to completion and assembles one `chat.completion`.
 * Errors propagate to the caller, which answers with a JSON error.
 */
export async function runNonStreamingCompletion(run: GenerationRun, assembler: ResponseAssembler): Promise<OpenAIResponse> {
  const { pipeline } = run;
  try {
    for await (const event of run.events()) {
      if (event.type === "tool_call") {
        logger.debug(`[NON-STREAMING] Tool call ${event.index}: ${event.call.function.name}`);
      }
    }
  } finally {
    run.close();
  }

  const { usage } = pipeline;
  return assembler.completion(pipeline.summary(), usage.toUsage(), usage.allLogprobs(), usage.toTimings());
}
