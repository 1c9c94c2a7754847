/**
 * Generation Service
 *
 * Prepares one run against a local backend: guided-output and tool prompt
 * injection, chat template rendering, tokenization, the prompt cache lease,
 * and finally the backend stream wrapped in a GenerationPipeline.
 */

import { GenerationPipeline } from "../handlers/stream/GenerationPipeline.js";
import { logger } from "../logging/index.js";
import { buildToolInstructions, createToolCallParser, resolveToolCallFormat } from "../parsers/toolcalls/index.js";
import { renderChatPrompt } from "../templates/chatTemplates.js";
import { RequestValidationError } from "../utils/errors.js";
import { extractErrorMessage } from "../utils/http/index.js";
import { appendSystemInstruction } from "../utils/promptUtils.js";

import type { GenerationRun, GenerationService, GuidedOutputService } from "./contracts.js";
import type { PrefixCacheLease, PromptPrefixCache } from "./promptCache/index.js";
import type { ReasoningConfig } from "../config.js";
import type { ToolCallFormat } from "../parsers/toolcalls/index.js";
import type { GenerationBackend } from "../types/backend.js";
import type { GenerationRequest, PipelineEvent } from "../types/generation.js";

export interface GenerationServiceOptions {
  cache: PromptPrefixCache;
  guidedOutput: GuidedOutputService;
  reasoning: ReasoningConfig;
  /** Global override; a backend's own `toolCallParser` wins over it. */
  toolCallParser: ToolCallFormat | null;
  maxToolCallBufferSize: number;
  /** Millisecond clock for response timings; defaults to Date.now. */
  clock?: () => number;
}

class PipelineRun implements GenerationRun {
  private closed = false;
  private consumed = false;

  constructor(
    readonly pipeline: GenerationPipeline,
    private readonly lease: PrefixCacheLease,
    private readonly backendId: string,
  ) {}

  async *events(): AsyncGenerator<PipelineEvent> {
    if (this.consumed) {
      throw new Error("GenerationRun.events() can only be consumed once");
    }
    this.consumed = true;

    try {
      yield* this.pipeline.run();
    } catch (error: unknown) {
      try {
        await this.lease.invalidate();
      } catch (invalidateError: unknown) {
        logger.warn(`[GENERATION] ${this.backendId}: could not invalidate cache entry: ${extractErrorMessage(invalidateError)}`);
      }
      throw error;
    } finally {
      this.close();
    }
  }

  close(): void {
    if (this.closed) { return; }
    this.closed = true;
    this.lease.release();
  }
}

export class GenerationServiceImpl implements GenerationService {
  constructor(private readonly options: GenerationServiceOptions) {}

  async start(
    request: GenerationRequest,
    backend: GenerationBackend,
    model: string,
    controller: AbortController,
  ): Promise<GenerationRun> {
    if (request.topLogprobs !== null && !backend.capabilities.logprobs) {
      throw new RequestValidationError(`logprobs are not supported by the ${backend.id} backend`, "logprobs");
    }

    const format = resolveToolCallFormat(backend.toolCallParser ?? this.options.toolCallParser, backend.modelType);
    const parser = createToolCallParser(format);
    const toolsActive = request.toolChoice !== "none" && request.tools.length > 0;

    const guided = this.options.guidedOutput.plan(request.messages, request.responseFormat);
    const messages = toolsActive
      ? appendSystemInstruction(guided.messages, buildToolInstructions(parser, request.tools, request.toolChoice))
      : guided.messages;

    const prompt = renderChatPrompt(backend.template, messages, { toolParser: parser });
    const promptTokens = await backend.tokenize(prompt);
    logger.debug(`[GENERATION] ${backend.id}/${model}: ${promptTokens.length} prompt tokens, tools=${toolsActive ? format : "off"}, guided=${guided.mode ?? "off"}`);

    const lease = await this.options.cache.acquire(backend, model, promptTokens);
    try {
      const source = backend.generate(
        {
          model,
          prompt,
          sampling: request.sampling,
          maxTokens: request.maxTokens,
          topLogprobs: request.topLogprobs,
          state: lease.handle,
        },
        controller.signal,
      );

      const pipeline = new GenerationPipeline({
        source,
        controller,
        reasoning: this.options.reasoning,
        stop: request.stop,
        toolDetection: toolsActive
          ? { parser, tools: request.tools, maxBufferSize: this.options.maxToolCallBufferSize }
          : null,
        guidedOutput: guided.mode === null ? null : this.options.guidedOutput,
        maxTokens: request.maxTokens,
        topLogprobs: request.topLogprobs,
        promptTokens: promptTokens.length,
        cachedTokens: lease.cachedTokens,
        clock: this.options.clock,
      });

      return new PipelineRun(pipeline, lease, backend.id);
    } catch (error: unknown) {
      lease.release();
      throw error;
    }
  }
}
