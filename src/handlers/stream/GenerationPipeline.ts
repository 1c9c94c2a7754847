/**
 * GenerationPipeline - the per-request stage chain.
 *
 *   backend increments → ReasoningSplitter → StopSequenceMatcher (content only)
 *     → ToolCallDetector → guided-output buffer → PipelineEvent
 *
 * The streaming and non-streaming handlers both drain `run()`; the only thing
 * that differs between them is how the events are serialized.
 */

import { logger } from "../../logging/index.js";

import {
  ReasoningSplitter,
  StateTracker,
  StopSequenceMatcher,
  ToolCallDetector,
  UsageAccumulator,
} from "./components/index.js";

import type { DetectorOutput, ReasoningSplitterOptions, ToolCallDetectorOptions } from "./components/index.js";
import type { TokenIncrement } from "../../types/backend.js";
import type { ChannelSegment, GenerationSummary, PipelineEvent } from "../../types/generation.js";

export interface GuidedExtractor {
  extract(text: string): string;
}

export interface GenerationPipelineOptions {
  source: AsyncIterable<TokenIncrement>;
  controller: AbortController;
  reasoning: ReasoningSplitterOptions;
  stop: readonly string[];
  /** null bypasses tool-call detection entirely. */
  toolDetection: ToolCallDetectorOptions | null;
  /** Set when a response_format asks for JSON; content is then released once at the end. */
  guidedOutput: GuidedExtractor | null;
  maxTokens: number;
  topLogprobs: number | null;
  promptTokens: number;
  cachedTokens: number;
  /** Millisecond clock for timings; defaults to Date.now. */
  clock?: () => number;
}

export class GenerationPipeline {
  readonly usage: UsageAccumulator;
  readonly state: StateTracker;
  private readonly splitter: ReasoningSplitter;
  private readonly matcher: StopSequenceMatcher;
  private readonly detector: ToolCallDetector | null;
  private guidedBuffer = "";
  private started = false;

  constructor(private readonly options: GenerationPipelineOptions) {
    this.usage = new UsageAccumulator(options.topLogprobs, options.clock);
    this.usage.setPrompt(options.promptTokens, options.cachedTokens);
    this.state = new StateTracker(options.maxTokens);
    this.splitter = new ReasoningSplitter(options.reasoning);
    this.matcher = new StopSequenceMatcher(options.stop);
    this.detector = options.toolDetection === null ? null : new ToolCallDetector(options.toolDetection);
  }

  async *run(): AsyncGenerator<PipelineEvent> {
    if (this.started) {
      throw new Error("GenerationPipeline.run() can only be consumed once");
    }
    this.started = true;

    const { source, controller } = this.options;

    for await (const increment of source) {
      if (controller.signal.aborted) {
        // Client gone or generation timeout: end as if the budget ran out.
        logger.debug("[PIPELINE] Aborted between increments");
        this.state.markBackendFinish("length");
        break;
      }

      this.usage.recordIncrement(increment);
      yield* this.route(this.splitter.push(increment.text));

      if (this.matcher.hasStopped) {
        this.state.markStopMatched();
        controller.abort();
        break;
      }
      if (increment.isFinal) {
        this.state.markBackendFinish(increment.finishReason ?? "stop");
        break;
      }
    }

    if (controller.signal.aborted && !this.matcher.hasStopped && this.state.getState().backendFinish === null) {
      // Backends return quietly once the signal fires.
      this.state.markBackendFinish("length");
    }
    this.usage.markFinished();

    yield* this.finish();
  }

  summary(): GenerationSummary {
    const state = this.state.getState();
    return {
      content: state.content,
      reasoning: state.reasoning,
      toolCalls: state.toolCalls,
      finishReason: this.state.finishReason(this.usage.completion),
    };
  }

  private *finish(): Generator<PipelineEvent> {
    yield* this.route(this.splitter.flush());

    if (!this.matcher.hasStopped) {
      const tail = this.matcher.flush();
      if (tail.stopped) {
        this.usage.dropTrailingLogprobs(tail.dropped ?? 0);
      }
      yield* this.deliver(tail.text);
    }
    if (this.matcher.hasStopped) {
      this.state.markStopMatched();
    }

    if (this.detector !== null) {
      yield* this.handleDetectorOutputs(this.detector.flush());
    }

    const { guidedOutput } = this.options;
    if (guidedOutput !== null && this.guidedBuffer !== "" && this.state.getState().toolCalls.length === 0) {
      const extracted = guidedOutput.extract(this.guidedBuffer);
      this.guidedBuffer = "";
      this.state.appendContent(extracted);
      yield { type: "content", text: extracted };
    }
  }

  private *route(segments: readonly ChannelSegment[]): Generator<PipelineEvent> {
    for (const [position, segment] of segments.entries()) {
      if (this.matcher.hasStopped) {
        return;
      }
      this.state.setChannel(segment.channel);
      if (segment.channel === "reasoning") {
        this.state.appendReasoning(segment.text);
        yield { type: "reasoning", text: segment.text };
        continue;
      }
      const result = this.matcher.push(segment.text);
      if (result.stopped) {
        // Records for cut text must go before the released part reaches a chunk.
        const skipped = segments.slice(position + 1).reduce((sum, rest) => sum + rest.text.length, 0);
        this.usage.dropTrailingLogprobs((result.dropped ?? 0) + skipped);
      }
      yield* this.deliver(result.text);
    }
  }

  /** Content that cleared the stop matcher. */
  private *deliver(text: string): Generator<PipelineEvent> {
    if (text === "") {
      return;
    }
    if (this.detector === null) {
      yield* this.emitContent(text);
      return;
    }
    yield* this.handleDetectorOutputs(this.detector.push(text));
  }

  private *handleDetectorOutputs(outputs: readonly DetectorOutput[]): Generator<PipelineEvent> {
    for (const output of outputs) {
      if (output.kind === "text") {
        yield* this.emitContent(output.text);
      } else {
        const index = this.state.addToolCall(output.call);
        yield { type: "tool_call", index, call: output.call };
      }
    }
  }

  private *emitContent(text: string): Generator<PipelineEvent> {
    if (this.options.guidedOutput !== null) {
      this.guidedBuffer += text;
      return;
    }
    this.state.appendContent(text);
    yield { type: "content", text };
  }
}
