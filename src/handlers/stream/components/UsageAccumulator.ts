/**
 * UsageAccumulator - token accounting, per-token logprob records and timings.
 *
 * Completion tokens cover both channels, so reasoning spends the same budget
 * as visible content. Timings come from the engine when its final increment
 * carries them and from the wall clock otherwise.
 */

import type { EngineTimings, TokenIncrement, TokenLogprob } from "../../../types/backend.js";
import type { GenerationTimings, OpenAITokenLogprob, OpenAIUsage } from "../../../types/openai.js";

export class UsageAccumulator {
  private promptTokens = 0;
  private cachedTokens = 0;
  private completionTokens = 0;
  private readonly records: OpenAITokenLogprob[] = [];
  private emittedRecords = 0;
  private readonly startedAt: number;
  private firstTokenAt: number | null = null;
  private finishedAt: number | null = null;
  private engineTimings: EngineTimings | null = null;

  /** @param topLogprobs requested alternatives per token; null disables logprobs */
  constructor(
    private readonly topLogprobs: number | null,
    private readonly clock: () => number = Date.now,
  ) {
    this.startedAt = clock();
  }

  get completion(): number {
    return this.completionTokens;
  }

  setPrompt(promptTokens: number, cachedTokens: number): void {
    this.promptTokens = promptTokens;
    this.cachedTokens = Math.min(cachedTokens, promptTokens);
  }

  recordIncrement(increment: TokenIncrement): void {
    this.completionTokens += increment.tokenCount ?? (increment.text === "" ? 0 : 1);
    if (this.firstTokenAt === null && increment.text !== "") {
      this.firstTokenAt = this.clock();
    }
    if (increment.timings !== undefined) {
      this.engineTimings = increment.timings;
    }

    if (this.topLogprobs === null || increment.logprobs === undefined) {
      return;
    }
    for (const entry of increment.logprobs) {
      this.records.push(this.toRecord(entry, this.topLogprobs));
    }
  }

  /** Records produced since the previous call. */
  takePendingLogprobs(): OpenAITokenLogprob[] {
    const pending = this.records.slice(this.emittedRecords);
    this.emittedRecords = this.records.length;
    return pending;
  }

  /**
   * Drops unreleased records whose tokens lie wholly inside the last
   * `characters` of output. A token that straddles the cut is kept.
   */
  dropTrailingLogprobs(characters: number): void {
    let remaining = characters;
    while (this.records.length > this.emittedRecords) {
      const last = this.records[this.records.length - 1];
      if (last === undefined || last.token.length > remaining) {
        break;
      }
      remaining -= last.token.length;
      this.records.pop();
    }
  }

  allLogprobs(): OpenAITokenLogprob[] | null {
    return this.topLogprobs === null ? null : [...this.records];
  }

  get logprobsEnabled(): boolean {
    return this.topLogprobs !== null;
  }

  /** Stops the wall clock; later calls keep the first mark. */
  markFinished(): void {
    if (this.finishedAt === null) {
      this.finishedAt = this.clock();
    }
  }

  toTimings(): GenerationTimings {
    if (this.engineTimings !== null) {
      const engine = this.engineTimings;
      return {
        prompt_n: engine.promptTokens,
        prompt_ms: engine.promptMs,
        predicted_n: engine.predictedTokens,
        predicted_ms: engine.predictedMs,
      };
    }
    const end = this.finishedAt ?? this.clock();
    const firstToken = this.firstTokenAt ?? end;
    return {
      prompt_n: this.promptTokens - this.cachedTokens,
      prompt_ms: firstToken - this.startedAt,
      predicted_n: this.completionTokens,
      predicted_ms: end - firstToken,
    };
  }

  toUsage(): OpenAIUsage {
    return {
      prompt_tokens: this.promptTokens,
      completion_tokens: this.completionTokens,
      total_tokens: this.promptTokens + this.completionTokens,
      prompt_tokens_details: {
        cached_tokens: this.cachedTokens,
      },
    };
  }

  private toRecord(entry: TokenLogprob, top: number): OpenAITokenLogprob {
    return {
      token: entry.token,
      logprob: Math.min(0, entry.logprob),
      bytes: entry.bytes,
      top_logprobs: entry.topLogprobs.slice(0, top).map((alt) => ({
        token: alt.token,
        logprob: Math.min(0, alt.logprob),
        bytes: alt.bytes,
      })),
    };
  }
}
