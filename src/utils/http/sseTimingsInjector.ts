/**
 * Adds llama.cpp-style `timings` to the last data event of a relayed SSE
 * stream when the upstream sent none. Other lines pass through as received.
 *
 * The last data event is held back until the next one, `[DONE]` or the end of
 * the stream shows it was the last.
 */

import { Transform } from "stream";

import { logger } from "../../logging/index.js";
import { isRecord, readNumber } from "../typeGuards.js";

import type { GenerationTimings } from "../../types/openai.js";
import type { TransformCallback } from "stream";

function dataPayload(line: string): string | null {
  const bare = line.endsWith("\r") ? line.slice(0, -1) : line;
  return bare.startsWith("data:") ? bare.slice(5).trim() : null;
}

function parseRecord(payload: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(payload);
    return isRecord(parsed) ? parsed : null;
  } catch {
    logger.debug(`[REMOTE PROXY] Non-JSON data line: ${payload.slice(0, 80)}`);
    return null;
  }
}

function hasVisibleDelta(chunk: Record<string, unknown>): boolean {
  const choices = chunk["choices"];
  if (!Array.isArray(choices)) { return false; }
  const first: unknown = choices[0];
  const delta: unknown = isRecord(first) ? first["delta"] : undefined;
  if (!isRecord(delta)) { return false; }
  const { content, reasoning_content: reasoning } = delta;
  return (typeof content === "string" && content !== "") || (typeof reasoning === "string" && reasoning !== "");
}

export class SseTimingsInjector extends Transform {
  private readonly decoder = new TextDecoder("utf-8");
  private readonly startedAt: number;
  private partial = "";
  /** The last data line and the lines that followed it. */
  private held: string[] = [];
  private firstTokenAt: number | null = null;
  private visibleDeltas = 0;
  private promptTokens = 0;
  private completionTokens: number | null = null;

  constructor(private readonly clock: () => number = Date.now) {
    super();
    this.startedAt = clock();
  }

  override _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.partial += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    const lines = this.partial.split("\n");
    this.partial = lines.pop() ?? "";
    for (const line of lines) {
      this.handleLine(line);
    }
    callback();
  }

  override _flush(callback: TransformCallback): void {
    this.partial += this.decoder.decode();
    this.release(true);
    if (this.partial !== "") {
      this.push(this.partial);
    }
    callback();
  }

  private handleLine(line: string): void {
    const payload = dataPayload(line);
    if (payload === null) {
      if (this.held.length > 0) {
        this.held.push(line);
      } else {
        this.push(`${line}\n`);
      }
      return;
    }
    if (payload === "[DONE]") {
      this.release(true);
      this.push(`${line}\n`);
      return;
    }
    this.observe(payload);
    this.release(false);
    this.held = [line];
  }

  private observe(payload: string): void {
    const chunk = parseRecord(payload);
    if (chunk === null) { return; }
    if (hasVisibleDelta(chunk)) {
      this.visibleDeltas += 1;
      if (this.firstTokenAt === null) {
        this.firstTokenAt = this.clock();
      }
    }
    const usage = chunk["usage"];
    if (isRecord(usage)) {
      this.promptTokens = readNumber(usage, "prompt_tokens") ?? this.promptTokens;
      this.completionTokens = readNumber(usage, "completion_tokens") ?? this.completionTokens;
    }
  }

  private release(last: boolean): void {
    const [first, ...rest] = this.held;
    if (first === undefined) { return; }
    this.held = [];
    const lines = [last ? this.withTimings(first) : first, ...rest];
    this.push(lines.map((line) => `${line}\n`).join(""));
  }

  private withTimings(line: string): string {
    const payload = dataPayload(line);
    const chunk = payload === null ? null : parseRecord(payload);
    if (chunk === null || "timings" in chunk || !Array.isArray(chunk["choices"])) {
      return line;
    }
    const carriage = line.endsWith("\r") ? "\r" : "";
    return `data: ${JSON.stringify({ ...chunk, timings: this.timings() })}${carriage}`;
  }

  private timings(): GenerationTimings {
    const now = this.clock();
    const firstToken = this.firstTokenAt ?? now;
    return {
      prompt_n: this.promptTokens,
      prompt_ms: firstToken - this.startedAt,
      predicted_n: this.completionTokens ?? this.visibleDeltas,
      predicted_ms: now - firstToken,
    };
  }
}
