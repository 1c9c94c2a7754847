/**
 * ToolCallDetector - pulls tool calls out of the content channel.
 *
 * Text ahead of a trigger passes straight through. Tagged notations buffer
 * the body up to the end tag and parse it there; inline notations buffer from
 * the trigger to the end of output. Anything that does not parse is released
 * as ordinary text.
 */

import { logger } from "../../../logging/index.js";
import { generateId } from "../../../utils/ids.js";

import { findEarliest, longestPartialSuffix } from "./partialMatch.js";

import type { ParsedToolCall, ToolCallParser } from "../../../parsers/toolcalls/index.js";
import type { OpenAITool, OpenAIToolCall } from "../../../types/openai.js";

export type DetectorOutput =
  | { kind: "text"; text: string }
  | { kind: "call"; call: OpenAIToolCall };

export interface ToolCallDetectorOptions {
  parser: ToolCallParser;
  tools: readonly OpenAITool[];
  maxBufferSize: number;
}

type DetectorMode = "scanning" | "capturing";

export class ToolCallDetector {
  private mode: DetectorMode = "scanning";
  private buffer = "";
  private trigger = "";
  private callCount = 0;
  /** Whether `buffer` starts at the beginning of a line. */
  private atLineStart = true;

  constructor(private readonly options: ToolCallDetectorOptions) {}

  push(text: string): DetectorOutput[] {
    const outputs: DetectorOutput[] = [];
    this.buffer += text;

    while (this.buffer !== "") {
      if (this.mode === "scanning") {
        if (!this.scan(outputs)) { break; }
        continue;
      }
      if (!this.capture(outputs)) { break; }
    }

    return outputs;
  }

  flush(): DetectorOutput[] {
    const outputs: DetectorOutput[] = [];
    const rest = this.buffer;
    this.buffer = "";

    if (this.mode === "scanning") {
      this.emitText(outputs, rest);
      return outputs;
    }

    // Unterminated body: the end tag may have been cut off by a stop or the token budget.
    this.mode = "scanning";
    this.complete(outputs, rest, false);
    return outputs;
  }

  /** Returns true when a trigger was found and capture began. */
  private scan(outputs: DetectorOutput[]): boolean {
    const { parser } = this.options;
    const marker = this.findTrigger();

    if (marker === null) {
      const hold = Math.max(longestPartialSuffix(this.buffer, parser.triggers), this.lineTriggerPartial());
      this.emitText(outputs, this.buffer.slice(0, this.buffer.length - hold));
      this.buffer = this.buffer.slice(this.buffer.length - hold);
      return false;
    }

    this.emitText(outputs, this.buffer.slice(0, marker.index));
    if (parser.endTag !== null) {
      this.trigger = marker.needle;
      this.buffer = this.buffer.slice(marker.index + marker.needle.length);
    } else {
      this.trigger = "";
      this.buffer = this.buffer.slice(marker.index);
    }
    this.mode = "capturing";
    logger.debug(`[TOOL CALL DETECTOR] ${parser.format} trigger ${JSON.stringify(marker.needle)} found`);
    return true;
  }

  private isLineStart(index: number): boolean {
    return index === 0 ? this.atLineStart : this.buffer[index - 1] === "\n";
  }

  private findTrigger(): { index: number; needle: string } | null {
    let best = findEarliest(this.buffer, this.options.parser.triggers);
    for (const needle of this.options.parser.lineTriggers) {
      let index = this.buffer.indexOf(needle);
      while (index !== -1 && !this.isLineStart(index)) {
        index = this.buffer.indexOf(needle, index + 1);
      }
      if (index === -1) { continue; }
      if (best === null || index < best.index || (index === best.index && needle.length > best.needle.length)) {
        best = { index, needle };
      }
    }
    return best;
  }

  /** Longest held-back tail that could still become a line trigger. */
  private lineTriggerPartial(): number {
    let longest = 0;
    for (const needle of this.options.parser.lineTriggers) {
      const max = Math.min(needle.length - 1, this.buffer.length);
      for (let length = max; length > longest; length--) {
        const start = this.buffer.length - length;
        if (this.buffer.endsWith(needle.slice(0, length)) && this.isLineStart(start)) {
          longest = length;
          break;
        }
      }
    }
    return longest;
  }

  /** Returns true when the capture finished and scanning should resume. */
  private capture(outputs: DetectorOutput[]): boolean {
    const { parser, maxBufferSize } = this.options;

    if (parser.endTag !== null) {
      const end = this.buffer.indexOf(parser.endTag);
      if (end !== -1) {
        const body = this.buffer.slice(0, end);
        this.buffer = this.buffer.slice(end + parser.endTag.length);
        this.mode = "scanning";
        this.complete(outputs, body, true);
        return true;
      }
    }

    if (this.buffer.length > maxBufferSize) {
      logger.warn(`[TOOL CALL DETECTOR] Tool call body exceeded ${maxBufferSize} characters; releasing as text`);
      const raw = this.trigger + this.buffer;
      this.buffer = "";
      this.trigger = "";
      this.mode = "scanning";
      this.emitText(outputs, raw);
    }
    return false;
  }

  private complete(outputs: DetectorOutput[], body: string, terminated: boolean): void {
    const { parser, tools } = this.options;
    const parsed = parser.parse(body, tools);

    if (parsed.length === 0) {
      logger.debug(`[TOOL CALL DETECTOR] ${parser.format} body did not parse; releasing as text`);
      const closing = terminated ? parser.endTag ?? "" : "";
      this.emitText(outputs, this.trigger + body + closing);
    } else {
      this.atLineStart = false;
      for (const call of parsed) {
        outputs.push({ kind: "call", call: this.toToolCall(call) });
        this.callCount += 1;
      }
      logger.debug(`[TOOL CALL DETECTOR] Detected ${parsed.length} call(s): ${parsed.map((c) => c.name).join(", ")}`);
    }
    this.trigger = "";
  }

  private emitText(outputs: DetectorOutput[], text: string): void {
    if (text === "") {
      return;
    }
    this.atLineStart = text.endsWith("\n");
    // Once a call is out, text between or after calls is not content.
    if (this.callCount > 0) {
      return;
    }
    const last = outputs[outputs.length - 1];
    if (last !== undefined && last.kind === "text") {
      last.text += text;
    } else {
      outputs.push({ kind: "text", text });
    }
  }

  private toToolCall(call: ParsedToolCall): OpenAIToolCall {
    return {
      id: generateId("call_"),
      type: "function",
      function: { name: call.name, arguments: call.arguments },
    };
  }
}
