/**
 * ReasoningSplitter - routes generated text to the reasoning or content channel.
 *
 * The splitter is a two-state machine driven by literal think markers. Markers
 * can arrive split across increments, so the tail that could still become a
 * marker is held back until the next push (or `flush()`).
 */

import { logger } from "../../../logging/index.js";

import { findEarliest, longestPartialSuffix } from "./partialMatch.js";

import type { Channel, ChannelSegment } from "../../../types/generation.js";

export interface ReasoningSplitterOptions {
  openTag: string;
  closeTag: string;
  enabled: boolean;
  /** For templates that pre-open the think block in the prompt. */
  startInReasoning: boolean;
}

export class ReasoningSplitter {
  private inside: boolean;
  private pending = "";
  private skipLineBreaks = false;

  constructor(private readonly options: ReasoningSplitterOptions) {
    this.inside = options.enabled && options.startInReasoning;
  }

  get channel(): Channel {
    return this.inside ? "reasoning" : "content";
  }

  push(text: string): ChannelSegment[] {
    if (!this.options.enabled) {
      return text === "" ? [] : [{ channel: "content", text }];
    }

    const segments: ChannelSegment[] = [];
    let buffer = this.pending + text;
    this.pending = "";

    while (buffer !== "") {
      if (this.skipLineBreaks) {
        // Line breaks only; indentation belongs to the text that follows.
        buffer = buffer.replace(/^[\r\n]+/, "");
        if (buffer === "") {
          break;
        }
        this.skipLineBreaks = false;
      }

      if (this.inside) {
        const close = buffer.indexOf(this.options.closeTag);
        if (close !== -1) {
          this.emit(segments, "reasoning", buffer.slice(0, close));
          buffer = buffer.slice(close + this.options.closeTag.length);
          this.inside = false;
          this.skipLineBreaks = true;
          logger.debug("[REASONING SPLITTER] Left reasoning block");
          continue;
        }
        buffer = this.holdTail(segments, "reasoning", buffer, [this.options.closeTag]);
        continue;
      }

      const marker = findEarliest(buffer, [this.options.openTag, this.options.closeTag]);
      if (marker !== null) {
        this.emit(segments, "content", buffer.slice(0, marker.index));
        buffer = buffer.slice(marker.index + marker.needle.length);
        this.skipLineBreaks = true;
        if (marker.needle === this.options.openTag) {
          this.inside = true;
          logger.debug("[REASONING SPLITTER] Entered reasoning block");
        } else {
          logger.debug("[REASONING SPLITTER] Dropped stray close marker");
        }
        continue;
      }
      buffer = this.holdTail(segments, "content", buffer, [this.options.openTag, this.options.closeTag]);
    }

    return segments;
  }

  /** Releases held-back text to the current channel. */
  flush(): ChannelSegment[] {
    const rest = this.pending;
    this.pending = "";
    if (rest === "") {
      return [];
    }
    return [{ channel: this.channel, text: rest }];
  }

  private holdTail(segments: ChannelSegment[], channel: Channel, buffer: string, markers: readonly string[]): string {
    const hold = longestPartialSuffix(buffer, markers);
    this.emit(segments, channel, buffer.slice(0, buffer.length - hold));
    this.pending = buffer.slice(buffer.length - hold);
    return "";
  }

  private emit(segments: ChannelSegment[], channel: Channel, text: string): void {
    if (text === "") {
      return;
    }
    const last = segments[segments.length - 1];
    if (last !== undefined && last.channel === channel) {
      last.text += text;
    } else {
      segments.push({ channel, text });
    }
  }
}
