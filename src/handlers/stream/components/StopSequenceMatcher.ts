/**
 * StopSequenceMatcher - truncates the content channel at the first stop string.
 *
 * Only text that could still be the start of a stop string is held back, so
 * the released output does not depend on how the backend chunked it.
 */

import { logger } from "../../../logging/index.js";

import { findEarliest } from "./partialMatch.js";

export interface StopMatchResult {
  /** Content that is safe to release. */
  text: string;
  stopped: boolean;
  matched?: string;
  /** Characters cut at the match, the stop string included. */
  dropped?: number;
}

export class StopSequenceMatcher {
  private readonly stops: readonly string[];
  private readonly maxLength: number;
  private buffer = "";
  private stopped = false;

  constructor(stops: readonly string[]) {
    this.stops = [...new Set(stops.filter((stop) => stop !== ""))];
    this.maxLength = this.stops.reduce((max, stop) => Math.max(max, stop.length), 0);
  }

  get hasStopped(): boolean {
    return this.stopped;
  }

  push(text: string): StopMatchResult {
    if (this.stopped) {
      return { text: "", stopped: true };
    }
    if (this.stops.length === 0) {
      return { text, stopped: false };
    }
    this.buffer += text;
    return this.resolve(false);
  }

  /** Final resolution at end of stream; nothing is held back afterwards. */
  flush(): StopMatchResult {
    if (this.stopped || this.buffer === "") {
      return { text: "", stopped: this.stopped };
    }
    return this.resolve(true);
  }

  private resolve(final: boolean): StopMatchResult {
    const match = findEarliest(this.buffer, this.stops);
    const partial = final ? -1 : this.earliestPartial();

    if (match !== null && (partial === -1 || partial >= match.index)) {
      const text = this.buffer.slice(0, match.index);
      const dropped = this.buffer.length - match.index;
      this.buffer = "";
      this.stopped = true;
      logger.debug(`[STOP MATCHER] Matched stop sequence ${JSON.stringify(match.needle)}`);
      return { text, stopped: true, matched: match.needle, dropped };
    }

    if (partial !== -1) {
      const text = this.buffer.slice(0, partial);
      this.buffer = this.buffer.slice(partial);
      return { text, stopped: false };
    }

    const text = this.buffer;
    this.buffer = "";
    return { text, stopped: false };
  }

  /** Earliest offset whose remainder is a proper prefix of some stop string, or -1. */
  private earliestPartial(): number {
    const start = Math.max(0, this.buffer.length - (this.maxLength - 1));
    for (let index = start; index < this.buffer.length; index++) {
      const tail = this.buffer.slice(index);
      if (this.stops.some((stop) => stop.length > tail.length && stop.startsWith(tail))) {
        return index;
      }
    }
    return -1;
  }
}
