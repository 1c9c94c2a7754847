import { isRecord } from "../../../utils/typeGuards.js";
import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { OpenAITool } from "../../../types/openai.js";
import type { ToolCallFormat } from "../ToolCallFormat.js";

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(text);
  return fenced?.[1] ?? text;
}

/**
 * `{"name": ..., "arguments": {...}}` bodies, one or a list per wrapper.
 * Shared by `json` (`<tool_call>`) and `lfm2` (`<|tool_call_start|>`).
 */
export class JsonToolCallParser extends BaseToolCallParser {
  readonly format: ToolCallFormat;
  readonly startTag: string;
  readonly endTag: string;

  constructor(format: ToolCallFormat, startTag: string, endTag: string) {
    super();
    this.format = format;
    this.startTag = startTag;
    this.endTag = endTag;
  }

  parse(content: string, _tools: readonly OpenAITool[]): ParsedToolCall[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(stripCodeFence(content.trim()));
    } catch {
      return [];
    }

    const candidates = Array.isArray(parsed) ? parsed : [parsed];
    const calls: ParsedToolCall[] = [];

    for (const candidate of candidates) {
      if (!isRecord(candidate)) { continue; }
      const nested = candidate["function"];
      const fn = isRecord(nested) ? nested : candidate;
      const name = fn["name"];
      if (typeof name !== "string" || !this.isValidName(name)) { continue; }

      const rawArgs = fn["arguments"] ?? fn["parameters"] ?? {};
      calls.push({
        name,
        arguments: typeof rawArgs === "string" ? rawArgs : JSON.stringify(rawArgs),
      });
    }

    return calls;
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    return this.wrap(`\n${JSON.stringify({ name, arguments: args })}\n`);
  }
}
