import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { OpenAITool } from "../../../types/openai.js";

const SECTION_BEGIN = "<|tool_calls_section_begin|>";
const SECTION_END = "<|tool_calls_section_end|>";
const CALL_BEGIN = "<|tool_call_begin|>";
const CALL_END = "<|tool_call_end|>";
const ARGUMENT_BEGIN = "<|tool_call_argument_begin|>";

const CALL_HEAD = /functions\.([A-Za-z_][\w\-]*(?:\.[A-Za-z_][\w\-]*)*):(\d+)\s*<\|tool_call_argument_begin\|>/g;

/**
 * Kimi K2 inline notation: `functions.name:0<|tool_call_argument_begin|>{json}`,
 * usually inside section/call markers. Arguments are surfaced verbatim.
 */
export class KimiK2ToolCallParser extends BaseToolCallParser {
  readonly format = "kimi_k2" as const;
  readonly startTag = null;
  readonly endTag = null;

  get triggers(): readonly string[] {
    return [SECTION_BEGIN, CALL_BEGIN];
  }

  get lineTriggers(): readonly string[] {
    return ["functions."];
  }

  parse(content: string, _tools: readonly OpenAITool[]): ParsedToolCall[] {
    const heads = [...content.matchAll(CALL_HEAD)];
    const calls: ParsedToolCall[] = [];

    heads.forEach((head, position) => {
      const argsStart = (head.index ?? 0) + head[0].length;
      const next = heads[position + 1];
      let argsEnd = next?.index ?? content.length;

      for (const marker of [CALL_END, CALL_BEGIN, SECTION_END]) {
        const found = content.indexOf(marker, argsStart);
        if (found !== -1 && found < argsEnd) {
          argsEnd = found;
        }
      }

      calls.push({
        name: head[1] ?? "",
        arguments: content.slice(argsStart, argsEnd).trim(),
      });
    });

    return calls.filter((call) => this.isValidName(call.name));
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    return `${SECTION_BEGIN}${CALL_BEGIN}functions.${name}:0${ARGUMENT_BEGIN}${JSON.stringify(args)}${CALL_END}${SECTION_END}`;
  }
}
