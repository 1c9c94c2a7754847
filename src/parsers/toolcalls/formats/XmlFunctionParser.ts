import { buildArgumentsJson } from "../argumentCoercion.js";
import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { OpenAITool } from "../../../types/openai.js";

const FUNCTION_BLOCK = /<function=([^>\s]+)>([\s\S]*?)(?:<\/function>|$)/g;
const PARAMETER_BLOCK = /<parameter=([^>\s]+)>([\s\S]*?)(?:<\/parameter>|(?=<parameter=)|$)/g;

function trimNewlines(value: string): string {
  return value.replace(/^\n/, "").replace(/\n$/, "");
}

/**
 * Qwen3 Coder notation:
 * `<tool_call><function=name><parameter=key>value</parameter></function></tool_call>`
 */
export class XmlFunctionParser extends BaseToolCallParser {
  readonly format = "xml_function" as const;
  readonly startTag = "<tool_call>";
  readonly endTag = "</tool_call>";

  parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[] {
    const calls: ParsedToolCall[] = [];

    for (const match of content.matchAll(FUNCTION_BLOCK)) {
      const name = (match[1] ?? "").trim();
      if (!this.isValidName(name)) { continue; }

      const pairs: Array<[string, string]> = [];
      for (const param of (match[2] ?? "").matchAll(PARAMETER_BLOCK)) {
        pairs.push([(param[1] ?? "").trim(), trimNewlines(param[2] ?? "")]);
      }
      calls.push({ name, arguments: buildArgumentsJson(pairs, tools, name) });
    }

    return calls;
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    const params = Object.entries(args)
      .map(([key, value]) => `<parameter=${key}>\n${this.stringifyValue(value)}\n</parameter>\n`)
      .join("");
    return this.wrap(`\n<function=${name}>\n${params}</function>\n`);
  }
}
