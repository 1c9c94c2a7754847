import { buildArgumentsJson } from "../argumentCoercion.js";
import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { OpenAITool } from "../../../types/openai.js";

const ARG_PAIR = /<arg_key>([\s\S]*?)<\/arg_key>\s*<arg_value>([\s\S]*?)<\/arg_value>/g;

/**
 * GLM-4 notation: `<tool_call>name<arg_key>k</arg_key><arg_value>v</arg_value></tool_call>`
 */
export class Glm4ToolCallParser extends BaseToolCallParser {
  readonly format = "glm4" as const;
  readonly startTag = "<tool_call>";
  readonly endTag = "</tool_call>";

  parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[] {
    const firstKey = content.indexOf("<arg_key>");
    const name = (firstKey === -1 ? content : content.slice(0, firstKey)).trim();
    if (!this.isValidName(name)) {
      return [];
    }

    const pairs: Array<[string, string]> = [];
    for (const match of content.matchAll(ARG_PAIR)) {
      pairs.push([(match[1] ?? "").trim(), match[2] ?? ""]);
    }

    return [{ name, arguments: buildArgumentsJson(pairs, tools, name) }];
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    const pairs = Object.entries(args)
      .map(([key, value]) => `<arg_key>${key}</arg_key>\n<arg_value>${this.stringifyValue(value)}</arg_value>\n`)
      .join("");
    return this.wrap(`${name}\n${pairs}`);
  }
}
