import { buildArgumentsJson } from "../argumentCoercion.js";
import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { OpenAITool } from "../../../types/openai.js";

const INVOKE_BLOCK = /<invoke\s+name="([^"]+)"\s*>([\s\S]*?)<\/invoke>/g;
const PARAMETER_BLOCK = /<parameter\s+name="([^"]+)"\s*>([\s\S]*?)<\/parameter>/g;

/**
 * MiniMax-M2 notation:
 * `<minimax:tool_call><invoke name="f"><parameter name="k">v</parameter></invoke></minimax:tool_call>`
 * One wrapper may hold several invokes.
 */
export class MiniMaxM2ToolCallParser extends BaseToolCallParser {
  readonly format = "minimax_m2" as const;
  readonly startTag = "<minimax:tool_call>";
  readonly endTag = "</minimax:tool_call>";

  parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[] {
    const calls: ParsedToolCall[] = [];

    for (const invoke of content.matchAll(INVOKE_BLOCK)) {
      const name = (invoke[1] ?? "").trim();
      if (!this.isValidName(name)) { continue; }

      const pairs: Array<[string, string]> = [];
      for (const param of (invoke[2] ?? "").matchAll(PARAMETER_BLOCK)) {
        pairs.push([(param[1] ?? "").trim(), (param[2] ?? "").replace(/^\n+|\n+$/g, "")]);
      }
      calls.push({ name, arguments: buildArgumentsJson(pairs, tools, name) });
    }

    return calls;
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    const params = Object.entries(args)
      .map(([key, value]) => `<parameter name="${key}">${this.stringifyValue(value)}</parameter>\n`)
      .join("");
    return this.wrap(`\n<invoke name="${name}">\n${params}</invoke>\n`);
  }
}
