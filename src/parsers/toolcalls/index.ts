import { Glm4ToolCallParser } from "./formats/Glm4ToolCallParser.js";
import { GemmaFunctionParser } from "./formats/GemmaFunctionParser.js";
import { JsonToolCallParser } from "./formats/JsonToolCallParser.js";
import { KimiK2ToolCallParser } from "./formats/KimiK2ToolCallParser.js";
import { MiniMaxM2ToolCallParser } from "./formats/MiniMaxM2ToolCallParser.js";
import { XmlFunctionParser } from "./formats/XmlFunctionParser.js";

import type { ToolCallParser } from "./BaseToolCallParser.js";
import type { ToolCallFormat } from "./ToolCallFormat.js";

export function createToolCallParser(format: ToolCallFormat): ToolCallParser {
  switch (format) {
    case "json":
      return new JsonToolCallParser("json", "<tool_call>", "</tool_call>");
    case "lfm2":
      return new JsonToolCallParser("lfm2", "<|tool_call_start|>", "<|tool_call_end|>");
    case "xml_function":
      return new XmlFunctionParser();
    case "glm4":
      return new Glm4ToolCallParser();
    case "gemma":
      return new GemmaFunctionParser();
    case "kimi_k2":
      return new KimiK2ToolCallParser();
    case "minimax_m2":
      return new MiniMaxM2ToolCallParser();
  }
}

export { buildToolInstructions } from "./toolInstructions.js";
export {
  DEFAULT_TOOL_CALL_FORMAT,
  TOOL_CALL_FORMATS,
  inferToolCallFormat,
  isToolCallFormat,
  resolveToolCallFormat,
  type ToolCallFormat,
} from "./ToolCallFormat.js";
export type { ParsedToolCall, ToolCallParser } from "./BaseToolCallParser.js";
export { coerceArgumentValue } from "./argumentCoercion.js";
