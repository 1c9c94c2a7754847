import type { ToolCallParser } from "./BaseToolCallParser.js";
import type { JsonSchemaObject, OpenAITool, OpenAIToolChoice } from "../../types/openai.js";

function exampleValue(name: string, schema: JsonSchemaObject): unknown {
  const type = Array.isArray(schema.type) ? schema.type[0] : schema.type;
  if (Array.isArray(schema.enum) && schema.enum.length > 0) {
    return schema.enum[0];
  }
  switch (type) {
    case "integer":
    case "number":
      return 42;
    case "boolean":
      return true;
    case "array":
      return [];
    case "object":
      return {};
    default:
      return name.includes("city") ? "Paris" : "example";
  }
}

function describeTool(tool: OpenAITool): string {
  return JSON.stringify({
    type: "function",
    function: {
      name: tool.function.name,
      description: tool.function.description ?? "",
      parameters: tool.function.parameters ?? { type: "object", properties: {} },
    },
  });
}

function toolsForChoice(tools: readonly OpenAITool[], toolChoice: OpenAIToolChoice): readonly OpenAITool[] {
  if (typeof toolChoice === "object") {
    return tools.filter((tool) => tool.function.name === toolChoice.function.name);
  }
  return tools;
}

/**
 * System-prompt block that lists the available tools and shows the model the
 * exact notation the detector expects. Empty when there is nothing to offer.
 */
export function buildToolInstructions(
  parser: ToolCallParser,
  tools: readonly OpenAITool[],
  toolChoice: OpenAIToolChoice,
): string {
  if (toolChoice === "none") {
    return "";
  }
  const offered = toolsForChoice(tools, toolChoice);
  const first = offered[0];
  if (first === undefined) {
    return "";
  }

  const properties = first.function.parameters?.properties ?? {};
  const exampleArgs: Record<string, unknown> = {};
  for (const [name, schema] of Object.entries(properties).slice(0, 3)) {
    exampleArgs[name] = exampleValue(name, schema);
  }

  const requirement = toolChoice === "required" || typeof toolChoice === "object"
    ? "You MUST call one of these functions before answering."
    : "Call a function only when it helps answer the request; otherwise answer directly.";

  return [
    "# Tools",
    "",
    "You may call one or more functions to assist with the user query.",
    "",
    "Function signatures:",
    "<tools>",
    ...offered.map(describeTool),
    "</tools>",
    "",
    "To call a function, output it in exactly this form, one call per block:",
    parser.renderCall(first.function.name, exampleArgs),
    "",
    requirement,
    "Use the exact function names listed above and do not wrap calls in code blocks.",
  ].join("\n");
}
