import type { JsonSchemaObject, OpenAITool } from "../../types/openai.js";

export function findToolParameters(tools: readonly OpenAITool[], name: string): JsonSchemaObject | undefined {
  return tools.find((tool) => tool.function.name === name)?.function.parameters;
}

function primaryType(schema: JsonSchemaObject | undefined): string | undefined {
  const type = schema?.type;
  if (Array.isArray(type)) {
    return type.find((entry) => entry !== "null");
  }
  return type;
}

function tryParseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/**
 * Converts a raw textual argument to the type its JSON schema declares.
 * Values that do not fit the declared type stay strings.
 */
export function coerceArgumentValue(raw: string, schema?: JsonSchemaObject): unknown {
  const trimmed = raw.trim();

  switch (primaryType(schema)) {
    case "string":
      return raw;
    case "integer":
    case "number": {
      const value = Number(trimmed);
      return trimmed !== "" && Number.isFinite(value) ? value : raw;
    }
    case "boolean": {
      const lowered = trimmed.toLowerCase();
      if (lowered === "true") { return true; }
      if (lowered === "false") { return false; }
      return raw;
    }
    case "object":
    case "array": {
      const parsed = tryParseJson(trimmed);
      return parsed.ok ? parsed.value : raw;
    }
    default: {
      // untyped: accept JSON literals, otherwise keep the text
      const parsed = tryParseJson(trimmed);
      return parsed.ok ? parsed.value : raw;
    }
  }
}

/**
 * Builds the `arguments` JSON string from key/value pairs extracted by a
 * key/value notation parser.
 */
export function buildArgumentsJson(
  pairs: ReadonlyArray<readonly [string, string]>,
  tools: readonly OpenAITool[],
  toolName: string,
): string {
  const properties = findToolParameters(tools, toolName)?.properties ?? {};
  const args: Record<string, unknown> = {};
  for (const [key, value] of pairs) {
    args[key] = coerceArgumentValue(value, properties[key]);
  }
  return JSON.stringify(args);
}
