/**
 * Guided output: prompt injection for `response_format` and best-effort
 * extraction of the JSON object from what the model produced.
 */

import { logger } from "../logging/index.js";
import { appendSystemInstruction } from "../utils/promptUtils.js";

import type { GuidedOutputPlan, GuidedOutputService } from "./contracts.js";
import type { OpenAIMessage, OpenAIResponseFormat } from "../types/openai.js";

const JSON_OBJECT_INSTRUCTION =
  "Respond with a single valid JSON object and nothing else. Do not wrap it in code fences or add commentary.";

function schemaInstruction(schema: Record<string, unknown>, name: string | undefined): string {
  return [
    `Respond with a single JSON object that conforms to the following JSON schema${name === undefined ? "" : ` (${name})`}:`,
    JSON.stringify(schema, null, 2),
    "Output only the JSON object. Do not wrap it in code fences or add commentary.",
  ].join("\n");
}

function stripCodeFences(text: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/i.exec(text);
  return fenced?.[1] ?? text;
}

/** End offset (exclusive) of the balanced object starting at `start`, or -1. */
function balancedObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index++) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) {
        return index + 1;
      }
    }
  }
  return -1;
}

function isJsonObject(candidate: string): boolean {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
}

/**
 * First balanced `{...}` that parses as a JSON object, after removing code
 * fences. Falls back to the text unchanged.
 */
export function extractJsonObject(text: string): string {
  const unfenced = stripCodeFences(text);
  let start = unfenced.indexOf("{");

  while (start !== -1) {
    const end = balancedObjectEnd(unfenced, start);
    if (end !== -1) {
      const candidate = unfenced.slice(start, end);
      if (isJsonObject(candidate)) {
        return candidate;
      }
    }
    start = unfenced.indexOf("{", start + 1);
  }

  logger.debug("[GUIDED OUTPUT] No JSON object found; returning raw text");
  return text;
}

export class GuidedOutputServiceImpl implements GuidedOutputService {
  /** @param schemaOverride applied to requests that carry no `response_format` */
  constructor(private readonly schemaOverride: Record<string, unknown> | null = null) {}

  plan(messages: readonly OpenAIMessage[], responseFormat: OpenAIResponseFormat | null): GuidedOutputPlan {
    if (responseFormat === null && this.schemaOverride !== null) {
      return {
        mode: "json_schema",
        messages: appendSystemInstruction(messages, schemaInstruction(this.schemaOverride, undefined)),
      };
    }

    if (responseFormat === null) {
      return { mode: null, messages: [...messages] };
    }

    switch (responseFormat.type) {
      case "json_object":
        return { mode: "json_object", messages: appendSystemInstruction(messages, JSON_OBJECT_INSTRUCTION) };
      case "json_schema": {
        const { schema, name } = responseFormat.json_schema;
        return {
          mode: "json_schema",
          messages: appendSystemInstruction(messages, schemaInstruction(schema ?? {}, name)),
        };
      }
      case "text":
        return { mode: null, messages: [...messages] };
    }
  }

  extract(text: string): string {
    return extractJsonObject(text);
  }
}
