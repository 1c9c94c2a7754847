import { coerceArgumentValue, findToolParameters } from "../argumentCoercion.js";
import { BaseToolCallParser, type ParsedToolCall } from "../BaseToolCallParser.js";

import type { JsonSchemaObject, OpenAITool } from "../../../types/openai.js";

const ESCAPE = "<escape>";
const CALL_OPEN = "<start_function_call>";
const CALL_CLOSE = "<end_function_call>";
const CALL_HEAD = /call:([A-Za-z_][\w.\-]*)\{/g;

/**
 * Walks `text` from `start` tracking bracket depth, skipping `<escape>` spans.
 * Calls `onTopLevelComma` for separators at depth 0 and returns the index of the
 * bracket closing depth 1, or -1 when unbalanced.
 */
function scanBalanced(text: string, start: number, onTopLevelComma?: (index: number) => void): number {
  let depth = 1;
  let i = start;
  while (i < text.length) {
    if (text.startsWith(ESCAPE, i)) {
      const end = text.indexOf(ESCAPE, i + ESCAPE.length);
      if (end === -1) { return -1; }
      i = end + ESCAPE.length;
      continue;
    }
    const ch = text[i];
    if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) { return i; }
    } else if (ch === "," && depth === 1) {
      onTopLevelComma?.(i);
    }
    i++;
  }
  return -1;
}

function splitTopLevel(body: string): string[] {
  const parts: string[] = [];
  let last = 0;
  // a virtual closing bracket makes the whole body depth 1
  scanBalanced(`${body}}`, 0, (index) => {
    parts.push(body.slice(last, index));
    last = index + 1;
  });
  parts.push(body.slice(last));
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

function parseValue(raw: string, schema: JsonSchemaObject | undefined): unknown {
  if (raw.startsWith(ESCAPE) && raw.endsWith(ESCAPE) && raw.length >= ESCAPE.length * 2) {
    return raw.slice(ESCAPE.length, raw.length - ESCAPE.length);
  }
  if (raw.startsWith("{") && raw.endsWith("}")) {
    return parseEntries(raw.slice(1, -1), schema?.properties ?? {});
  }
  if (raw.startsWith("[") && raw.endsWith("]")) {
    return splitTopLevel(raw.slice(1, -1)).map((item) => parseValue(item, schema?.items));
  }
  return coerceArgumentValue(raw, schema);
}

function parseEntries(body: string, properties: Record<string, JsonSchemaObject>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const entry of splitTopLevel(body)) {
    const colon = entry.indexOf(":");
    if (colon <= 0) { continue; }
    const key = entry.slice(0, colon).trim();
    result[key] = parseValue(entry.slice(colon + 1).trim(), properties[key]);
  }
  return result;
}

function renderValue(value: unknown): string {
  if (typeof value === "string") {
    return `${ESCAPE}${value}${ESCAPE}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(renderValue).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    return `{${Object.entries(value).map(([key, item]) => `${key}:${renderValue(item)}`).join(",")}}`;
  }
  return String(value);
}

/**
 * FunctionGemma inline notation: `call:name{key:value,text:<escape>str<escape>}`,
 * optionally between `<start_function_call>` and `<end_function_call>`.
 */
export class GemmaFunctionParser extends BaseToolCallParser {
  readonly format = "gemma" as const;
  readonly startTag = null;
  readonly endTag = null;

  get triggers(): readonly string[] {
    return [CALL_OPEN];
  }

  get lineTriggers(): readonly string[] {
    return ["call:"];
  }

  parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[] {
    const calls: ParsedToolCall[] = [];

    for (const head of content.matchAll(CALL_HEAD)) {
      const name = head[1] ?? "";
      const bodyStart = (head.index ?? 0) + head[0].length;
      const close = scanBalanced(content, bodyStart);
      if (close === -1) { continue; }

      const properties = findToolParameters(tools, name)?.properties ?? {};
      const args = parseEntries(content.slice(bodyStart, close), properties);
      calls.push({ name, arguments: JSON.stringify(args) });
    }

    return calls;
  }

  renderCall(name: string, args: Record<string, unknown>): string {
    return `${CALL_OPEN}call:${name}${renderValue(args)}${CALL_CLOSE}`;
  }
}
