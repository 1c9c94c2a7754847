/**
 * Request validation and merging.
 *
 * Turns an untrusted chat completion body into an immutable GenerationRequest,
 * filling omitted sampling fields from the configured defaults. Every problem
 * is a RequestValidationError (HTTP 400) raised before any backend is touched.
 */

import { RequestValidationError } from "../utils/errors.js";
import { isRecord } from "../utils/typeGuards.js";

import type { GenerationDefaults } from "../config.js";
import type { SamplingParameters } from "../types/backend.js";
import type { GenerationRequest } from "../types/generation.js";
import type {
  JsonSchemaObject,
  OpenAIContentPart,
  OpenAIMessage,
  OpenAIMessageContent,
  OpenAIResponseFormat,
  OpenAIRole,
  OpenAITool,
  OpenAIToolCall,
  OpenAIToolChoice,
} from "../types/openai.js";

export interface RequestSettings {
  defaults: GenerationDefaults;
  maxTopLogprobs: number;
}

const ROLES: readonly OpenAIRole[] = ["system", "developer", "user", "assistant", "tool"];

function isRole(value: unknown): value is OpenAIRole {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) { return undefined; }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new RequestValidationError(`'${key}' must be a number`, key);
  }
  return value;
}

function optionalInteger(body: Record<string, unknown>, key: string): number | undefined {
  const value = optionalNumber(body, key);
  if (value !== undefined && !Number.isInteger(value)) {
    throw new RequestValidationError(`'${key}' must be an integer`, key);
  }
  return value;
}

function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) { return undefined; }
  if (typeof value !== "boolean") {
    throw new RequestValidationError(`'${key}' must be a boolean`, key);
  }
  return value;
}

/** Two spellings of one field must agree when both are given. */
function aliased(body: Record<string, unknown>, primary: string, alias: string, read: typeof optionalNumber): number | undefined {
  const first = read(body, primary);
  const second = read(body, alias);
  if (first !== undefined && second !== undefined && first !== second) {
    throw new RequestValidationError(`'${primary}' and '${alias}' disagree`, primary);
  }
  return first ?? second;
}

function parseContent(value: unknown, index: number): OpenAIMessageContent {
  if (value === undefined || value === null) { return null; }
  if (typeof value === "string") { return value; }
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`messages[${index}].content must be a string or an array of content parts`, `messages[${index}].content`);
  }
  return value.map((part, partIndex): OpenAIContentPart => {
    if (!isRecord(part) || part["type"] !== "text" || typeof part["text"] !== "string") {
      throw new RequestValidationError(
        `messages[${index}].content[${partIndex}] must be a text part; other content types are not supported`,
        `messages[${index}].content`,
      );
    }
    return { type: "text", text: part["text"] };
  });
}

function parseToolCalls(value: unknown, index: number): OpenAIToolCall[] | undefined {
  if (value === undefined || value === null) { return undefined; }
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`messages[${index}].tool_calls must be an array`, `messages[${index}].tool_calls`);
  }
  return value.map((call, callIndex): OpenAIToolCall => {
    const fn = isRecord(call) ? call["function"] : undefined;
    if (!isRecord(call) || !isRecord(fn) || typeof fn["name"] !== "string") {
      throw new RequestValidationError(`messages[${index}].tool_calls[${callIndex}] needs function.name`, `messages[${index}].tool_calls`);
    }
    const args = fn["arguments"];
    return {
      id: typeof call["id"] === "string" ? call["id"] : `call_${index}_${callIndex}`,
      type: "function",
      function: {
        name: fn["name"],
        arguments: typeof args === "string" ? args : JSON.stringify(args ?? {}),
      },
    };
  });
}

function parseMessages(value: unknown): OpenAIMessage[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new RequestValidationError("'messages' must be a non-empty array", "messages");
  }
  return value.map((entry, index): OpenAIMessage => {
    if (!isRecord(entry)) {
      throw new RequestValidationError(`messages[${index}] must be an object`, `messages[${index}]`);
    }
    const role = entry["role"];
    if (!isRole(role)) {
      throw new RequestValidationError(`messages[${index}].role '${String(role)}' is not one of ${ROLES.join(", ")}`, `messages[${index}].role`);
    }
    const message: OpenAIMessage = { role, content: parseContent(entry["content"], index) };
    const toolCalls = parseToolCalls(entry["tool_calls"], index);
    if (toolCalls !== undefined) { message.tool_calls = toolCalls; }
    if (typeof entry["tool_call_id"] === "string") { message.tool_call_id = entry["tool_call_id"]; }
    if (typeof entry["name"] === "string") { message.name = entry["name"]; }
    return message;
  });
}

function parseTools(value: unknown): OpenAITool[] {
  if (value === undefined || value === null) { return []; }
  if (!Array.isArray(value)) {
    throw new RequestValidationError("'tools' must be an array", "tools");
  }
  return value.map((entry, index): OpenAITool => {
    const fn = isRecord(entry) ? entry["function"] : undefined;
    if (!isRecord(entry) || entry["type"] !== "function" || !isRecord(fn) || typeof fn["name"] !== "string" || fn["name"] === "") {
      throw new RequestValidationError(`tools[${index}] must be {type: "function", function: {name, ...}}`, `tools[${index}]`);
    }
    const tool: OpenAITool = { type: "function", function: { name: fn["name"] } };
    if (typeof fn["description"] === "string") { tool.function.description = fn["description"]; }
    const parameters: unknown = fn["parameters"];
    if (isRecord(parameters)) { tool.function.parameters = toSchema(parameters); }
    return tool;
  });
}

const TYPED_SCHEMA_KEYS = new Set(["type", "properties", "required", "items", "description", "enum"]);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry): entry is string => typeof entry === "string");
}

function toSchema(record: Record<string, unknown>): JsonSchemaObject {
  const schema: JsonSchemaObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (!TYPED_SCHEMA_KEYS.has(key)) { schema[key] = value; }
  }

  const { type, properties, required, items, description } = record;
  if (typeof type === "string" || isStringArray(type)) { schema.type = type; }
  if (isRecord(properties)) {
    const converted: Record<string, JsonSchemaObject> = {};
    for (const [key, value] of Object.entries(properties)) {
      if (isRecord(value)) { converted[key] = toSchema(value); }
    }
    schema.properties = converted;
  }
  if (isStringArray(required)) { schema.required = required; }
  if (isRecord(items)) { schema.items = toSchema(items); }
  if (typeof description === "string") { schema.description = description; }
  if (Array.isArray(record["enum"])) { schema.enum = [...record["enum"]]; }
  return schema;
}

function parseToolChoice(value: unknown, tools: readonly OpenAITool[]): OpenAIToolChoice {
  if (value === undefined || value === null) {
    return tools.length > 0 ? "auto" : "none";
  }
  if (value === "none" || value === "auto" || value === "required") {
    return value;
  }
  const fn = isRecord(value) ? value["function"] : undefined;
  if (isRecord(value) && value["type"] === "function" && isRecord(fn) && typeof fn["name"] === "string") {
    const name = fn["name"];
    if (!tools.some((tool) => tool.function.name === name)) {
      throw new RequestValidationError(`tool_choice names '${name}', which is not in 'tools'`, "tool_choice");
    }
    return { type: "function", function: { name } };
  }
  throw new RequestValidationError("'tool_choice' must be none, auto, required or {type: \"function\", function: {name}}", "tool_choice");
}

function parseResponseFormat(value: unknown): OpenAIResponseFormat | null {
  if (value === undefined || value === null) { return null; }
  if (!isRecord(value)) {
    throw new RequestValidationError("'response_format' must be an object", "response_format");
  }
  switch (value["type"]) {
    case "text":
      return { type: "text" };
    case "json_object":
      return { type: "json_object" };
    case "json_schema": {
      const spec = value["json_schema"];
      const schema = isRecord(spec) ? spec["schema"] : undefined;
      if (!isRecord(spec) || !isRecord(schema)) {
        throw new RequestValidationError("response_format json_schema requires json_schema.schema", "response_format.json_schema");
      }
      const format: OpenAIResponseFormat = { type: "json_schema", json_schema: { schema } };
      if (typeof spec["name"] === "string") { format.json_schema.name = spec["name"]; }
      if (typeof spec["strict"] === "boolean") { format.json_schema.strict = spec["strict"]; }
      return format;
    }
    default:
      throw new RequestValidationError(`Unknown response_format type '${String(value["type"])}'`, "response_format.type");
  }
}

/** Request stops first, then configured defaults; empty strings and duplicates removed. */
export function mergeStopSequences(requested: unknown, defaults: readonly string[]): string[] {
  let fromRequest: string[];
  if (requested === undefined || requested === null) {
    fromRequest = [];
  } else if (typeof requested === "string") {
    fromRequest = [requested];
  } else if (isStringArray(requested)) {
    fromRequest = requested;
  } else {
    throw new RequestValidationError("'stop' must be a string or an array of strings", "stop");
  }
  return [...new Set([...fromRequest, ...defaults].filter((stop) => stop !== ""))];
}

function parseSampling(body: Record<string, unknown>, defaults: GenerationDefaults): SamplingParameters {
  const temperature = optionalNumber(body, "temperature");
  if (temperature !== undefined && (temperature < 0 || temperature > 2)) {
    throw new RequestValidationError("'temperature' must be between 0 and 2", "temperature");
  }
  const topP = optionalNumber(body, "top_p");
  if (topP !== undefined && (topP <= 0 || topP > 1)) {
    throw new RequestValidationError("'top_p' must be greater than 0 and at most 1", "top_p");
  }
  const topK = optionalInteger(body, "top_k");
  if (topK !== undefined && topK < 0) {
    throw new RequestValidationError("'top_k' must be a non-negative integer", "top_k");
  }
  const minP = optionalNumber(body, "min_p");
  if (minP !== undefined && (minP < 0 || minP > 1)) {
    throw new RequestValidationError("'min_p' must be between 0 and 1", "min_p");
  }
  if (topK === 1 && topP !== undefined && topP < 1) {
    throw new RequestValidationError("'top_k' of 1 is greedy decoding and conflicts with 'top_p' below 1", "top_p");
  }
  const repetitionPenalty = aliased(body, "repetition_penalty", "repeat_penalty", optionalNumber);
  if (repetitionPenalty !== undefined && repetitionPenalty <= 0) {
    throw new RequestValidationError("'repetition_penalty' must be greater than 0", "repetition_penalty");
  }
  const presencePenalty = optionalNumber(body, "presence_penalty");
  if (presencePenalty !== undefined && (presencePenalty < -2 || presencePenalty > 2)) {
    throw new RequestValidationError("'presence_penalty' must be between -2 and 2", "presence_penalty");
  }
  const seed = optionalInteger(body, "seed");

  const sampling: SamplingParameters = {};
  const merged: SamplingParameters = {
    temperature: temperature ?? defaults.temperature,
    topP: topP ?? defaults.topP,
    topK: topK ?? defaults.topK,
    minP: minP ?? defaults.minP,
    repetitionPenalty: repetitionPenalty ?? defaults.repetitionPenalty,
    presencePenalty: presencePenalty ?? defaults.presencePenalty,
    seed: seed ?? defaults.seed,
  };
  // Drop unset keys so backends only send what was asked for.
  if (merged.temperature !== undefined) { sampling.temperature = merged.temperature; }
  if (merged.topP !== undefined) { sampling.topP = merged.topP; }
  if (merged.topK !== undefined) { sampling.topK = merged.topK; }
  if (merged.minP !== undefined) { sampling.minP = merged.minP; }
  if (merged.repetitionPenalty !== undefined) { sampling.repetitionPenalty = merged.repetitionPenalty; }
  if (merged.presencePenalty !== undefined) { sampling.presencePenalty = merged.presencePenalty; }
  if (merged.seed !== undefined) { sampling.seed = merged.seed; }
  return sampling;
}

function parseLogprobs(body: Record<string, unknown>, maxTopLogprobs: number): number | null {
  const logprobs = optionalBoolean(body, "logprobs") ?? false;
  const top = body["top_logprobs"];
  if (top !== undefined && top !== null) {
    if (typeof top !== "number" || !Number.isInteger(top) || top < 0) {
      throw new RequestValidationError("'top_logprobs' must be a non-negative integer", "top_logprobs");
    }
    if (top > maxTopLogprobs) {
      throw new RequestValidationError(`'top_logprobs' must be at most ${maxTopLogprobs}`, "top_logprobs");
    }
    if (!logprobs) {
      throw new RequestValidationError("'top_logprobs' requires 'logprobs' to be true", "top_logprobs");
    }
    return top;
  }
  return logprobs ? 0 : null;
}

export function buildGenerationRequest(body: unknown, settings: RequestSettings): GenerationRequest {
  if (!isRecord(body)) {
    throw new RequestValidationError("Request body must be a JSON object");
  }

  const model = body["model"];
  if (model !== undefined && model !== null && typeof model !== "string") {
    throw new RequestValidationError("'model' must be a string", "model");
  }

  const messages = parseMessages(body["messages"]);
  const sampling = parseSampling(body, settings.defaults);

  const maxTokens = aliased(body, "max_tokens", "max_completion_tokens", optionalInteger) ?? settings.defaults.maxTokens;
  if (maxTokens < 1) {
    throw new RequestValidationError("'max_tokens' must be at least 1", "max_tokens");
  }

  const tools = parseTools(body["tools"]);
  const toolChoice = parseToolChoice(body["tool_choice"], tools);

  const streamOptions = body["stream_options"];
  const includeUsage = isRecord(streamOptions) && streamOptions["include_usage"] === true;

  return Object.freeze({
    model: typeof model === "string" && model !== "" ? model : null,
    messages,
    sampling: Object.freeze(sampling),
    stop: mergeStopSequences(body["stop"], settings.defaults.stop),
    maxTokens,
    tools,
    toolChoice,
    responseFormat: parseResponseFormat(body["response_format"]),
    stream: optionalBoolean(body, "stream") ?? false,
    includeUsage,
    topLogprobs: parseLogprobs(body, settings.maxTopLogprobs),
  });
}
