/**
 * Chat templates: render an OpenAI message list into the raw prompt string a
 * local engine completes. Assistant tool calls are written back in the
 * backend's own tool-call notation so the model sees its history verbatim.
 */

import { TemplateRenderError } from "../utils/errors.js";
import { isSystemLike, messageText } from "../utils/promptUtils.js";

import type { ToolCallParser } from "../parsers/toolcalls/index.js";
import type { OpenAIMessage, OpenAIToolCall } from "../types/openai.js";

export const CHAT_TEMPLATES = ["chatml", "llama3", "gemma"] as const;

export type ChatTemplateName = (typeof CHAT_TEMPLATES)[number];

export interface RenderOptions {
  toolParser: ToolCallParser;
}

export function isChatTemplateName(value: string): value is ChatTemplateName {
  return (CHAT_TEMPLATES as readonly string[]).includes(value);
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // not JSON; rendered with no arguments
  }
  return {};
}

function renderToolCalls(calls: readonly OpenAIToolCall[], parser: ToolCallParser): string {
  return calls.map((call) => parser.renderCall(call.function.name, parseArguments(call.function.arguments))).join("\n");
}

/** Assistant text followed by its tool calls, if any. */
function assistantBody(message: OpenAIMessage, parser: ToolCallParser): string {
  const text = messageText(message.content);
  const calls = message.tool_calls ?? [];
  if (calls.length === 0) { return text; }
  const rendered = renderToolCalls(calls, parser);
  return text === "" ? rendered : `${text}\n${rendered}`;
}

function renderChatML(messages: readonly OpenAIMessage[], options: RenderOptions): string {
  let prompt = "";
  for (const message of messages) {
    switch (message.role) {
      case "system":
      case "developer":
        prompt += `<|im_start|>system\n${messageText(message.content)}<|im_end|>\n`;
        break;
      case "user":
        prompt += `<|im_start|>user\n${messageText(message.content)}<|im_end|>\n`;
        break;
      case "assistant":
        prompt += `<|im_start|>assistant\n${assistantBody(message, options.toolParser)}<|im_end|>\n`;
        break;
      case "tool":
        prompt += `<|im_start|>user\n<tool_response>\n${messageText(message.content)}\n</tool_response><|im_end|>\n`;
        break;
    }
  }
  return `${prompt}<|im_start|>assistant\n`;
}

function renderLlama3(messages: readonly OpenAIMessage[], options: RenderOptions): string {
  const turn = (role: string, body: string): string =>
    `<|start_header_id|>${role}<|end_header_id|>\n\n${body}<|eot_id|>`;

  let prompt = "<|begin_of_text|>";
  for (const message of messages) {
    switch (message.role) {
      case "system":
      case "developer":
        prompt += turn("system", messageText(message.content));
        break;
      case "user":
        prompt += turn("user", messageText(message.content));
        break;
      case "assistant":
        prompt += turn("assistant", assistantBody(message, options.toolParser));
        break;
      case "tool":
        prompt += turn("ipython", messageText(message.content));
        break;
    }
  }
  return `${prompt}<|start_header_id|>assistant<|end_header_id|>\n\n`;
}

/**
 * Gemma has no system role: a leading system message is folded into the
 * first user turn. Turns must alternate user/model starting with user.
 */
function renderGemma(messages: readonly OpenAIMessage[], options: RenderOptions): string {
  let systemText: string | null = null;
  let rest = messages;

  const first = messages[0];
  if (first !== undefined && isSystemLike(first)) {
    systemText = messageText(first.content);
    rest = messages.slice(1);
  }

  if (rest.length === 0 && systemText !== null) {
    return `<bos><start_of_turn>user\n${systemText}<end_of_turn>\n<start_of_turn>model\n`;
  }

  let prompt = "<bos>";
  rest.forEach((message, index) => {
    if (isSystemLike(message)) {
      throw new TemplateRenderError("gemma template only supports a system message as the first message");
    }
    const role = message.role === "assistant" ? "model" : "user";
    const expected = index % 2 === 0 ? "user" : "model";
    if (role !== expected) {
      throw new TemplateRenderError("gemma template requires conversation roles to alternate user/assistant/user/assistant");
    }

    let body: string;
    if (message.role === "assistant") {
      body = assistantBody(message, options.toolParser);
    } else if (message.role === "tool") {
      body = `<tool_response>\n${messageText(message.content)}\n</tool_response>`;
    } else {
      body = messageText(message.content);
    }
    if (index === 0 && systemText !== null && systemText !== "") {
      body = `${systemText}\n\n${body}`;
    }
    prompt += `<start_of_turn>${role}\n${body}<end_of_turn>\n`;
  });

  return `${prompt}<start_of_turn>model\n`;
}

export function renderChatPrompt(
  template: ChatTemplateName,
  messages: readonly OpenAIMessage[],
  options: RenderOptions,
): string {
  switch (template) {
    case "chatml":
      return renderChatML(messages, options);
    case "llama3":
      return renderLlama3(messages, options);
    case "gemma":
      return renderGemma(messages, options);
  }
}
