import type { OpenAIMessage, OpenAIMessageContent } from "../types/index.js";

/** Flattens message content to plain text. Non-text parts contribute nothing. */
function messageText(content: OpenAIMessageContent): string {
  if (content === null) { return ""; }
  if (typeof content === "string") { return content; }
  return content
    .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
    .filter((text) => text !== "")
    .join("\n");
}

function isSystemLike(message: OpenAIMessage): boolean {
  return message.role === "system" || message.role === "developer";
}

/**
 * Appends `instruction` to the first system (or developer) message, separated
 * by a blank line. A system message is inserted at index 0 only when the
 * conversation has none, so the result never carries two of them.
 */
function appendSystemInstruction(messages: readonly OpenAIMessage[], instruction: string): OpenAIMessage[] {
  if (instruction === "") { return [...messages]; }

  const systemIndex = messages.findIndex(isSystemLike);
  if (systemIndex === -1) {
    return [{ role: "system", content: instruction }, ...messages];
  }

  return messages.map((message, index) => {
    if (index !== systemIndex) { return message; }
    const existing = messageText(message.content);
    return {
      ...message,
      content: existing === "" ? instruction : `${existing}\n\n${instruction}`,
    };
  });
}

export {
  appendSystemInstruction,
  isSystemLike,
  messageText,
};
