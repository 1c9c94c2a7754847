import type { ToolCallFormat } from "./ToolCallFormat.js";
import type { OpenAITool } from "../../types/openai.js";

export interface ParsedToolCall {
  name: string;
  /** Serialized arguments. Not guaranteed to be valid JSON. */
  arguments: string;
}

export interface ToolCallParser {
  readonly format: ToolCallFormat;
  /** Wrapper tags; both null for inline notations. */
  readonly startTag: string | null;
  readonly endTag: string | null;
  /** Markers that open a call. Tagged notations use their start tag. */
  readonly triggers: readonly string[];
  /** Markers that open a call only at the start of a line; elsewhere they are prose. */
  readonly lineTriggers: readonly string[];

  /**
   * Extracts calls from a captured segment. For tagged notations the segment is
   * the text between the wrapper tags; for inline ones it runs from the trigger
   * to the end of output. An empty result means "no tool call".
   */
  parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[];

  /** Renders one call in this notation, for prompts and conversation history. */
  renderCall(name: string, args: Record<string, unknown>): string;
}

const FUNCTION_NAME = /^[A-Za-z_][\w.\-]*$/;

export abstract class BaseToolCallParser implements ToolCallParser {
  abstract readonly format: ToolCallFormat;
  abstract readonly startTag: string | null;
  abstract readonly endTag: string | null;

  get triggers(): readonly string[] {
    return this.startTag === null ? [] : [this.startTag];
  }

  get lineTriggers(): readonly string[] {
    return [];
  }

  abstract parse(content: string, tools: readonly OpenAITool[]): ParsedToolCall[];
  abstract renderCall(name: string, args: Record<string, unknown>): string;

  protected isValidName(name: string): boolean {
    return FUNCTION_NAME.test(name);
  }

  protected stringifyValue(value: unknown): string {
    return typeof value === "string" ? value : JSON.stringify(value);
  }

  protected wrap(body: string): string {
    return `${this.startTag ?? ""}${body}${this.endTag ?? ""}`;
  }
}
