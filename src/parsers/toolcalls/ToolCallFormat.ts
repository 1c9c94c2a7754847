/**
 * Tool-call notations understood by the detector. Closed set: a new notation is
 * added by adding a member here and a parser variant in `createToolCallParser`.
 */

export const TOOL_CALL_FORMATS = [
  "json",
  "lfm2",
  "xml_function",
  "glm4",
  "gemma",
  "kimi_k2",
  "minimax_m2",
] as const;

export type ToolCallFormat = (typeof TOOL_CALL_FORMATS)[number];

export const DEFAULT_TOOL_CALL_FORMAT: ToolCallFormat = "json";

const MODEL_TYPE_FORMATS: Readonly<Record<string, ToolCallFormat>> = {
  lfm2: "lfm2",
  lfm2_moe: "lfm2",
  glm4: "glm4",
  glm4_moe: "glm4",
  glm4_moe_lite: "glm4",
  gemma: "gemma",
  qwen3_next: "xml_function",
  qwen3_coder: "xml_function",
};

export function isToolCallFormat(value: unknown): value is ToolCallFormat {
  return typeof value === "string" && (TOOL_CALL_FORMATS as readonly string[]).includes(value);
}

/**
 * Maps a backend's declared model type to its notation. Returns null for model
 * types without a dedicated notation; callers fall back to `json`.
 */
export function inferToolCallFormat(modelType: string | null): ToolCallFormat | null {
  if (modelType === null) {
    return null;
  }
  return MODEL_TYPE_FORMATS[modelType.toLowerCase()] ?? null;
}

/**
 * Explicit configuration wins over inference; `json` is the last resort.
 */
export function resolveToolCallFormat(
  explicit: ToolCallFormat | null,
  modelType: string | null,
): ToolCallFormat {
  return explicit ?? inferToolCallFormat(modelType) ?? DEFAULT_TOOL_CALL_FORMAT;
}
