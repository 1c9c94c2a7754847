import { LlamaServerBackend } from "./LlamaServerBackend.js";
import { OllamaBackend } from "./OllamaBackend.js";

import type { LocalBackendConfig, TensorBackendConfig } from "../../config.js";
import type { GenerationBackend } from "../../types/backend.js";

export interface LocalBackendSettings {
  native: LocalBackendConfig;
  tensor: TensorBackendConfig;
  connectionTimeout: number;
}

/** Instantiates every enabled local engine. */
export function createLocalBackends(settings: LocalBackendSettings): GenerationBackend[] {
  const backends: GenerationBackend[] = [];
  if (settings.native.enabled) {
    backends.push(new OllamaBackend(settings.native));
  }
  if (settings.tensor.enabled) {
    backends.push(new LlamaServerBackend(settings.tensor, { connectionTimeout: settings.connectionTimeout }));
  }
  return backends;
}

export { LlamaServerBackend } from "./LlamaServerBackend.js";
export type { LlamaServerBackendOptions } from "./LlamaServerBackend.js";
export { OllamaBackend } from "./OllamaBackend.js";
export type { OllamaBackendOptions, OllamaClient, OllamaGenerateChunk } from "./OllamaBackend.js";
export { estimateTokens } from "./estimateTokens.js";
export { toBackendError } from "./backendErrors.js";
