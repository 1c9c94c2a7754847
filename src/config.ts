import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import { createLogger } from "./logging/configLogger.js";

import { TOOL_CALL_FORMATS } from "./parsers/toolcalls/ToolCallFormat.js";
import { CHAT_TEMPLATES } from "./templates/chatTemplates.js";

import type { ToolCallFormat } from "./parsers/toolcalls/ToolCallFormat.js";
import type { ChatTemplateName } from "./templates/chatTemplates.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type LocalBackendKind = "native" | "tensor";

export interface LocalBackendConfig {
  enabled: boolean;
  baseUrl: string;
  model: string;
  alias: string | null;
  template: ChatTemplateName;
  modelType: string | null;
  toolCallParser: ToolCallFormat | null;
  contextLength: number;
}

export interface TensorBackendConfig extends LocalBackendConfig {
  slot: number;
}

export interface RemoteBackendConfig {
  name: string;
  baseUrl: string;
  apiKeyEnv?: string;
}

export interface GenerationDefaults {
  temperature?: number;
  topP?: number;
  topK?: number;
  minP?: number;
  repetitionPenalty?: number;
  presencePenalty?: number;
  seed?: number;
  maxTokens: number;
  stop: string[];
}

export interface ReasoningConfig {
  enabled: boolean;
  openTag: string;
  closeTag: string;
  startInReasoning: boolean;
}

interface LocalRelayConfig {
  server: {
    host: string;
    port: string;
    debug: boolean;
  };
  generation: GenerationDefaults;
  reasoning: ReasoningConfig;
  tools: {
    toolCallParser: ToolCallFormat | null;
  };
  structuredOutput: {
    jsonSchema: Record<string, unknown> | null;
  };
  limits: {
    maxTopLogprobs: number;
    maxToolCallBufferSize: number;
  };
  backends: {
    default: LocalBackendKind;
    native: LocalBackendConfig;
    tensor: TensorBackendConfig;
    remotes: RemoteBackendConfig[];
  };
  gateway: {
    enabled: boolean;
    modelRefreshMs: number;
    /** List the well-known local servers (Ollama, LM Studio, Jan) as remotes. */
    discoverLocal: boolean;
  };
  performance: {
    connectionTimeout: number;
    generationTimeoutMs: number;
  };
}

export const APP_NAME = "localrelay";
export const APP_VERSION = "0.4.0";

const DEFAULT_CONFIG: LocalRelayConfig = {
  server: {
    host: "127.0.0.1",
    port: "9999",
    debug: false,
  },
  generation: {
    maxTokens: 4096,
    stop: [],
  },
  reasoning: {
    enabled: true,
    openTag: "<think>",
    closeTag: "</think>",
    startInReasoning: false,
  },
  tools: {
    toolCallParser: null,
  },
  structuredOutput: {
    jsonSchema: null,
  },
  limits: {
    maxTopLogprobs: 20,
    maxToolCallBufferSize: 64 * 1024,
  },
  backends: {
    default: "native",
    native: {
      enabled: true,
      baseUrl: "http://127.0.0.1:11434",
      model: "llama3.2:3b",
      alias: "foundation",
      template: "llama3",
      modelType: null,
      toolCallParser: null,
      contextLength: 8192,
    },
    tensor: {
      enabled: false,
      baseUrl: "http://127.0.0.1:8080",
      model: "default",
      alias: null,
      template: "chatml",
      modelType: null,
      toolCallParser: null,
      contextLength: 32768,
      slot: 0,
    },
    remotes: [],
  },
  gateway: {
    enabled: false,
    modelRefreshMs: 30_000,
    discoverLocal: false,
  },
  performance: {
    connectionTimeout: 120_000,
    generationTimeoutMs: 600_000,
  },
};

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function loadConfigFromFile(): DeepPartial<LocalRelayConfig> {
  try {
    const configPath = join(process.cwd(), "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<LocalRelayConfig>;
  } catch (error: unknown) {
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

const fileConfig = loadConfigFromFile();

const debugMode = fileConfig.server?.debug ?? DEFAULT_CONFIG.server.debug;
const logger = createLogger(debugMode);

function resolveRemotes(
  remotes: ReadonlyArray<DeepPartial<RemoteBackendConfig> | undefined> | undefined,
): RemoteBackendConfig[] {
  if (!Array.isArray(remotes)) {
    return DEFAULT_CONFIG.backends.remotes;
  }
  return remotes.map((remote) => {
    const resolved: RemoteBackendConfig = {
      name: remote?.name ?? "",
      baseUrl: remote?.baseUrl ?? "",
    };
    if (remote?.apiKeyEnv !== undefined) {
      resolved.apiKeyEnv = remote.apiKeyEnv;
    }
    return resolved;
  });
}

export const config: LocalRelayConfig = {
  server: { ...DEFAULT_CONFIG.server, ...fileConfig.server },
  generation: {
    ...DEFAULT_CONFIG.generation,
    ...fileConfig.generation,
    stop: (fileConfig.generation?.stop ?? DEFAULT_CONFIG.generation.stop).filter(
      (entry): entry is string => typeof entry === "string",
    ),
  },
  reasoning: { ...DEFAULT_CONFIG.reasoning, ...fileConfig.reasoning },
  tools: { ...DEFAULT_CONFIG.tools, ...fileConfig.tools },
  structuredOutput: {
    jsonSchema: fileConfig.structuredOutput?.jsonSchema ?? DEFAULT_CONFIG.structuredOutput.jsonSchema,
  },
  limits: { ...DEFAULT_CONFIG.limits, ...fileConfig.limits },
  backends: {
    default: fileConfig.backends?.default ?? DEFAULT_CONFIG.backends.default,
    native: { ...DEFAULT_CONFIG.backends.native, ...fileConfig.backends?.native },
    tensor: { ...DEFAULT_CONFIG.backends.tensor, ...fileConfig.backends?.tensor },
    remotes: resolveRemotes(fileConfig.backends?.remotes),
  },
  gateway: { ...DEFAULT_CONFIG.gateway, ...fileConfig.gateway },
  performance: { ...DEFAULT_CONFIG.performance, ...fileConfig.performance },
};

// ============================================================================
// SERVER (config.json; env may override the port)
// ============================================================================

export const SERVER_PORT = Number(getEnv("LOCALRELAY_PORT") ?? config.server.port);
export const SERVER_HOST = config.server.host;
export const DEBUG_MODE = config.server.debug;

// ============================================================================
// BACKENDS (config.json; env may override local URLs, secrets come from env only)
// ============================================================================

export const NATIVE_BACKEND: LocalBackendConfig = {
  ...config.backends.native,
  baseUrl: getEnv("NATIVE_BACKEND_URL") ?? config.backends.native.baseUrl,
};

export const TENSOR_BACKEND: TensorBackendConfig = {
  ...config.backends.tensor,
  baseUrl: getEnv("TENSOR_BACKEND_URL") ?? config.backends.tensor.baseUrl,
};

export const DEFAULT_BACKEND: LocalBackendKind = config.backends.default;
export const REMOTE_BACKENDS = config.backends.remotes;

export function resolveRemoteApiKey(remote: RemoteBackendConfig): string | undefined {
  return remote.apiKeyEnv === undefined ? undefined : getEnv(remote.apiKeyEnv);
}

export const GATEWAY_ENABLED = config.gateway.enabled;
export const GATEWAY_MODEL_REFRESH_MS = config.gateway.modelRefreshMs;
export const GATEWAY_DISCOVER_LOCAL = config.gateway.discoverLocal;

// ============================================================================
// PIPELINE
// ============================================================================

export const GENERATION_DEFAULTS = config.generation;
export const REASONING_CONFIG = config.reasoning;
export const TOOL_CALL_PARSER = config.tools.toolCallParser;
export const GUIDED_JSON_SCHEMA = config.structuredOutput.jsonSchema;
export const MAX_TOP_LOGPROBS = config.limits.maxTopLogprobs;
export const MAX_TOOL_CALL_BUFFER_SIZE = config.limits.maxToolCallBufferSize;

// ============================================================================
// PERFORMANCE
// ============================================================================

export const CONNECTION_TIMEOUT = config.performance.connectionTimeout;
export const GENERATION_TIMEOUT_MS = config.performance.generationTimeoutMs;

const KNOWN_TEMPLATES: readonly string[] = CHAT_TEMPLATES;
const KNOWN_PARSERS: readonly string[] = TOOL_CALL_FORMATS;

export function validateConfig(): void {
  const errors: string[] = [];

  if (Number.isNaN(SERVER_PORT) || SERVER_PORT < 1 || SERVER_PORT > 65_535) {
    errors.push("server.port must be a valid port number between 1 and 65535");
  }

  if (!NATIVE_BACKEND.enabled && !TENSOR_BACKEND.enabled) {
    errors.push("At least one local backend (backends.native or backends.tensor) must be enabled");
  }

  const defaultBackend = DEFAULT_BACKEND === "native" ? NATIVE_BACKEND : TENSOR_BACKEND;
  if (!defaultBackend.enabled) {
    errors.push(`backends.default is "${DEFAULT_BACKEND}" but that backend is disabled`);
  }

  for (const [name, backend] of [["native", NATIVE_BACKEND], ["tensor", TENSOR_BACKEND]] as const) {
    if (!backend.enabled) { continue; }
    if (!KNOWN_TEMPLATES.includes(backend.template)) {
      errors.push(`backends.${name}.template must be one of: ${KNOWN_TEMPLATES.join(", ")}. Got: ${backend.template}`);
    }
    if (backend.toolCallParser !== null && !KNOWN_PARSERS.includes(backend.toolCallParser)) {
      errors.push(`backends.${name}.toolCallParser must be one of: ${KNOWN_PARSERS.join(", ")}`);
    }
    if (backend.baseUrl === "") {
      errors.push(`backends.${name}.baseUrl is required`);
    }
  }

  if (TOOL_CALL_PARSER !== null && !KNOWN_PARSERS.includes(TOOL_CALL_PARSER)) {
    errors.push(`tools.toolCallParser must be one of: ${KNOWN_PARSERS.join(", ")}. Got: ${TOOL_CALL_PARSER}`);
  }

  if (!Number.isInteger(MAX_TOP_LOGPROBS) || MAX_TOP_LOGPROBS < 0) {
    errors.push("limits.maxTopLogprobs must be a non-negative integer");
  }

  REMOTE_BACKENDS.forEach((remote, index) => {
    if (remote.name === "" || remote.baseUrl === "") {
      errors.push(`backends.remotes[${index}] needs both a name and a baseUrl`);
    }
  });

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.info("Configuration (config.json):");
  logger.info(`  Default backend: ${DEFAULT_BACKEND.toUpperCase()}`);
  logger.info(`  Native engine: ${NATIVE_BACKEND.enabled ? `${NATIVE_BACKEND.baseUrl} (${NATIVE_BACKEND.model})` : "disabled"}`);
  logger.info(`  Tensor engine: ${TENSOR_BACKEND.enabled ? `${TENSOR_BACKEND.baseUrl} (${TENSOR_BACKEND.model})` : "disabled"}`);
  logger.info(`  Gateway mode: ${GATEWAY_ENABLED ? `enabled (${REMOTE_BACKENDS.length} remote backends${GATEWAY_DISCOVER_LOCAL ? ", local discovery on" : ""})` : "disabled"}`);
  logger.info(`  Default stop sequences: ${GENERATION_DEFAULTS.stop.length}`);
  logger.debug(`  Reasoning markers: ${REASONING_CONFIG.openTag} ... ${REASONING_CONFIG.closeTag}`);
}
