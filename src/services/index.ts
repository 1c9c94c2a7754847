/**
 * Service Layer Exports
 *
 * Wires the configured services once. Handlers receive them through
 * `createApp`; tests build their own instances.
 */

import {
  CONNECTION_TIMEOUT,
  DEFAULT_BACKEND,
  GATEWAY_DISCOVER_LOCAL,
  GATEWAY_ENABLED,
  GATEWAY_MODEL_REFRESH_MS,
  GUIDED_JSON_SCHEMA,
  MAX_TOOL_CALL_BUFFER_SIZE,
  NATIVE_BACKEND,
  REASONING_CONFIG,
  REMOTE_BACKENDS,
  SERVER_PORT,
  TENSOR_BACKEND,
  TOOL_CALL_PARSER,
  resolveRemoteApiKey,
} from "../config.js";

import { discoverLocalServers } from "./backendDiscovery.js";
import { createLocalBackends } from "./backends/index.js";
import { GenerationServiceImpl } from "./generationService.js";
import { GuidedOutputServiceImpl } from "./guidedOutputService.js";
import { PromptPrefixCache } from "./promptCache/index.js";
import { RouterServiceImpl } from "./routerService.js";

import type { GenerationService, GuidedOutputService, RemoteBackend, RouterService } from "./contracts.js";

export interface Services {
  router: RouterService;
  generation: GenerationService;
}

function configuredRemotes(): RemoteBackend[] {
  return REMOTE_BACKENDS.map((remote) => {
    const apiKey = resolveRemoteApiKey(remote);
    return apiKey === undefined
      ? { name: remote.name, baseUrl: remote.baseUrl }
      : { name: remote.name, baseUrl: remote.baseUrl, apiKey };
  });
}

export function createServices(): Services {
  const guidedOutput: GuidedOutputService = new GuidedOutputServiceImpl(GUIDED_JSON_SCHEMA);

  const remotes = configuredRemotes();
  const exclude = [NATIVE_BACKEND.baseUrl, TENSOR_BACKEND.baseUrl, ...remotes.map((remote) => remote.baseUrl)];

  const router = new RouterServiceImpl({
    backends: createLocalBackends({
      native: NATIVE_BACKEND,
      tensor: TENSOR_BACKEND,
      connectionTimeout: CONNECTION_TIMEOUT,
    }),
    defaultBackendId: DEFAULT_BACKEND,
    remotes,
    gatewayEnabled: GATEWAY_ENABLED,
    modelRefreshMs: GATEWAY_MODEL_REFRESH_MS,
    ...(GATEWAY_DISCOVER_LOCAL ? { discover: () => discoverLocalServers({ selfPort: SERVER_PORT, exclude }) } : {}),
  });

  const generation = new GenerationServiceImpl({
    cache: new PromptPrefixCache(),
    guidedOutput,
    reasoning: REASONING_CONFIG,
    toolCallParser: TOOL_CALL_PARSER,
    maxToolCallBufferSize: MAX_TOOL_CALL_BUFFER_SIZE,
  });

  return { router, generation };
}

export { GenerationServiceImpl } from "./generationService.js";
export { GuidedOutputServiceImpl, extractJsonObject } from "./guidedOutputService.js";
export { RouterServiceImpl } from "./routerService.js";
export { KNOWN_LOCAL_SERVERS, discoverLocalServers } from "./backendDiscovery.js";
export { KeyedLock, PromptPrefixCache } from "./promptCache/index.js";

export type {
  BackendHealth,
  GenerationRun,
  GenerationService,
  GuidedOutputPlan,
  GuidedOutputService,
  HealthReport,
  RemoteBackend,
  RouteTarget,
  RouterService,
} from "./contracts.js";
