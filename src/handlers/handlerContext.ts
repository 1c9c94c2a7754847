import type { GenerationService, RouterService } from "../services/contracts.js";
import type { RequestSettings } from "./payloadHandler.js";

/**
 * Everything a route handler needs, injected by `createApp` so tests can
 * substitute services.
 */
export interface HandlerContext {
  router: RouterService;
  generation: GenerationService;
  requestSettings: RequestSettings;
  generationTimeoutMs: number;
  connectionTimeout: number;
}
