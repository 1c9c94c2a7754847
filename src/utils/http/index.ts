/**
 * HTTP Module
 *
 * Header building, SSE framing and error responses shared by the handlers.
 */

export { buildRemoteHeaders } from "./headerUtils.js";
export { formatSSEChunk, SSE_DONE, SSE_HEADERS } from "./sseUtils.js";
export { readSSEData, streamToString } from "./streamUtils.js";
export { SseTimingsInjector } from "./sseTimingsInjector.js";
export {
  createOpenAIErrorPayload,
  detectHTTPError,
  extractErrorMessage,
  handleStreamingBackendError,
  sendHTTPError,
  sendOpenAIError,
  sendValidationError,
  toHTTPError,
} from "./errorResponseHandler.js";
export type { JsonResponseWriter, StreamResponseWriter } from "./responseWriter.js";
