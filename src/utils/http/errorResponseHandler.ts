/**
 * Error Response Handler
 *
 * Maps thrown errors onto OpenAI-style error bodies for both the JSON and the
 * SSE response paths. Handlers never build error payloads themselves.
 */

import { logger } from "../../logging/index.js";
import { isApplicationError } from "../errors.js";
import { isRecord } from "../typeGuards.js";

import { formatSSEChunk, SSE_DONE } from "./sseUtils.js";

import type { JsonResponseWriter, StreamResponseWriter } from "./responseWriter.js";
import type { OpenAIErrorBody } from "../../types/openai.js";

export interface HTTPErrorResponse {
  statusCode: number;
  type: string;
  code: string | null;
  param: string | null;
  message: string;
}

/**
 * Maps common transport error patterns to HTTP status codes.
 */
export function detectHTTPError(errorMessage: string): HTTPErrorResponse {
  const msg = errorMessage.toLowerCase();
  const base = { code: null, param: null, message: errorMessage };

  if (msg.includes("econnrefused") || msg.includes("enotfound") || msg.includes("ehostunreach")) {
    return { ...base, statusCode: 503, type: "backend_unavailable", message: `Cannot connect to backend: ${errorMessage}` };
  }

  if (msg.includes("econnreset") || msg.includes("socket hang up") || msg.includes("network error")) {
    return { ...base, statusCode: 502, type: "backend_error" };
  }

  if (msg.includes("timeout") || msg.includes("etimedout")) {
    return { ...base, statusCode: 504, type: "backend_timeout" };
  }

  return { ...base, statusCode: 500, type: "server_error" };
}

/**
 * Extracts a readable message from an unknown thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return "Unknown error (empty response)";
  }

  if (error instanceof Error) {
    return error.message || "Unknown error";
  }

  if (typeof error === "string") {
    return error.trim() || "Unknown error (empty string)";
  }

  if (isRecord(error)) {
    const errorObj = error;

    const messageVal = errorObj["message"];
    if (typeof messageVal === "string" && messageVal.trim()) {
      return messageVal.trim();
    }

    const errorProp = errorObj["error"];
    if (typeof errorProp === "string" && errorProp.trim()) {
      return errorProp.trim();
    }
    if (isRecord(errorProp)) {
      const nestedMessage = errorProp["message"];
      if (typeof nestedMessage === "string" && nestedMessage.trim()) {
        return nestedMessage.trim();
      }
    }

    try {
      const stringified = JSON.stringify(error);
      if (stringified && stringified !== "{}" && stringified !== "[]") {
        return `Error details: ${stringified}`;
      }
    } catch {
      // circular structure; fall through
    }
  }

  return "Unknown error";
}

/**
 * Resolves any thrown value to the status and body it is reported with.
 */
export function toHTTPError(error: unknown): HTTPErrorResponse {
  if (isApplicationError(error)) {
    return {
      statusCode: error.status,
      type: error.type,
      code: error.code,
      param: error.param,
      message: error.message,
    };
  }
  return detectHTTPError(extractErrorMessage(error));
}

export function createOpenAIErrorPayload(httpError: HTTPErrorResponse): OpenAIErrorBody {
  return {
    error: {
      message: httpError.message,
      type: httpError.type,
      param: httpError.param,
      code: httpError.code,
    },
  };
}

export function sendOpenAIError(res: JsonResponseWriter, httpError: HTTPErrorResponse): void {
  res.status(httpError.statusCode).json(createOpenAIErrorPayload(httpError));
}

/**
 * Sends a 400 invalid_request_error.
 */
export function sendValidationError(res: JsonResponseWriter, message: string, context?: string, param: string | null = null): void {
  if (context) {
    logger.warn(`[${context}] Validation error: ${message}`);
  }

  sendOpenAIError(res, {
    statusCode: 400,
    type: "invalid_request_error",
    code: "invalid_value",
    param,
    message,
  });
}

/**
 * Sends an error response for a non-streaming handler.
 */
export function sendHTTPError(res: JsonResponseWriter, error: unknown, context: string): void {
  const httpError = toHTTPError(error);

  if (httpError.statusCode >= 500) {
    logger.error(`[${context}] Error:`, error);
  } else {
    logger.warn(`[${context}] ${httpError.statusCode}: ${httpError.message}`);
  }

  sendOpenAIError(res, httpError);
}

/**
 * Handles a failure on the streaming path.
 *
 * Before headers are sent the client gets a normal JSON error. Once the SSE
 * stream is open, an error chunk is written and the stream is closed with
 * `[DONE]` so clients waiting for the sentinel terminate.
 */
export function handleStreamingBackendError(res: StreamResponseWriter, error: unknown, context: string): void {
  const httpError = toHTTPError(error);
  logger.error(`[${context}] Streaming error: ${httpError.message}`);

  if (!res.headersSent) {
    sendOpenAIError(res, httpError);
  } else if (!res.writableEnded) {
    res.write(formatSSEChunk(createOpenAIErrorPayload(httpError)));
    res.write(SSE_DONE);
    res.end();
  } else {
    logger.debug(`[${context}] Stream already closed; error not delivered`);
  }
}
