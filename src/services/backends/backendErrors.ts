import axios from "axios";

import { BackendRequestError } from "../../utils/errors.js";
import { detectHTTPError, extractErrorMessage, streamToString } from "../../utils/http/index.js";

import type { Readable } from "stream";

function isReadable(value: unknown): value is Readable {
  return typeof value === "object" && value !== null && "pipe" in value && "on" in value;
}

async function describeBody(data: unknown): Promise<string> {
  if (isReadable(data)) {
    try {
      return await streamToString(data);
    } catch (streamError: unknown) {
      return `[Could not read error body: ${extractErrorMessage(streamError)}]`;
    }
  }
  if (typeof data === "string") {
    return data;
  }
  return JSON.stringify(data);
}

/**
 * Normalizes a failed backend call. Upstream HTTP failures become 502 with the
 * upstream status and body in the message; transport failures keep the status
 * `detectHTTPError` gives them (503 for refused connections).
 */
export async function toBackendError(backendId: string, error: unknown): Promise<BackendRequestError> {
  if (error instanceof BackendRequestError) {
    return error;
  }
  if (axios.isAxiosError(error) && error.response !== undefined) {
    const body = await describeBody(error.response.data);
    return new BackendRequestError(backendId, `status ${error.response.status}: ${body}`, 502);
  }
  let message = extractErrorMessage(error);
  // fetch-based clients put the socket error in `cause`
  if (error instanceof Error && error.cause !== undefined) {
    message += ` (${extractErrorMessage(error.cause)})`;
  }
  const { statusCode } = detectHTTPError(message);
  return new BackendRequestError(backendId, message, statusCode === 500 ? 502 : statusCode);
}
