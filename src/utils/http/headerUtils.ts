import { logger } from "../../logging/index.js";

import type { IncomingHttpHeaders } from "http";

/** Client headers forwarded to remote backends unchanged. */
const PASSTHROUGH_HEADERS = [
  "openai-organization",
  "openai-project",
  "user-agent",
];

export function buildRemoteHeaders(
  apiKey: string | undefined,
  clientHeaders: IncomingHttpHeaders = {},
): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  if (apiKey !== undefined) {
    headers["Authorization"] = `Bearer ${apiKey}`;
  } else {
    const clientAuth = clientHeaders["authorization"];
    if (typeof clientAuth === "string") {
      headers["Authorization"] = clientAuth;
      logger.debug("[AUTH] No key configured for remote; forwarding client Authorization header");
    }
  }

  for (const name of PASSTHROUGH_HEADERS) {
    const value = clientHeaders[name];
    if (typeof value === "string") {
      headers[name] = value;
    }
  }

  return headers;
}
