import { ServerResponse } from "http";

import { createProxyMiddleware } from "http-proxy-middleware";

import { OPENAI_ENDPOINTS } from "../constants/endpoints.js";
import { logger } from "../logging/index.js";
import { buildRemoteHeaders } from "../utils/http/index.js";

import type { RemoteBackend } from "../services/contracts.js";
import type { Request, RequestHandler, Response } from "express";

/**
 * Gateway pass-through: any `/v1/*` route localrelay does not serve itself is
 * forwarded to the default remote. Mounted after the app's own routes, and
 * before any body parser touches these requests.
 */
export function createGatewayPassthrough(remote: RemoteBackend): RequestHandler {
  return createProxyMiddleware<Request, Response>({
    target: remote.baseUrl,
    changeOrigin: true,
    pathFilter: OPENAI_ENDPOINTS.PASSTHROUGH_PREFIX,

    on: {
      proxyReq: (proxyReq, req) => {
        const headers = buildRemoteHeaders(remote.apiKey, req.headers);
        for (const [key, value] of Object.entries(headers)) {
          proxyReq.setHeader(key, value);
        }
        logger.debug(`[PROXY] ${req.method} ${req.originalUrl} -> ${remote.name}${proxyReq.path}`);
      },

      proxyRes: (proxyRes, req) => {
        logger.debug(
          `[PROXY RESPONSE] Status: ${proxyRes.statusCode ?? "N/A"} (${proxyRes.headers["content-type"] ?? "N/A"}) for ${req.method} ${req.originalUrl}`,
        );
      },

      error: (err, _req, res) => {
        logger.error(`[PROXY] Error forwarding to ${remote.name}:`, err);
        if (!(res instanceof ServerResponse)) {
          res.destroy();
          return;
        }
        if (!res.headersSent) {
          const refused = "code" in err && err.code === "ECONNREFUSED";
          res.statusCode = refused ? 503 : 502;
          res.setHeader("Content-Type", "application/json");
          res.end(JSON.stringify({
            error: {
              message: refused ? `Cannot connect to ${remote.name}` : `Proxy error: ${err.message}`,
              type: "backend_error",
              param: null,
              code: null,
            },
          }));
        } else if (!res.writableEnded) {
          res.end();
        }
      },
    },
  });
}
