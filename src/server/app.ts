import express, { type NextFunction, type Request, type Response } from "express";

import { APP_NAME, APP_VERSION } from "../config.js";
import { OPENAI_ENDPOINTS, SERVICE_ENDPOINTS } from "../constants/endpoints.js";
import { createChatHandler } from "../handlers/chatHandler.js";
import { createHealthHandler } from "../handlers/healthHandler.js";
import { createModelInfoHandler, createModelsHandler } from "../handlers/openaiModelsHandler.js";
import { createPropsHandler } from "../handlers/propsHandler.js";
import { logger } from "../logging/index.js";
import { sendHTTPError, sendValidationError } from "../utils/http/errorResponseHandler.js";
import { isRecord } from "../utils/typeGuards.js";

import { createGatewayPassthrough } from "./genericProxy.js";

import type { HandlerContext } from "../handlers/handlerContext.js";
import type { Express } from "express";

function isBodyParseError(error: unknown): boolean {
  return isRecord(error) && error["type"] === "entity.parse.failed";
}

export function createApp(context: HandlerContext): Express {
  const app = express();

  app.get(SERVICE_ENDPOINTS.ROOT, (_req: Request, res: Response) => {
    res.json({
      name: APP_NAME,
      version: APP_VERSION,
      status: "OK",
      gateway: context.router.gatewayEnabled,
      endpoints: [
        OPENAI_ENDPOINTS.CHAT_COMPLETIONS,
        OPENAI_ENDPOINTS.MODELS,
        OPENAI_ENDPOINTS.MODEL_INFO,
        SERVICE_ENDPOINTS.HEALTH,
        SERVICE_ENDPOINTS.PROPS,
      ],
    });
  });

  // ============================================================================
  // OPENAI-COMPATIBLE API
  // ============================================================================

  app.post(OPENAI_ENDPOINTS.CHAT_COMPLETIONS, express.json({ limit: "50mb" }), createChatHandler(context));
  app.get(OPENAI_ENDPOINTS.MODELS, createModelsHandler(context.router));
  app.get(OPENAI_ENDPOINTS.MODEL_INFO, createModelInfoHandler(context.router));

  // ============================================================================
  // SERVICE ENDPOINTS
  // ============================================================================

  app.get(SERVICE_ENDPOINTS.HEALTH, createHealthHandler(context.router));
  app.get(SERVICE_ENDPOINTS.PROPS, createPropsHandler(context));

  // ============================================================================
  // GATEWAY PASS-THROUGH (other /v1/* endpoints)
  // ============================================================================

  const remote = context.router.defaultRemote;
  if (context.router.gatewayEnabled && remote !== null) {
    app.use(createGatewayPassthrough(remote));
    logger.info(`[SERVER] Gateway pass-through ENABLED: ${OPENAI_ENDPOINTS.PASSTHROUGH_PREFIX}/* -> ${remote.name}`);
  }

  // 404 handler - Express 5 compatible
  app.use((req: Request, res: Response) => {
    logger.warn("[SERVER] 404 Not Found:", req.originalUrl);
    res.status(404).json({
      error: {
        message: `Route ${req.method} ${req.path} is not handled by ${APP_NAME}`,
        type: "invalid_request_error",
        param: null,
        code: "not_found",
      },
    });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParseError(error)) {
      sendValidationError(res, "Request body is not valid JSON", "SERVER");
      return;
    }
    sendHTTPError(res, error, "SERVER");
  });

  return app;
}
