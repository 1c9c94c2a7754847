/**
 * OpenAI /v1/models handlers
 *
 * Local engines, their aliases and (in gateway mode) every remote's models,
 * in the OpenAI `list` shape.
 */

import { logger } from "../logging/index.js";
import { ModelNotFoundError } from "../utils/errors.js";
import { sendHTTPError } from "../utils/http/errorResponseHandler.js";

import type { RouterService } from "../services/contracts.js";
import type { OpenAIModelsListResponse } from "../types/openai.js";
import type { Request, RequestHandler, Response } from "express";

export function createModelsHandler(router: RouterService): RequestHandler {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const data = await router.listModels();
      logger.debug(`[OPENAI MODELS] Listing ${data.length} models`);
      const response: OpenAIModelsListResponse = { object: "list", data };
      res.json(response);
    } catch (error: unknown) {
      sendHTTPError(res, error, "OPENAI MODELS");
    }
  };
}

export function createModelInfoHandler(router: RouterService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const modelId = req.params["model"] ?? "";
    try {
      const models = await router.listModels();
      const model = models.find((entry) => entry.id === modelId);
      if (model === undefined) {
        throw new ModelNotFoundError(modelId);
      }
      res.json(model);
    } catch (error: unknown) {
      sendHTTPError(res, error, "OPENAI MODEL INFO");
    }
  };
}
