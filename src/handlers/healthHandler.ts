import { APP_VERSION } from "../config.js";
import { sendHTTPError } from "../utils/http/errorResponseHandler.js";

import type { RouterService } from "../services/contracts.js";
import type { Request, RequestHandler, Response } from "express";

/** Aggregated health; always 200, `status` says whether every backend answered. */
export function createHealthHandler(router: RouterService): RequestHandler {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const report = await router.health();
      res.json({
        status: report.status,
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        backends: report.backends,
      });
    } catch (error: unknown) {
      sendHTTPError(res, error, "HEALTH");
    }
  };
}
