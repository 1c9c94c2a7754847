import { logger, logRequest, logResponse } from "../logging/index.js";
import { proxyChatCompletion } from "../server/remoteProxy.js";
import { sendHTTPError, sendValidationError } from "../utils/http/errorResponseHandler.js";
import { isRecord } from "../utils/typeGuards.js";

import { runNonStreamingCompletion } from "./nonStreamingHandler.js";
import { buildGenerationRequest } from "./payloadHandler.js";
import { ResponseAssembler } from "./stream/ResponseAssembler.js";
import { handleStreamingCompletion } from "./streamingHandler.js";

import type { HandlerContext } from "./handlerContext.js";
import type { Request, RequestHandler, Response } from "express";

/**
 * Chat completions handler - thin HTTP adapter.
 *
 * Routing happens before validation so remote models receive the client's
 * body untouched; local requests are validated, then handed to the
 * generation service and drained by the streaming or non-streaming writer.
 */
export function createChatHandler(context: HandlerContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const startedAt = Date.now();
    logRequest(req, "CHAT COMPLETIONS");

    const body: unknown = req.body;
    if (!isRecord(body)) {
      sendValidationError(res, "Request body must be a JSON object", "CHAT COMPLETIONS");
      logResponse(400, "CHAT COMPLETIONS", Date.now() - startedAt);
      return;
    }
    const requestedModel = typeof body["model"] === "string" ? body["model"] : null;

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    try {
      const target = await context.router.resolve(requestedModel);

      if (target.kind === "remote") {
        await proxyChatCompletion(req, res, target.remote, target.model, body, { timeout: context.connectionTimeout });
        logResponse(res.statusCode, "CHAT COMPLETIONS (REMOTE)", Date.now() - startedAt);
        return;
      }

      const request = buildGenerationRequest(body, context.requestSettings);

      timer = setTimeout(() => {
        logger.warn(`[CHAT] Generation exceeded ${context.generationTimeoutMs}ms; aborting`);
        controller.abort();
      }, context.generationTimeoutMs);
      res.on("close", () => {
        if (!res.writableEnded) {
          logger.debug("[CHAT] Client disconnected; aborting generation");
          controller.abort();
        }
      });

      const run = await context.generation.start(request, target.backend, target.model, controller);
      const assembler = new ResponseAssembler(target.responseModel, target.backend.id);

      if (request.stream) {
        await handleStreamingCompletion(res, run, assembler, { includeUsage: request.includeUsage });
      } else {
        const completion = await runNonStreamingCompletion(run, assembler);
        res.status(200).json(completion);
      }
      logResponse(res.statusCode, "CHAT COMPLETIONS", Date.now() - startedAt);
    } catch (error: unknown) {
      if (res.headersSent) {
        logger.error("[CHAT] Error after response started:", error);
        if (!res.writableEnded) {
          res.end();
        }
        return;
      }
      sendHTTPError(res, error, "CHAT COMPLETIONS");
      logResponse(res.statusCode, "CHAT COMPLETIONS", Date.now() - startedAt);
    } finally {
      clearTimeout(timer);
    }
  };
}
