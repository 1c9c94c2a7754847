/**
 * GET /props - llama.cpp server properties, so the llama.cpp web UI and
 * similar clients can talk to localrelay. `?model=` picks the backend;
 * remote backends answer with their own /props.
 */

import { APP_NAME, APP_VERSION } from "../config.js";
import { fetchRemoteProps } from "../server/remoteProxy.js";
import { sendHTTPError } from "../utils/http/errorResponseHandler.js";

import type { HandlerContext } from "./handlerContext.js";
import type { GenerationDefaults } from "../config.js";
import type { GenerationBackend } from "../types/backend.js";
import type { Request, RequestHandler, Response } from "express";

export interface ServerProps {
  default_generation_settings: {
    n_ctx: number;
    params: Record<string, number | string[]>;
  };
  total_slots: number;
  model_path: string;
  modalities: { vision: boolean; audio: boolean };
  chat_template: string;
  build_info: string;
}

function samplingParams(defaults: GenerationDefaults): Record<string, number | string[]> {
  const params: Record<string, number | string[]> = {
    n_predict: defaults.maxTokens,
    stop: defaults.stop,
  };
  if (defaults.temperature !== undefined) { params["temperature"] = defaults.temperature; }
  if (defaults.topP !== undefined) { params["top_p"] = defaults.topP; }
  if (defaults.topK !== undefined) { params["top_k"] = defaults.topK; }
  if (defaults.minP !== undefined) { params["min_p"] = defaults.minP; }
  if (defaults.repetitionPenalty !== undefined) { params["repeat_penalty"] = defaults.repetitionPenalty; }
  if (defaults.presencePenalty !== undefined) { params["presence_penalty"] = defaults.presencePenalty; }
  if (defaults.seed !== undefined) { params["seed"] = defaults.seed; }
  return params;
}

export function buildServerProps(backend: GenerationBackend, defaults: GenerationDefaults): ServerProps {
  return {
    default_generation_settings: {
      n_ctx: backend.contextLength,
      params: samplingParams(defaults),
    },
    // Requests are serialized per backend, so each engine exposes one slot.
    total_slots: 1,
    model_path: backend.model,
    modalities: { vision: false, audio: false },
    chat_template: backend.template,
    build_info: `${APP_NAME} ${APP_VERSION}`,
  };
}

export function createPropsHandler(context: HandlerContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const requested = req.query["model"];
    try {
      const target = await context.router.resolve(typeof requested === "string" ? requested : null);
      if (target.kind === "remote") {
        res.json(await fetchRemoteProps(target.remote, context.connectionTimeout));
        return;
      }
      res.json(buildServerProps(target.backend, context.requestSettings.defaults));
    } catch (error: unknown) {
      sendHTTPError(res, error, "PROPS");
    }
  };
}
