/**
 * Remote dispatch for gateway mode: forwards a chat completion to a remote
 * OpenAI-compatible backend with `model` rewritten, and pipes the response
 * back. JSON passes unchanged; an SSE stream gets `timings` on its last
 * event when the remote sent none.
 */

import { pipeline } from "stream/promises";

import axios from "axios";

import { LLAMA_SERVER_ENDPOINTS, OPENAI_ENDPOINTS } from "../constants/endpoints.js";
import { logger } from "../logging/index.js";
import { toBackendError } from "../services/backends/index.js";
import { remoteUrl } from "../services/modelFetcher.js";
import { SseTimingsInjector, buildRemoteHeaders } from "../utils/http/index.js";

import type { RemoteBackend } from "../services/contracts.js";
import type { Request, Response } from "express";
import type { Readable } from "stream";

export interface RemoteProxyOptions {
  timeout: number;
  /** Millisecond clock for injected timings; defaults to Date.now. */
  clock?: () => number;
}

export async function proxyChatCompletion(
  req: Request,
  res: Response,
  remote: RemoteBackend,
  model: string,
  body: Record<string, unknown>,
  options: RemoteProxyOptions,
): Promise<void> {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });

  const url = remoteUrl(remote, OPENAI_ENDPOINTS.CHAT_COMPLETIONS);
  logger.debug(`[REMOTE PROXY] POST ${url} model=${model} stream=${body["stream"] === true}`);

  let upstream;
  try {
    upstream = await axios.post<Readable>(url, { ...body, model }, {
      headers: buildRemoteHeaders(remote.apiKey, req.headers),
      responseType: "stream",
      signal: controller.signal,
      timeout: options.timeout,
      // Upstream errors are relayed to the client as they are.
      validateStatus: () => true,
    });
  } catch (error: unknown) {
    throw await toBackendError(remote.name, error);
  }

  res.status(upstream.status);
  const contentType = upstream.headers["content-type"];
  if (typeof contentType === "string") {
    res.setHeader("Content-Type", contentType);
  }
  const isEventStream = typeof contentType === "string" && contentType.includes("text/event-stream");
  if (isEventStream) {
    res.setHeader("Cache-Control", "no-cache");
    res.flushHeaders();
  }

  try {
    if (isEventStream) {
      await pipeline(upstream.data, new SseTimingsInjector(options.clock), res);
    } else {
      await pipeline(upstream.data, res);
    }
  } catch (error: unknown) {
    if (controller.signal.aborted) {
      logger.debug(`[REMOTE PROXY] Client disconnected from ${remote.name} stream`);
      return;
    }
    logger.error(`[REMOTE PROXY] Relay from ${remote.name} failed:`, error);
    if (!res.writableEnded) {
      res.end();
    }
  }
}

export async function fetchRemoteProps(remote: RemoteBackend, timeout: number): Promise<unknown> {
  try {
    const response = await axios.get<unknown>(remoteUrl(remote, LLAMA_SERVER_ENDPOINTS.PROPS), {
      headers: buildRemoteHeaders(remote.apiKey),
      timeout,
    });
    return response.data;
  } catch (error: unknown) {
    throw await toBackendError(remote.name, error);
  }
}
