/**
 * Model Fetcher
 *
 * Lists the models a remote OpenAI-compatible backend publishes at `/v1/models`.
 */

import axios from "axios";

import { OPENAI_ENDPOINTS } from "../constants/endpoints.js";
import { logger } from "../logging/index.js";
import { buildRemoteHeaders } from "../utils/http/index.js";
import { getCurrentTimestamp } from "../utils/ids.js";
import { isRecord, readNumber, readString } from "../utils/typeGuards.js";

import type { RemoteBackend } from "./contracts.js";
import type { OpenAIModel } from "../types/openai.js";

export function remoteUrl(remote: RemoteBackend, path: string): string {
  return `${remote.baseUrl.replace(/\/+$/, "")}${path}`;
}

export async function fetchRemoteModels(remote: RemoteBackend, timeout = 30_000): Promise<OpenAIModel[]> {
  const url = remoteUrl(remote, OPENAI_ENDPOINTS.MODELS);
  logger.debug(`[MODEL FETCHER] Fetching models from ${remote.name} (${url})`);

  const response = await axios.get<unknown>(url, {
    headers: buildRemoteHeaders(remote.apiKey),
    timeout,
  });

  const data = isRecord(response.data) ? response.data["data"] : undefined;
  if (!Array.isArray(data)) {
    throw new Error(`Invalid /v1/models response from ${remote.name}: expected a data array`);
  }

  const models: OpenAIModel[] = [];
  for (const entry of data) {
    if (!isRecord(entry)) { continue; }
    const id = readString(entry, "id");
    if (id === undefined) { continue; }
    models.push({
      id,
      object: "model",
      created: readNumber(entry, "created") ?? getCurrentTimestamp(),
      owned_by: remote.name,
    });
  }

  logger.debug(`[MODEL FETCHER] ${remote.name} publishes ${models.length} models`);
  return models;
}
