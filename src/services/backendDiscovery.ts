/**
 * Backend Discovery
 *
 * Looks for OpenAI-compatible servers on their usual loopback ports and
 * reports the ones that answer `/v1/models`. The router treats them as
 * gateway remotes alongside the configured ones.
 */

import { logger } from "../logging/index.js";

import { fetchRemoteModels } from "./modelFetcher.js";

import type { RemoteBackend } from "./contracts.js";
import type { OpenAIModel } from "../types/openai.js";

export interface KnownLocalServer {
  name: string;
  port: number;
}

export const KNOWN_LOCAL_SERVERS: readonly KnownLocalServer[] = [
  { name: "ollama", port: 11434 },
  { name: "lmstudio", port: 1234 },
  { name: "jan", port: 1337 },
];

export interface DiscoveredRemote {
  remote: RemoteBackend;
  models: OpenAIModel[];
}

export interface DiscoveryOptions {
  /** Our own port, never listed. */
  selfPort: number;
  /** Base URLs already served as local engines or configured remotes. */
  exclude: readonly string[];
  timeoutMs?: number;
  servers?: readonly KnownLocalServer[];
  fetchModels?: (remote: RemoteBackend, timeout: number) => Promise<OpenAIModel[]>;
}

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "[::1]"]);

/** Port of a loopback URL, or null for any other host. */
function loopbackPort(baseUrl: string): number | null {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    logger.debug(`[DISCOVERY] Ignoring unparseable URL ${baseUrl}`);
    return null;
  }
  if (!LOOPBACK_HOSTS.has(url.hostname)) {
    return null;
  }
  if (url.port !== "") {
    return Number(url.port);
  }
  return url.protocol === "https:" ? 443 : 80;
}

export async function discoverLocalServers(options: DiscoveryOptions): Promise<DiscoveredRemote[]> {
  const taken = new Set<number>([options.selfPort]);
  for (const baseUrl of options.exclude) {
    const port = loopbackPort(baseUrl);
    if (port !== null) {
      taken.add(port);
    }
  }

  const timeout = options.timeoutMs ?? 3_000;
  const fetchModels = options.fetchModels ?? fetchRemoteModels;
  const candidates = (options.servers ?? KNOWN_LOCAL_SERVERS).filter((server) => !taken.has(server.port));

  const results = await Promise.all(candidates.map(async (server): Promise<DiscoveredRemote | null> => {
    const remote: RemoteBackend = { name: server.name, baseUrl: `http://127.0.0.1:${server.port}` };
    try {
      return { remote, models: await fetchModels(remote, timeout) };
    } catch (error: unknown) {
      logger.debug(`[DISCOVERY] ${server.name} not answering on ${server.port}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }));

  const found = results.filter((result): result is DiscoveredRemote => result !== null);
  if (found.length > 0) {
    const modelCount = found.reduce((sum, entry) => sum + entry.models.length, 0);
    logger.info(`[DISCOVERY] Found ${modelCount} model(s) on ${found.map((entry) => entry.remote.name).join(", ")}`);
  }
  return found;
}
