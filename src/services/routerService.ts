/**
 * Router Service
 *
 * Maps a request `model` onto a local engine or, in gateway mode, onto a
 * remote OpenAI-compatible backend. Remote model lists are cached and
 * refreshed on an interval; a remote whose listing fails keeps its last known
 * models and is reported unhealthy. Discovered local servers are re-listed on
 * the same interval and drop out once they stop answering.
 */

import { logger } from "../logging/index.js";
import { ModelNotFoundError } from "../utils/errors.js";
import { getCurrentTimestamp } from "../utils/ids.js";

import { fetchRemoteModels } from "./modelFetcher.js";

import type { DiscoveredRemote } from "./backendDiscovery.js";
import type { BackendHealth, HealthReport, RemoteBackend, RouteTarget, RouterService } from "./contracts.js";
import type { GenerationBackend } from "../types/backend.js";
import type { OpenAIModel } from "../types/openai.js";

export interface RouterOptions {
  backends: readonly GenerationBackend[];
  defaultBackendId: string;
  remotes: readonly RemoteBackend[];
  gatewayEnabled: boolean;
  modelRefreshMs: number;
  fetchModels?: (remote: RemoteBackend) => Promise<OpenAIModel[]>;
  /** Finds extra remotes on each refresh, with their model lists. */
  discover?: () => Promise<DiscoveredRemote[]>;
  now?: () => number;
}

interface RemoteListing {
  models: OpenAIModel[];
  healthy: boolean;
}

export class RouterServiceImpl implements RouterService {
  readonly localBackends: readonly GenerationBackend[];
  readonly gatewayEnabled: boolean;
  private readonly defaultBackend: GenerationBackend;
  private readonly configured: readonly RemoteBackend[];
  private discovered: RemoteBackend[] = [];
  private readonly listings = new Map<string, RemoteListing>();
  private readonly fetchModels: (remote: RemoteBackend) => Promise<OpenAIModel[]>;
  private readonly now: () => number;
  private readonly startedAt = getCurrentTimestamp();
  private lastRefresh = Number.NEGATIVE_INFINITY;
  private refreshing: Promise<void> | null = null;

  constructor(private readonly options: RouterOptions) {
    const [first] = options.backends;
    if (first === undefined) {
      throw new Error("RouterService needs at least one local backend");
    }
    this.localBackends = options.backends;
    this.defaultBackend = options.backends.find((backend) => backend.id === options.defaultBackendId) ?? first;
    this.configured = options.remotes;
    this.gatewayEnabled = options.gatewayEnabled;
    this.fetchModels = options.fetchModels ?? ((remote) => fetchRemoteModels(remote));
    this.now = options.now ?? Date.now;
  }

  get defaultRemote(): RemoteBackend | null {
    return this.configured[0] ?? null;
  }

  private get remotes(): readonly RemoteBackend[] {
    return [...this.configured, ...this.discovered];
  }

  async resolve(model: string | null): Promise<RouteTarget> {
    if (model === null || model === "") {
      return this.localTarget(this.defaultBackend, this.defaultBackend.model);
    }

    const local = this.findLocal(model);
    if (local !== undefined) {
      return this.localTarget(local, model);
    }

    if (this.gatewayEnabled) {
      const remote = await this.findRemote(model);
      if (remote !== null) {
        logger.debug(`[ROUTER] ${model} -> remote ${remote.remote.name} (${remote.model})`);
        return remote;
      }
      throw new ModelNotFoundError(model);
    }

    logger.info(`[ROUTER] Model '${model}' is not served here; using ${this.defaultBackend.id} (${this.defaultBackend.model})`);
    return this.localTarget(this.defaultBackend, this.defaultBackend.model);
  }

  async listModels(): Promise<OpenAIModel[]> {
    const models: OpenAIModel[] = [];
    const seen = new Set<string>();
    const add = (model: OpenAIModel): void => {
      if (seen.has(model.id)) { return; }
      seen.add(model.id);
      models.push(model);
    };

    for (const backend of this.localBackends) {
      const listed = await backend.listModels();
      for (const entry of listed) {
        add({ id: entry.id, object: "model", created: this.startedAt, owned_by: backend.id });
      }
      for (const alias of backend.aliases) {
        add({ id: alias, object: "model", created: this.startedAt, owned_by: backend.id });
      }
    }

    if (this.gatewayEnabled) {
      await this.refreshRemoteModels();
      for (const listing of this.listings.values()) {
        listing.models.forEach(add);
      }
    }
    return models;
  }

  async health(): Promise<HealthReport> {
    const backends: BackendHealth[] = await Promise.all(
      this.localBackends.map(async (backend) => ({
        id: backend.id,
        kind: backend.kind,
        healthy: await backend.health(),
      })),
    );

    if (this.gatewayEnabled) {
      await this.refreshRemoteModels(true);
      for (const remote of this.remotes) {
        backends.push({ id: remote.name, kind: "remote", healthy: this.listings.get(remote.name)?.healthy ?? false });
      }
    }

    return {
      status: backends.every((backend) => backend.healthy) ? "healthy" : "degraded",
      backends,
    };
  }

  private localTarget(backend: GenerationBackend, responseModel: string): RouteTarget {
    return { kind: "local", backend, model: backend.model, responseModel };
  }

  private findLocal(model: string): GenerationBackend | undefined {
    return this.localBackends.find((backend) => backend.model === model || backend.aliases.includes(model));
  }

  /** Exact remote model id, or `<remote name>/<model id>`. */
  private async findRemote(model: string): Promise<Extract<RouteTarget, { kind: "remote" }> | null> {
    await this.refreshRemoteModels();

    for (const remote of this.remotes) {
      const listing = this.listings.get(remote.name);
      if (listing?.models.some((entry) => entry.id === model) === true) {
        return { kind: "remote", remote, model };
      }
    }

    for (const remote of this.remotes) {
      const prefix = `${remote.name}/`;
      if (model.startsWith(prefix) && model.length > prefix.length) {
        return { kind: "remote", remote, model: model.slice(prefix.length) };
      }
    }
    return null;
  }

  private async refreshRemoteModels(force = false): Promise<void> {
    if (!force && this.now() - this.lastRefresh < this.options.modelRefreshMs) {
      return;
    }
    if (this.refreshing !== null) {
      return this.refreshing;
    }

    this.refreshing = (async () => {
      await this.discoverRemotes();
      await Promise.all(this.configured.map(async (remote) => {
        try {
          const models = await this.fetchModels(remote);
          this.listings.set(remote.name, { models, healthy: true });
        } catch (error: unknown) {
          logger.warn(`[ROUTER] Could not list models of ${remote.name}: ${error instanceof Error ? error.message : String(error)}`);
          const previous = this.listings.get(remote.name);
          this.listings.set(remote.name, { models: previous?.models ?? [], healthy: false });
        }
      }));
      this.lastRefresh = this.now();
    })();

    try {
      await this.refreshing;
    } finally {
      this.refreshing = null;
    }
  }

  private async discoverRemotes(): Promise<void> {
    if (this.options.discover === undefined) { return; }

    let found: DiscoveredRemote[];
    try {
      found = await this.options.discover();
    } catch (error: unknown) {
      logger.warn(`[ROUTER] Local discovery failed: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }

    const configuredNames = new Set(this.configured.map((remote) => remote.name));
    const fresh = found.filter((entry) => !configuredNames.has(entry.remote.name));
    for (const remote of this.discovered) {
      this.listings.delete(remote.name);
    }
    this.discovered = fresh.map((entry) => entry.remote);
    for (const entry of fresh) {
      this.listings.set(entry.remote.name, { models: entry.models, healthy: true });
    }
  }
}
