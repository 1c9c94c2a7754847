/**
 * PromptPrefixCache - per (backend, model) prompt prefix bookkeeping.
 *
 * An entry remembers the prompt tokens last evaluated into a backend state
 * handle. A new prompt that extends the cached one reuses the handle; one that
 * diverges invalidates it and starts over before the backend generates. The
 * backend's lock is held from lookup until the lease is released, so one
 * backend instance serves one generation at a time.
 */

import { logger } from "../../logging/index.js";

import { KeyedLock } from "./KeyedLock.js";

import type { BackendStateHandle, GenerationBackend } from "../../types/backend.js";

export type CacheableBackend = Pick<GenerationBackend, "id" | "allocateState" | "invalidateState">;

export interface PromptCacheEntry {
  readonly backendId: string;
  readonly model: string;
  readonly tokens: readonly number[];
  readonly handle: BackendStateHandle;
}

export interface PrefixCacheLease {
  /** Length of the reused prefix; 0 on first use or after divergence. */
  readonly cachedTokens: number;
  readonly handle: BackendStateHandle;
  /** Drops the entry and its backend state, e.g. after a failed generation. */
  invalidate(): Promise<void>;
  release(): void;
}

export function commonPrefixLength(a: readonly number[], b: readonly number[]): number {
  const max = Math.min(a.length, b.length);
  let length = 0;
  while (length < max && a[length] === b[length]) {
    length++;
  }
  return length;
}

function entryKey(backendId: string, model: string): string {
  return `${backendId}\u0000${model}`;
}

export class PromptPrefixCache {
  private readonly entries = new Map<string, PromptCacheEntry>();

  constructor(private readonly lock: KeyedLock = new KeyedLock()) {}

  async acquire(backend: CacheableBackend, model: string, promptTokens: readonly number[]): Promise<PrefixCacheLease> {
    const waiting = this.lock.queueLength(backend.id);
    if (waiting > 0) {
      logger.debug(`[PROMPT CACHE] ${backend.id}: waiting behind ${waiting} lease(s)`);
    }
    const release = await this.lock.acquire(backend.id);
    try {
      return await this.lookup(backend, model, promptTokens, release);
    } catch (error: unknown) {
      release();
      throw error;
    }
  }

  private async lookup(
    backend: CacheableBackend,
    model: string,
    promptTokens: readonly number[],
    release: () => void,
  ): Promise<PrefixCacheLease> {
    await this.evictOtherModels(backend, model);

    const key = entryKey(backend.id, model);
    const existing = this.entries.get(key);
    let handle: BackendStateHandle;
    let cachedTokens = 0;

    if (existing === undefined) {
      handle = backend.allocateState(model);
      logger.debug(`[PROMPT CACHE] ${backend.id}/${model}: new entry (${promptTokens.length} tokens)`);
    } else {
      const shared = commonPrefixLength(existing.tokens, promptTokens);
      if (shared > 0 && shared === existing.tokens.length) {
        handle = existing.handle;
        cachedTokens = shared;
        logger.debug(`[PROMPT CACHE] ${backend.id}/${model}: reusing ${shared} of ${promptTokens.length} tokens`);
      } else {
        // Stale state must be gone before the backend sees the new prompt.
        this.entries.delete(key);
        await backend.invalidateState(existing.handle);
        handle = backend.allocateState(model);
        logger.debug(`[PROMPT CACHE] ${backend.id}/${model}: prompt diverged at token ${shared}; state invalidated`);
      }
    }

    const entry: PromptCacheEntry = { backendId: backend.id, model, tokens: [...promptTokens], handle };
    this.entries.set(key, entry);

    let released = false;
    return {
      cachedTokens: Math.min(cachedTokens, promptTokens.length),
      handle,
      invalidate: async () => {
        if (this.entries.get(key) === entry) {
          this.entries.delete(key);
        }
        await backend.invalidateState(handle);
        logger.debug(`[PROMPT CACHE] ${backend.id}/${model}: entry invalidated`);
      },
      release: () => {
        if (released) { return; }
        released = true;
        release();
      },
    };
  }

  private async evictOtherModels(backend: CacheableBackend, model: string): Promise<void> {
    for (const [key, entry] of this.entries) {
      if (entry.backendId !== backend.id || entry.model === model) {
        continue;
      }
      this.entries.delete(key);
      await backend.invalidateState(entry.handle);
      logger.debug(`[PROMPT CACHE] ${backend.id}: evicted ${entry.model} for ${model}`);
    }
  }
}
