export { KeyedLock } from "./KeyedLock.js";
export { PromptPrefixCache, commonPrefixLength } from "./PromptPrefixCache.js";
export type { CacheableBackend, PrefixCacheLease, PromptCacheEntry } from "./PromptPrefixCache.js";
