import type { Logger } from "../logger.ts";
import type { ProviderCacheOptions } from "../options.ts";
import type { CompletionRequest, ProviderResult } from "../completion/types.ts";
import type { CompletionProvider } from "./provider-types.ts";

type CacheEntry = {
  completion: string;
  timestamp: number;
};

/** Memoizes successful completions by the text and references they were asked for. */
export class CachingCompletionProvider implements CompletionProvider {
  private cache: Map<string, CacheEntry> = new Map();

  constructor(
    private inner: CompletionProvider,
    private context: {
      logger: Logger;
      options: ProviderCacheOptions;
      now?: () => number;
    },
  ) {}

  async complete(request: CompletionRequest): Promise<ProviderResult> {
    const key = cacheKey(request);
    const cached = this.getCachedCompletion(key);
    if (cached != undefined) {
      this.context.logger.debug("Serving completion from cache");
      return { status: "ok", value: cached };
    }

    const result = await this.inner.complete(request);
    if (result.status === "ok" && result.value.length > 0) {
      this.cacheCompletion(key, result.value);
    }
    return result;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  private now(): number {
    return (this.context.now ?? Date.now)();
  }

  private getCachedCompletion(key: string): string | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.timestamp > this.context.options.ttlMs) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.completion;
  }

  private cacheCompletion(key: string, completion: string): void {
    const { maxEntries } = this.context.options;
    if (maxEntries === 0) {
      return;
    }

    this.cache.delete(key);
    while (this.cache.size >= maxEntries) {
      // Map iterates in insertion order, so the first key is the oldest
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }

    this.cache.set(key, { completion, timestamp: this.now() });
  }
}

function cacheKey(request: CompletionRequest): string {
  return JSON.stringify([
    request.textBeforeCursor,
    request.textAfterCursor,
    request.references,
  ]);
}
