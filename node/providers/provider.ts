import type { Logger } from "../logger.ts";
import type { ProviderOptions } from "../options.ts";
import { AnthropicCompletionProvider } from "./anthropic.ts";
import { CachingCompletionProvider } from "./cache.ts";
import type { CompletionProvider } from "./provider-types.ts";

export * from "./provider-types.ts";

export function getProvider(
  options: ProviderOptions,
  logger: Logger,
): CompletionProvider {
  const provider = new AnthropicCompletionProvider({ logger, options });
  if (options.cache.maxEntries === 0) {
    return provider;
  }
  return new CachingCompletionProvider(provider, {
    logger,
    options: options.cache,
  });
}
