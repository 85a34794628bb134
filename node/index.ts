import type { BufferAccessor, OverlayHost, PopupHost } from "./buffer/buffer-accessor.ts";
import { CompletionOrchestrator } from "./completion/completion-orchestrator.ts";
import { createLogger, type Logger } from "./logger.ts";
import { parseOptions } from "./options.ts";
import { getProvider, type CompletionProvider } from "./providers/provider.ts";

export type { BufferAccessor, OverlayHost, PopupHost } from "./buffer/buffer-accessor.ts";
export { TextBuffer } from "./buffer/text-buffer.ts";
export {
  CompletionOrchestrator,
  type OrchestratorContext,
  type StatusListener,
} from "./completion/completion-orchestrator.ts";
export { TimeoutEstimator, type TimeoutStatistics } from "./completion/timeout-estimator.ts";
export { SuggestionBuffer } from "./completion/suggestion-buffer.ts";
export {
  DisplayChannelChain,
  GhostOverlayChannel,
  LiteralInsertionChannel,
  PopupChannel,
  type ChannelHandle,
  type DisplayChannel,
} from "./completion/display-channels.ts";
export {
  isProgrammaticEdit,
  isTriggerContext,
  shouldTrigger,
  type TriggerDecision,
} from "./completion/trigger-policy.ts";
export { transition } from "./completion/state-machine.ts";
export * from "./completion/errors.ts";
export type * from "./completion/types.ts";
export { COMPLETION_MODES } from "./completion/types.ts";
export {
  defaultOptions,
  mergeOptions,
  parseOptions,
  type CompletionOptions,
  type PartialCompletionOptions,
} from "./options.ts";
export { createLogger, type Logger, type LogLevel } from "./logger.ts";
export { AnthropicCompletionProvider } from "./providers/anthropic.ts";
export { CachingCompletionProvider } from "./providers/cache.ts";
export { getProvider, type CompletionProvider } from "./providers/provider.ts";

/**
 * Wire an orchestrator from raw host configuration: options are validated,
 * the logger and the provider are built from them.
 */
export function createCompletionOrchestrator(host: {
  buffer: BufferAccessor;
  config?: unknown;
  overlayHost?: OverlayHost;
  popupHost?: PopupHost;
  provider?: CompletionProvider;
  collectReferences?: (before: string, after: string) => string[];
  logger?: Logger;
}): CompletionOrchestrator {
  const warnings: string[] = [];
  const options = parseOptions(host.config ?? {}, {
    warn: (msg) => warnings.push(msg),
  });
  const logger =
    host.logger ??
    createLogger({ level: options.logging.level, file: options.logging.file });
  for (const warning of warnings) {
    logger.warn(warning);
  }

  return new CompletionOrchestrator({
    buffer: host.buffer,
    provider: host.provider ?? getProvider(options.provider, logger),
    options,
    logger,
    overlayHost: host.overlayHost,
    popupHost: host.popupHost,
    collectReferences: host.collectReferences,
  });
}
