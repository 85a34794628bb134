import type { CompletionRequest, ProviderResult } from "../completion/types.ts";

/**
 * Source of continuations. The returned promise may never settle, and may
 * reject; the orchestrator treats a rejection as a provider error.
 */
export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<ProviderResult>;
}
