import Anthropic from "@anthropic-ai/sdk";
import type { Logger } from "../logger.ts";
import type { ProviderOptions } from "../options.ts";
import { ok, type Result } from "../utils/result.ts";
import { ProviderError } from "../completion/errors.ts";
import type {
  CompletionRequest,
  ProviderErrorKind,
  ProviderResult,
} from "../completion/types.ts";
import type { CompletionProvider } from "./provider-types.ts";
import { buildCompletionPrompt, COMPLETION_SYSTEM_PROMPT } from "./prompt.ts";
import { cleanCompletionText } from "./completion-text.ts";

/** The slice of the Anthropic client this provider talks to. */
export type MessagesClient = {
  messages: {
    create(body: {
      model: string;
      max_tokens: number;
      system: string;
      messages: Array<{ role: "user"; content: string }>;
    }): Promise<{ content: ReadonlyArray<{ type: string; text?: string }> }>;
  };
};

export class AnthropicCompletionProvider implements CompletionProvider {
  private client: MessagesClient | undefined;

  constructor(
    private context: {
      logger: Logger;
      options: ProviderOptions;
      client?: MessagesClient;
    },
  ) {
    this.client = context.client;
  }

  async complete(request: CompletionRequest): Promise<ProviderResult> {
    const { options, logger } = this.context;

    const client = this.getClient();
    if (client.status === "error") {
      return client;
    }

    try {
      const response = await client.value.messages.create({
        model: options.model,
        max_tokens: options.maxTokens,
        system: COMPLETION_SYSTEM_PROMPT,
        messages: [{ role: "user", content: buildCompletionPrompt(request) }],
      });

      const raw = response.content
        .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
        .join("");
      const text = cleanCompletionText(raw);
      if (text.trim().length === 0) {
        return new ProviderError(
          "empty-completion",
          "No completion text received",
        ).toResult();
      }

      logger.debug(`${options.model} returned ${text.length} chars`);
      return ok(text);
    } catch (error) {
      return ProviderError.from(error).toResult();
    }
  }

  // created on first use; a missing key fails the request
  private getClient(): Result<MessagesClient, { kind: ProviderErrorKind }> {
    if (this.client) {
      return ok(this.client);
    }

    const { apiKeyEnvVar, baseUrl } = this.context.options;
    const apiKey = process.env[apiKeyEnvVar];
    if (!apiKey) {
      return new ProviderError(
        "authentication",
        `Anthropic API key ${apiKeyEnvVar} not found in environment`,
      ).toResult();
    }

    const anthropic = new Anthropic({ apiKey, baseURL: baseUrl });
    const client: MessagesClient = {
      messages: { create: (body) => anthropic.messages.create(body) },
    };
    this.client = client;
    return ok(client);
  }
}
