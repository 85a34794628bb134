import { COMPLETION_MODES, type CompletionMode } from "./completion/types.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

export type TimeoutOptions = {
  baseMs: number;
  minMs: number;
  maxMs: number;
  historySize: number;
  /** successful samples needed before history replaces baseMs */
  minSamples: number;
};

export type ProgrammaticEditOptions = {
  /** share of the window a single repeated character must exceed */
  threshold: number;
  lookbehind: number;
  lookahead: number;
  minWindow: number;
};

export type ProviderCacheOptions = {
  maxEntries: number;
  ttlMs: number;
};

export type ProviderOptions = {
  model: string;
  apiKeyEnvVar: string;
  baseUrl?: string | undefined;
  maxTokens: number;
  cache: ProviderCacheOptions;
};

export type LoggingOptions = {
  level: LogLevel;
  file?: string | undefined;
};

export type CompletionOptions = {
  mode: CompletionMode;
  debounceMs: number;
  manualTriggerKeys: string[];
  contextCharsBefore: number;
  contextCharsAfter: number;
  errorStatusMs: number;
  /** delay before a follow-up auto request after an accept; 0 disables */
  continueAfterAcceptMs: number;
  /** shortest repeat of the typed text that is stripped from a suggestion's start */
  minOverlapChars: number;
  timeout: TimeoutOptions;
  programmaticEdit: ProgrammaticEditOptions;
  provider: ProviderOptions;
  logging: LoggingOptions;
};

export type PartialCompletionOptions = Partial<
  Omit<
    CompletionOptions,
    "timeout" | "programmaticEdit" | "provider" | "logging"
  >
> & {
  timeout?: Partial<TimeoutOptions>;
  programmaticEdit?: Partial<ProgrammaticEditOptions>;
  provider?: Partial<Omit<ProviderOptions, "cache">> & {
    cache?: Partial<ProviderCacheOptions>;
  };
  logging?: Partial<LoggingOptions>;
};

type OptionsLogger = { warn: (msg: string) => void };

export function defaultOptions(): CompletionOptions {
  return {
    mode: "manual-only",
    debounceMs: 300,
    manualTriggerKeys: ["Ctrl+Space"],
    contextCharsBefore: 500,
    contextCharsAfter: 100,
    errorStatusMs: 2000,
    continueAfterAcceptMs: 500,
    minOverlapChars: 5,
    timeout: {
      baseMs: 15_000,
      minMs: 8_000,
      maxMs: 30_000,
      historySize: 50,
      minSamples: 3,
    },
    programmaticEdit: {
      threshold: 0.7,
      lookbehind: 20,
      lookahead: 5,
      minWindow: 10,
    },
    provider: {
      model: "claude-3-5-haiku-latest",
      apiKeyEnvVar: "ANTHROPIC_API_KEY",
      maxTokens: 256,
      cache: {
        maxEntries: 50,
        ttlMs: 5 * 60 * 1000,
      },
    },
    logging: {
      level: "info",
    },
  };
}

// Reusable parsing helpers
function asRecord(
  input: unknown,
  fieldName: string,
  logger: OptionsLogger,
): { [key: string]: unknown } | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    logger.warn(`${fieldName} must be an object`);
    return undefined;
  }
  return input as { [key: string]: unknown };
}

function parseNumber(
  input: unknown,
  fieldName: string,
  logger: OptionsLogger,
  constraint: { min: number; integer?: boolean },
): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "number" || !Number.isFinite(input)) {
    logger.warn(`${fieldName} must be a number`);
    return undefined;
  }
  if (constraint.integer && !Number.isInteger(input)) {
    logger.warn(`${fieldName} must be an integer`);
    return undefined;
  }
  if (input < constraint.min) {
    logger.warn(`${fieldName} must be at least ${constraint.min}`);
    return undefined;
  }
  return input;
}

function parseString(
  input: unknown,
  fieldName: string,
  logger: OptionsLogger,
): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "string" || input.trim() === "") {
    logger.warn(`${fieldName} must be a non-empty string`);
    return undefined;
  }
  return input;
}

function parseStringArray(
  input: unknown,
  fieldName: string,
  logger: OptionsLogger,
): string[] | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!Array.isArray(input)) {
    logger.warn(`${fieldName} must be an array`);
    return undefined;
  }
  const result: string[] = [];
  for (const item of input) {
    if (typeof item === "string" && item.length > 0) {
      result.push(item);
    } else {
      logger.warn(
        `Skipping invalid entry in ${fieldName}: ${JSON.stringify(item)}`,
      );
    }
  }
  return result;
}

function isCompletionMode(value: unknown): value is CompletionMode {
  return COMPLETION_MODES.some((mode) => mode === value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseTimeoutOptions(
  input: unknown,
  logger: OptionsLogger,
): Partial<TimeoutOptions> | undefined {
  const opts = asRecord(input, "timeout", logger);
  if (!opts) {
    return undefined;
  }

  const result: Partial<TimeoutOptions> = {};
  for (const field of ["baseMs", "minMs", "maxMs"] as const) {
    const value = parseNumber(opts[field], `timeout.${field}`, logger, {
      min: 1,
    });
    if (value !== undefined) {
      result[field] = value;
    }
  }
  for (const field of ["historySize", "minSamples"] as const) {
    const value = parseNumber(opts[field], `timeout.${field}`, logger, {
      min: 1,
      integer: true,
    });
    if (value !== undefined) {
      result[field] = value;
    }
  }
  return result;
}

function parseProgrammaticEditOptions(
  input: unknown,
  logger: OptionsLogger,
): Partial<ProgrammaticEditOptions> | undefined {
  const opts = asRecord(input, "programmaticEdit", logger);
  if (!opts) {
    return undefined;
  }

  const result: Partial<ProgrammaticEditOptions> = {};
  const threshold = parseNumber(
    opts["threshold"],
    "programmaticEdit.threshold",
    logger,
    { min: 0 },
  );
  if (threshold !== undefined) {
    if (threshold > 0 && threshold <= 1) {
      result.threshold = threshold;
    } else {
      logger.warn("programmaticEdit.threshold must be in (0, 1]");
    }
  }
  for (const field of ["lookbehind", "lookahead", "minWindow"] as const) {
    const value = parseNumber(
      opts[field],
      `programmaticEdit.${field}`,
      logger,
      { min: 0, integer: true },
    );
    if (value !== undefined) {
      result[field] = value;
    }
  }
  return result;
}

function parseProviderOptions(
  input: unknown,
  logger: OptionsLogger,
): PartialCompletionOptions["provider"] {
  const opts = asRecord(input, "provider", logger);
  if (!opts) {
    return undefined;
  }

  const result: NonNullable<PartialCompletionOptions["provider"]> = {};
  const model = parseString(opts["model"], "provider.model", logger);
  if (model !== undefined) {
    result.model = model;
  }
  const apiKeyEnvVar = parseString(
    opts["apiKeyEnvVar"],
    "provider.apiKeyEnvVar",
    logger,
  );
  if (apiKeyEnvVar !== undefined) {
    result.apiKeyEnvVar = apiKeyEnvVar;
  }
  const baseUrl = parseString(opts["baseUrl"], "provider.baseUrl", logger);
  if (baseUrl !== undefined) {
    if (URL.canParse(baseUrl)) {
      result.baseUrl = baseUrl;
    } else {
      logger.warn("Invalid provider.baseUrl, ignoring field");
    }
  }
  const maxTokens = parseNumber(
    opts["maxTokens"],
    "provider.maxTokens",
    logger,
    { min: 1, integer: true },
  );
  if (maxTokens !== undefined) {
    result.maxTokens = maxTokens;
  }

  const cache = asRecord(opts["cache"], "provider.cache", logger);
  if (cache) {
    const cacheResult: Partial<ProviderCacheOptions> = {};
    const maxEntries = parseNumber(
      cache["maxEntries"],
      "provider.cache.maxEntries",
      logger,
      { min: 0, integer: true },
    );
    if (maxEntries !== undefined) {
      cacheResult.maxEntries = maxEntries;
    }
    const ttlMs = parseNumber(cache["ttlMs"], "provider.cache.ttlMs", logger, {
      min: 0,
    });
    if (ttlMs !== undefined) {
      cacheResult.ttlMs = ttlMs;
    }
    result.cache = cacheResult;
  }

  return result;
}

function parseLoggingOptions(
  input: unknown,
  logger: OptionsLogger,
): Partial<LoggingOptions> | undefined {
  const opts = asRecord(input, "logging", logger);
  if (!opts) {
    return undefined;
  }

  const result: Partial<LoggingOptions> = {};
  if (opts["level"] !== undefined) {
    if (isLogLevel(opts["level"])) {
      result.level = opts["level"];
    } else {
      logger.warn(
        `logging.level must be one of ${LOG_LEVELS.join(", ")}, got ${JSON.stringify(opts["level"])}`,
      );
    }
  }
  const file = parseString(opts["file"], "logging.file", logger);
  if (file !== undefined) {
    result.file = file;
  }
  return result;
}

export function parseOptions(
  inputOptions: unknown,
  logger: OptionsLogger,
): CompletionOptions {
  const input = asRecord(inputOptions, "options", logger);
  if (!input) {
    return defaultOptions();
  }

  const parsed: PartialCompletionOptions = {};

  if (input["mode"] !== undefined) {
    if (isCompletionMode(input["mode"])) {
      parsed.mode = input["mode"];
    } else {
      logger.warn(
        `mode must be one of ${COMPLETION_MODES.join(", ")}, got ${JSON.stringify(input["mode"])}`,
      );
    }
  }

  for (const field of [
    "debounceMs",
    "errorStatusMs",
    "continueAfterAcceptMs",
  ] as const) {
    const value = parseNumber(input[field], field, logger, { min: 0 });
    if (value !== undefined) {
      parsed[field] = value;
    }
  }

  for (const field of ["contextCharsBefore", "contextCharsAfter"] as const) {
    const value = parseNumber(input[field], field, logger, {
      min: 0,
      integer: true,
    });
    if (value !== undefined) {
      parsed[field] = value;
    }
  }

  const minOverlapChars = parseNumber(
    input["minOverlapChars"],
    "minOverlapChars",
    logger,
    { min: 1, integer: true },
  );
  if (minOverlapChars !== undefined) {
    parsed.minOverlapChars = minOverlapChars;
  }

  const manualTriggerKeys = parseStringArray(
    input["manualTriggerKeys"],
    "manualTriggerKeys",
    logger,
  );
  if (manualTriggerKeys) {
    parsed.manualTriggerKeys = manualTriggerKeys;
  }

  const timeout = parseTimeoutOptions(input["timeout"], logger);
  if (timeout) {
    parsed.timeout = timeout;
  }

  const programmaticEdit = parseProgrammaticEditOptions(
    input["programmaticEdit"],
    logger,
  );
  if (programmaticEdit) {
    parsed.programmaticEdit = programmaticEdit;
  }

  const provider = parseProviderOptions(input["provider"], logger);
  if (provider) {
    parsed.provider = provider;
  }

  const logging = parseLoggingOptions(input["logging"], logger);
  if (logging) {
    parsed.logging = logging;
  }

  const options = mergeOptions(defaultOptions(), parsed);

  if (options.timeout.minMs > options.timeout.maxMs) {
    logger.warn(
      `timeout.minMs (${options.timeout.minMs}) exceeds timeout.maxMs (${options.timeout.maxMs}), using default bounds`,
    );
    const defaults = defaultOptions().timeout;
    options.timeout.minMs = defaults.minMs;
    options.timeout.maxMs = defaults.maxMs;
  }

  return options;
}

/** Layer a partial override on top of complete options. Nested objects merge field by field. */
export function mergeOptions(
  base: CompletionOptions,
  override: PartialCompletionOptions,
): CompletionOptions {
  const { timeout, programmaticEdit, provider, logging, ...topLevel } =
    override;
  const { cache, ...providerFields } = provider ?? {};

  return {
    ...base,
    ...topLevel,
    manualTriggerKeys: [
      ...(topLevel.manualTriggerKeys ?? base.manualTriggerKeys),
    ],
    timeout: { ...base.timeout, ...timeout },
    programmaticEdit: { ...base.programmaticEdit, ...programmaticEdit },
    provider: {
      ...base.provider,
      ...providerFields,
      cache: { ...base.provider.cache, ...cache },
    },
    logging: { ...base.logging, ...logging },
  };
}
