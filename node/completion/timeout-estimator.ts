import type { Logger } from "../logger.ts";
import type { TimeoutOptions } from "../options.ts";
import type {
  CompletionRequest,
  RequestMetric,
  RequestOutcome,
} from "./types.ts";

export type TimeoutStatistics = {
  totalRequests: number;
  successfulRequests: number;
  timedOutRequests: number;
  /** percentage, 0-100 */
  successRate: number;
  avgDurationMs: number;
  maxDurationMs: number;
  minDurationMs: number;
  currentHistoricalTimeoutMs: number;
  boundsMs: { min: number; max: number };
};

/**
 * Derives per-request deadlines from how long recent requests actually took,
 * scaled by how heavy the new request looks.
 */
export class TimeoutEstimator {
  private history: RequestMetric[] = [];
  private baseMs: number;

  constructor(
    private context: {
      logger: Logger;
      options: TimeoutOptions;
      now?: () => number;
    },
  ) {
    this.baseMs = context.options.baseMs;
  }

  estimate(request: CompletionRequest): number {
    const { minMs, maxMs } = this.context.options;
    const historical = this.historicalTimeout();
    const factor = this.complexityFactor(request);
    const raw = historical * factor;
    const timeoutMs = Number.isFinite(raw)
      ? Math.max(minMs, Math.min(raw, maxMs))
      : this.clampedBase();

    this.context.logger.debug(
      `timeout estimate: historical=${historical.toFixed(0)}ms factor=${factor.toFixed(2)} final=${timeoutMs.toFixed(0)}ms`,
    );
    return timeoutMs;
  }

  /** mean + 2 standard deviations of recent successful durations */
  historicalTimeout(): number {
    const durations = this.history
      .slice(-this.context.options.historySize)
      .filter((metric) => metric.succeeded)
      .map((metric) => metric.durationMs);

    if (durations.length < this.context.options.minSamples) {
      return this.baseMs;
    }

    const mean = durations.reduce((sum, d) => sum + d, 0) / durations.length;
    const variance =
      durations.reduce((sum, d) => sum + (d - mean) ** 2, 0) /
      durations.length;
    return mean + 2 * Math.sqrt(variance);
  }

  complexityFactor(request: CompletionRequest): number {
    let factor = 1.0;

    const textLength =
      request.textBeforeCursor.length + request.textAfterCursor.length;
    if (textLength > 2000) {
      factor *= 1.5;
    } else if (textLength > 1000) {
      factor *= 1.2;
    } else if (textLength > 500) {
      factor *= 1.1;
    }

    const referenceCount = request.references.length;
    if (referenceCount > 10) {
      factor *= 1.3;
    } else if (referenceCount > 5) {
      factor *= 1.1;
    }

    const referenceLength = request.references.reduce(
      (sum, entry) => sum + entry.length,
      0,
    );
    if (referenceLength > 1000) {
      factor *= 1.2;
    }

    // the user is explicitly waiting on manual requests
    if (request.triggerKind === "manual") {
      factor *= 1.1;
    }

    return factor;
  }

  record(
    durationMs: number,
    request: CompletionRequest,
    outcome: RequestOutcome,
  ): void {
    try {
      if (!Number.isFinite(durationMs)) {
        this.context.logger.warn(
          `Ignoring request metric with invalid duration ${durationMs}`,
        );
        return;
      }

      const metric: RequestMetric = {
        durationMs: Math.max(0, durationMs),
        complexityScore: this.complexityFactor(request),
        succeeded: outcome === "success",
        outcome,
        timestamp: (this.context.now ?? Date.now)(),
      };

      this.history.push(metric);
      while (this.history.length > this.context.options.historySize) {
        this.history.shift();
      }

      this.context.logger.debug(
        `recorded request metric: duration=${metric.durationMs}ms outcome=${outcome} complexity=${metric.complexityScore.toFixed(2)}`,
      );
    } catch (error) {
      this.context.logger.error("Failed to record request metric:", error);
    }
  }

  getHistory(): ReadonlyArray<RequestMetric> {
    return this.history;
  }

  statistics(): TimeoutStatistics {
    const { minMs, maxMs } = this.context.options;
    const successful = this.history.filter((metric) => metric.succeeded);
    const durations = this.history.map((metric) => metric.durationMs);

    return {
      totalRequests: this.history.length,
      successfulRequests: successful.length,
      timedOutRequests: this.history.filter(
        (metric) => metric.outcome === "timeout",
      ).length,
      successRate:
        this.history.length > 0
          ? (successful.length / this.history.length) * 100
          : 0,
      avgDurationMs:
        successful.length > 0
          ? successful.reduce((sum, metric) => sum + metric.durationMs, 0) /
            successful.length
          : 0,
      maxDurationMs: durations.length > 0 ? Math.max(...durations) : 0,
      minDurationMs: durations.length > 0 ? Math.min(...durations) : 0,
      currentHistoricalTimeoutMs: this.historicalTimeout(),
      boundsMs: { min: minMs, max: maxMs },
    };
  }

  reset(): void {
    this.history = [];
    this.context.logger.info("Request timing history reset");
  }

  /** Accepts only values inside the configured bounds. */
  adjustBaseTimeout(baseMs: number): boolean {
    if (!this.isReasonable(baseMs)) {
      this.context.logger.warn(
        `Refusing base timeout ${baseMs}ms outside ${this.context.options.minMs}-${this.context.options.maxMs}ms`,
      );
      return false;
    }
    this.context.logger.info(
      `Base timeout adjusted: ${this.baseMs}ms -> ${baseMs}ms`,
    );
    this.baseMs = baseMs;
    return true;
  }

  isReasonable(timeoutMs: number): boolean {
    const { minMs, maxMs } = this.context.options;
    return timeoutMs >= minMs && timeoutMs <= maxMs;
  }

  private clampedBase(): number {
    const { minMs, maxMs } = this.context.options;
    return Math.max(minMs, Math.min(this.baseMs, maxMs));
  }
}
