import { assertUnreachable } from "../utils/assertUnreachable.ts";
import { InvariantViolation } from "./errors.ts";
import type {
  CompletionRequest,
  OrchestratorState,
  ProviderResult,
  RequestSeq,
} from "./types.ts";

export type StateEvent =
  | {
      type: "request";
      seq: RequestSeq;
      request: CompletionRequest;
      timeoutMs: number;
    }
  | {
      type: "result";
      seq: RequestSeq;
      result: ProviderResult;
      durationMs: number;
    }
  | { type: "timeout"; seq: RequestSeq; durationMs: number }
  | { type: "cancel" }
  /** collapse a finished state back to idle once its bookkeeping is done */
  | { type: "settle" };

/**
 * Pure transition function. Events that do not apply to the current state
 * (stale results, timeouts that lost the race, cancelling while idle) return
 * the state unchanged, by identity.
 */
export function transition(
  state: OrchestratorState,
  event: StateEvent,
): OrchestratorState {
  switch (event.type) {
    case "request":
      if (state.type !== "idle") {
        throw new InvariantViolation(
          `cannot start request ${event.seq} while ${state.type}`,
        );
      }
      return {
        type: "requesting",
        seq: event.seq,
        request: event.request,
        timeoutMs: event.timeoutMs,
      };

    case "result": {
      if (state.type !== "requesting" || state.seq !== event.seq) {
        return state;
      }
      const { result } = event;
      if (result.status === "error") {
        return {
          type: "failed",
          seq: state.seq,
          request: state.request,
          error: result.error,
          kind: result.kind,
          durationMs: event.durationMs,
        };
      }
      if (result.value.length === 0) {
        return {
          type: "failed",
          seq: state.seq,
          request: state.request,
          error: "provider returned an empty completion",
          kind: "empty-completion",
          durationMs: event.durationMs,
        };
      }
      return {
        type: "completed",
        seq: state.seq,
        request: state.request,
        text: result.value,
        durationMs: event.durationMs,
      };
    }

    case "timeout":
      if (state.type !== "requesting" || state.seq !== event.seq) {
        return state;
      }
      return {
        type: "timed-out",
        seq: state.seq,
        request: state.request,
        durationMs: event.durationMs,
      };

    case "cancel":
      if (state.type !== "requesting") {
        return state;
      }
      return { type: "cancelled", seq: state.seq, request: state.request };

    case "settle":
      if (state.type === "requesting") {
        throw new InvariantViolation(
          `cannot settle request ${state.seq} while it is in flight`,
        );
      }
      return state.type === "idle" ? state : { type: "idle" };

    default:
      return assertUnreachable(event);
  }
}
