import { Defer } from "../utils/async.ts";
import type {
  CompletionRequest,
  ProviderErrorKind,
  ProviderResult,
} from "../completion/types.ts";
import type { CompletionProvider } from "./provider-types.ts";

export class MockRequest {
  defer: Defer<ProviderResult> = new Defer();

  constructor(public request: CompletionRequest) {}

  respond(text: string): void {
    this.defer.resolve({ status: "ok", value: text });
  }

  fail(kind: ProviderErrorKind, error = `mock ${kind} error`): void {
    this.defer.resolve({ status: "error", error, kind });
  }

  /** Reject the promise outright, as a misbehaving provider would. */
  reject(error: Error): void {
    this.defer.reject(error);
  }

  get settled(): boolean {
    return this.defer.settled;
  }
}

/**
 * Provider for tests. Every call is captured as a MockRequest that the test
 * settles by hand, or never settles.
 */
export class MockCompletionProvider implements CompletionProvider {
  requests: MockRequest[] = [];
  /** makes the next call throw synchronously instead of returning a promise */
  throwOnNextCall: Error | undefined;

  complete(request: CompletionRequest): Promise<ProviderResult> {
    if (this.throwOnNextCall) {
      const error = this.throwOnNextCall;
      this.throwOnNextCall = undefined;
      throw error;
    }
    const mockRequest = new MockRequest(request);
    this.requests.push(mockRequest);
    return mockRequest.defer.promise;
  }

  lastRequest(): MockRequest {
    const last = this.requests[this.requests.length - 1];
    if (!last) {
      throw new Error("No completion requests were made");
    }
    return last;
  }
}
