/**
 * The four mappings a mock server owns: requests seen and responses configured,
 * per method. GET and POST keyspaces never share a map.
 */

import type { CannedResponse, CapturedRequest, HandledMethod } from "../domain/types.js";
import { storageKey, type RequestKey } from "./request-key.js";

type RequestsSeen = Record<HandledMethod, Map<string, CapturedRequest[]>>;
type ResponsesConfigured = Record<HandledMethod, Map<string, CannedResponse>>;

export class MockServerState {
  private requests: RequestsSeen = { GET: new Map(), POST: new Map() };
  private responses: ResponsesConfigured = { GET: new Map(), POST: new Map() };

  /** Drop every captured request and configured response */
  reset(): void {
    this.requests = { GET: new Map(), POST: new Map() };
    this.responses = { GET: new Map(), POST: new Map() };
  }

  /** Register (or overwrite) the response for `key`; status is always 200 */
  setResponseBody(method: HandledMethod, key: RequestKey, body: string): void {
    this.responses[method].set(storageKey(key), { statusCode: 200, body });
  }

  getResponse(method: HandledMethod, key: RequestKey): CannedResponse | undefined {
    return this.responses[method].get(storageKey(key));
  }

  /** Append in arrival order; identical requests are never merged */
  record(method: HandledMethod, key: RequestKey, request: CapturedRequest): void {
    const seen = this.requests[method];
    const k = storageKey(key);
    const list = seen.get(k);
    if (list) {
      list.push(request);
    } else {
      seen.set(k, [request]);
    }
  }

  /**
   * Record the request and resolve its response in one synchronous step, so a
   * reset() from test code can never land between the two.
   */
  recordAndMatch(
    method: HandledMethod,
    key: RequestKey,
    request: CapturedRequest
  ): CannedResponse | undefined {
    this.record(method, key, request);
    return this.getResponse(method, key);
  }

  getRequests(method: HandledMethod, key: RequestKey): CapturedRequest[] {
    return [...(this.requests[method].get(storageKey(key)) ?? [])];
  }
}
