/**
 * canned-http-mock
 *
 * Public API: the mock server, its options, request-key helpers, and errors.
 */

export { createMockServer, HttpMockServer } from "./server/mock-server.js";
export type { MockServer } from "./server/mock-server.js";
export {
  getRequestKey,
  postRequestKey,
  postRequestKeyBytes,
  parseRequestTarget,
} from "./server/request-key.js";
export type { RequestKey, RequestTarget } from "./server/request-key.js";
export { resolveMockServerOptions } from "./config.js";
export type { MockServerConfig, MockServerOptions } from "./config.js";
export * from "./domain/errors.js";
export { silentLogger } from "./domain/types.js";
export type {
  CannedResponse,
  CapturedFile,
  CapturedRequest,
  HandledMethod,
  MockServerLogger,
} from "./domain/types.js";
