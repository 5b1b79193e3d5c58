/**
 * Domain types for the mock server: canned responses and captured requests.
 */

import type { IncomingHttpHeaders } from "node:http";

/** Methods the mock server answers; anything else gets 405 */
export type HandledMethod = "GET" | "POST";

/** Response served for a registered request key */
export interface CannedResponse {
  /** Always 200 through the configuration API */
  statusCode: number;
  /** Written as-is with Content-Type application/json */
  body: string;
}

/** The multipart file whose contents become part of a POST key */
export interface CapturedFile {
  fieldName: string;
  fileName: string;
  /** Part Content-Type; empty when the client sent none */
  contentType: string;
  content: Buffer;
}

/**
 * Snapshot of an inbound request. The body stream is consumed while handling,
 * so everything test code may want to inspect is copied out here.
 */
export interface CapturedRequest {
  readonly method: HandledMethod;
  /** Request target exactly as received (e.g. "/a%20b?x=1") */
  readonly url: string;
  /** Decoded URL path, the first half of the key */
  readonly path: string;
  /** Undecoded query string without the leading "?" */
  readonly rawQuery: string;
  readonly query: URLSearchParams;
  /** Lower-cased header names, as Node parses them */
  readonly headers: IncomingHttpHeaders;
  /** Raw request body; empty for GET */
  readonly body: Buffer;
  /** POST only */
  readonly file?: CapturedFile;
  /** Non-file multipart fields (POST only) */
  readonly fields?: Readonly<Record<string, string>>;
  readonly receivedAt: Date;
}

/** Console-shaped logger; pass `console` to see request traffic */
export interface MockServerLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export const silentLogger: MockServerLogger = {
  debug: () => undefined,
  warn: () => undefined,
};
