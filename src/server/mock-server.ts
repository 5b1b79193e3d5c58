/**
 * In-process mock HTTP server for tests: records GET/POST requests and answers
 * with canned JSON bodies keyed by request shape.
 *
 * Usage per test: reset() → set*ResponseBody() → exercise the code under test
 * against url() → inspect get*Requests().
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { resolveMockServerOptions, type MockServerConfig, type MockServerOptions } from "../config.js";
import { alreadyOpenError, listenError, notOpenError } from "../domain/errors.js";
import type { CapturedRequest } from "../domain/types.js";
import { createRequestHandler } from "./handler.js";
import type { RequestKey } from "./request-key.js";
import { MockServerState } from "./state.js";

/**
 * Mock server contract. Test code depends on this rather than HttpMockServer
 * so a fake can stand in where no listener is wanted.
 */
export interface MockServer {
  /** Bind and start serving. Rejects with LISTEN_FAILED, or ALREADY_OPEN when called twice */
  open(): Promise<void>;

  /** Stop serving. Never rejects; a no-op when not open */
  close(): Promise<void>;

  /**
   * Clear all captured requests and configured responses.
   * Call between tests; open/close never does it for you.
   */
  reset(): void;

  /** Respond 200 application/json with `body` to GETs whose key is "path?query" */
  setGETResponseBody(key: string, body: string): void;

  /**
   * Respond 200 application/json with `body` to POSTs whose key is
   * "path?query <file>", where <file> is the multipart "file" field's contents.
   * Pass a Buffer (see postRequestKeyBytes) for uploads that are not UTF-8 text.
   */
  setPOSTResponseBody(key: RequestKey, body: string): void;

  /** Captured GETs for "path?query", oldest first; [] when none */
  getGETRequests(key: string): CapturedRequest[];

  /** Captured POSTs for "path?query <file>", oldest first; [] when none */
  getPOSTRequests(key: RequestKey): CapturedRequest[];

  /** Base URL of the listener. Throws NOT_OPEN when not open */
  url(): URL;

  isOpen(): boolean;
}

export class HttpMockServer implements MockServer {
  private readonly config: MockServerConfig;
  private readonly state = new MockServerState();
  private server: Server | null = null;
  private baseUrl: URL | null = null;
  private opening: Promise<void> | null = null;

  constructor(options?: MockServerOptions) {
    this.config = resolveMockServerOptions(options);
  }

  async open(): Promise<void> {
    const { host, port, logger } = this.config;
    if (this.server) {
      throw alreadyOpenError(this.baseUrl?.toString() ?? `${host}:${port}`);
    }
    const server = createServer(createRequestHandler(this.state, this.config));
    // Claimed before listening so a second open() or an early close() sees it.
    this.server = server;

    const listening = new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(listenError(`${host}:${port}`, err));
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        resolve();
      });
    });
    this.opening = listening;

    try {
      await listening;
    } catch (err) {
      if (this.server === server) this.server = null;
      throw err;
    } finally {
      if (this.opening === listening) this.opening = null;
    }

    // close() ran while listen was pending; it shuts this server down.
    if (this.server !== server) return;

    this.baseUrl = new URL(`http://${formatHost(host)}:${boundPort(server)}/`);
    logger.debug(`[mock-server] listening at ${this.baseUrl.toString()}`);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    const opening = this.opening;
    this.server = null;
    this.baseUrl = null;
    const { logger } = this.config;

    if (opening) {
      // A failed listen is reported by open() itself.
      await opening.then(
        () => undefined,
        (err: unknown) => logger.debug(`[mock-server] close during failed open: ${String(err)}`)
      );
    }

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          logger.debug(`[mock-server] close: ${err.message}`);
        }
        resolve();
      });
      // Keep-alive sockets from fetch would otherwise hold close() open.
      server.closeAllConnections();
    });
  }

  reset(): void {
    this.state.reset();
  }

  setGETResponseBody(key: string, body: string): void {
    this.state.setResponseBody("GET", key, body);
  }

  setPOSTResponseBody(key: RequestKey, body: string): void {
    this.state.setResponseBody("POST", key, body);
  }

  getGETRequests(key: string): CapturedRequest[] {
    return this.state.getRequests("GET", key);
  }

  getPOSTRequests(key: RequestKey): CapturedRequest[] {
    return this.state.getRequests("POST", key);
  }

  url(): URL {
    if (!this.baseUrl) {
      throw notOpenError("url");
    }
    // Copy so callers can build request URLs from it without mutating ours.
    return new URL(this.baseUrl.toString());
  }

  isOpen(): boolean {
    return this.baseUrl !== null;
  }
}

export function createMockServer(options?: MockServerOptions): MockServer {
  return new HttpMockServer(options);
}

function formatHost(host: string): string {
  return host.includes(":") ? `[${host}]` : host;
}

function boundPort(server: Server): number {
  const address: string | AddressInfo | null = server.address();
  if (address === null || typeof address === "string") {
    // Pipes and unbound servers have no port; listen() above always binds TCP.
    throw notOpenError("address");
  }
  return address.port;
}
