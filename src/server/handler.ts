/**
 * The single request handler behind the listener: classify by method, build the
 * key, record the request, then write the canned response or a 404/405/500.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { MockServerConfig } from "../config.js";
import { isMockServerError } from "../domain/errors.js";
import type { CannedResponse, CapturedRequest, HandledMethod } from "../domain/types.js";
import { extractFormFile, type MultipartForm } from "./multipart.js";
import {
  keyBytes,
  keyFromTarget,
  parseRequestTarget,
  postRequestKeyBytes,
  type RequestKey,
} from "./request-key.js";
import type { MockServerState } from "./state.js";

const TEXT_PLAIN = "text/plain; charset=utf-8";

export type RequestListener = (req: IncomingMessage, res: ServerResponse) => void;

export function createRequestHandler(
  state: MockServerState,
  config: Pick<MockServerConfig, "fileField" | "logger">
): RequestListener {
  const { logger } = config;

  async function handleGet(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const target = req.url ?? "/";
    const parsed = parseRequestTarget(target);
    const key = keyFromTarget(parsed);
    // GET bodies are not part of the key but are still drained and kept.
    const body = await readBody(req);

    const response = state.recordAndMatch("GET", key, snapshot(req, "GET", target, body));
    respond(res, "GET", key, response);
  }

  async function handlePost(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const target = req.url ?? "/";
    const body = await readBody(req);

    let form: MultipartForm;
    try {
      form = await extractFormFile(body, req.headers["content-type"], config.fileField);
    } catch (err) {
      if (!isMockServerError(err)) throw err;
      logger.warn(`[mock-server] POST ${target} -> 500 ${err.message}`);
      writeError(res, err.httpStatus ?? 500, err.message);
      return;
    }

    const key = postRequestKeyBytes(target, form.file.content);
    const captured = snapshot(req, "POST", target, body, form);
    const response = state.recordAndMatch("POST", key, captured);
    respond(res, "POST", key, response);
  }

  function respond(
    res: ServerResponse,
    method: HandledMethod,
    key: RequestKey,
    response: CannedResponse | undefined
  ): void {
    const bytes = keyBytes(key);
    const shown = bytes.toString("utf-8");
    if (!response) {
      logger.warn(`[mock-server] ${method} '${shown}' -> 404 no response configured`);
      res.writeHead(404, { "Content-Type": TEXT_PLAIN });
      // The key goes out byte for byte, binary uploads included.
      res.end(
        Buffer.concat([Buffer.from(`No http${method}Response for '`), bytes, Buffer.from("'")])
      );
      return;
    }
    logger.debug(`[mock-server] ${method} '${shown}' -> ${response.statusCode}`);
    // Headers are flushed with the status line.
    res.writeHead(response.statusCode, { "Content-Type": "application/json" });
    res.end(response.body);
  }

  return (req, res) => {
    let handled: Promise<void>;
    switch (req.method) {
      case "GET":
        handled = handleGet(req, res);
        break;
      case "POST":
        handled = handlePost(req, res);
        break;
      default:
        logger.warn(`[mock-server] ${req.method ?? "?"} ${req.url ?? ""} -> 405`);
        res.writeHead(405, { Allow: "GET, POST" });
        res.end();
        return;
    }
    handled.catch((err: unknown) => {
      // Body stream errors (client aborted mid-upload and the like).
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`[mock-server] ${req.method} ${req.url ?? ""} failed: ${reason}`);
      if (!res.headersSent) {
        writeError(res, 500, reason);
      } else {
        res.destroy();
      }
    });
  };
}

function writeError(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, {
    "Content-Type": TEXT_PLAIN,
    "X-Content-Type-Options": "nosniff",
  });
  res.end(`${message}\n`);
}

async function readBody(req: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function snapshot(
  req: IncomingMessage,
  method: HandledMethod,
  target: string,
  body: Buffer,
  form?: MultipartForm
): CapturedRequest {
  const { path, rawQuery } = parseRequestTarget(target);
  return {
    method,
    url: target,
    path,
    rawQuery,
    query: new URLSearchParams(rawQuery),
    headers: { ...req.headers },
    body,
    file: form?.file,
    fields: form?.fields,
    receivedAt: new Date(),
  };
}
