/**
 * Lookup keys for captured requests and canned responses.
 *
 * GET:  "<path>?<rawQuery>"
 * POST: "<path>?<rawQuery> <file contents>"
 *
 * The "?" is always present, so a request without a query string has a key
 * ending in "?" (e.g. "/users?").
 *
 * Uploads are arbitrary bytes, so a key is really a byte sequence. Text keys
 * are their UTF-8 bytes; binary ones can be given as a Buffer.
 */

/** A key as test code passes it: text, or raw bytes for binary uploads */
export type RequestKey = string | Buffer;

export interface RequestTarget {
  /** Percent-decoded path */
  path: string;
  /** Everything after the first "?", undecoded */
  rawQuery: string;
}

// Absolute-form targets ("http://host:port/p?q"), as sent to proxies.
const ORIGIN = /^[a-z][a-z\d+.-]*:\/\/[^/?#]*/i;

/** Split a request target ("/a%20b?x=1") into decoded path and raw query */
export function parseRequestTarget(target: string): RequestTarget {
  const relative = target.startsWith("/") ? target : target.replace(ORIGIN, "");
  const q = relative.indexOf("?");
  const rawPath = q === -1 ? relative : relative.slice(0, q);
  const rawQuery = q === -1 ? "" : relative.slice(q + 1);
  return { path: decodePath(rawPath), rawQuery };
}

function decodePath(rawPath: string): string {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    // Malformed escapes (e.g. "%zz") stay verbatim so the key is still usable.
    return rawPath;
  }
}

export function keyFromTarget({ path, rawQuery }: RequestTarget): string {
  return `${path}?${rawQuery}`;
}

/** Key a GET to `target` is recorded and matched under */
export function getRequestKey(target: string): string {
  return keyFromTarget(parseRequestTarget(target));
}

/**
 * Text form of the key a POST to `target` carrying `fileContent` is recorded
 * under. Use postRequestKeyBytes when the upload is not valid UTF-8.
 */
export function postRequestKey(target: string, fileContent: string | Buffer): string {
  const content = typeof fileContent === "string" ? fileContent : fileContent.toString("utf-8");
  return `${getRequestKey(target)} ${content}`;
}

/** Byte-exact key of a POST to `target` carrying `fileContent` */
export function postRequestKeyBytes(target: string, fileContent: Buffer): Buffer {
  return Buffer.concat([Buffer.from(`${getRequestKey(target)} `, "utf-8"), fileContent]);
}

export function keyBytes(key: RequestKey): Buffer {
  return typeof key === "string" ? Buffer.from(key, "utf-8") : key;
}

/**
 * Map key for storage: one latin1 char per byte, so uploads that differ in
 * any byte never share an entry, while text keys still match their uploads.
 */
export function storageKey(key: RequestKey): string {
  return keyBytes(key).toString("latin1");
}
