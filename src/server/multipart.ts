/**
 * multipart/form-data extraction for POST bodies.
 * Parsing goes through the Fetch API's Request#formData, the same platform
 * fetch stack the rest of the package talks to the server with.
 */

import { missingFileError, multipartParseError } from "../domain/errors.js";
import type { CapturedFile } from "../domain/types.js";

export interface MultipartForm {
  file: CapturedFile;
  /** Every non-file field; repeated names keep the last value */
  fields: Record<string, string>;
}

// Only used to give Request a URL; never contacted.
const PARSE_BASE_URL = "http://mock-server.invalid/";

export function isMultipartContentType(contentType: string | undefined): boolean {
  return (contentType ?? "").toLowerCase().startsWith("multipart/form-data");
}

/**
 * Parse `body` and pull out the file uploaded under `fieldName`.
 * Throws MockServerError MULTIPART_PARSE_FAILED when the body is not valid
 * multipart, MISSING_FILE when the field is absent or is a plain text field.
 */
export async function extractFormFile(
  body: Buffer,
  contentType: string | undefined,
  fieldName: string
): Promise<MultipartForm> {
  if (!contentType || !isMultipartContentType(contentType)) {
    throw multipartParseError("request Content-Type isn't multipart/form-data");
  }

  let form: FormData;
  try {
    form = await new Request(PARSE_BASE_URL, {
      method: "POST",
      headers: { "content-type": contentType },
      body,
    }).formData();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw multipartParseError(`malformed multipart body: ${reason}`, err);
  }

  let file: CapturedFile | undefined;
  const fields: Record<string, string> = {};
  for (const [name, value] of form.entries()) {
    if (typeof value === "string") {
      fields[name] = value;
      continue;
    }
    // First file part wins, like a form reader's FormFile lookup.
    if (name === fieldName && file === undefined) {
      file = {
        fieldName: name,
        fileName: value.name,
        contentType: value.type,
        content: Buffer.from(await value.arrayBuffer()),
      };
    }
  }

  if (!file) {
    throw missingFileError(fieldName);
  }
  return { file, fields };
}
