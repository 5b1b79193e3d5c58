/**
 * Mock server options, validated with zod at construction time.
 * There are no environment variables: everything comes from the test that builds the server.
 */

import { z } from "zod";
import { invalidOptionsError } from "./domain/errors.js";
import { silentLogger, type MockServerLogger } from "./domain/types.js";

const optionsSchema = z.object({
  host: z.string().min(1, "host must not be empty").default("127.0.0.1"),
  // 0 asks the OS for an ephemeral port
  port: z.number().int().min(0).max(65_535).default(0),
  fileField: z.string().min(1, "fileField must not be empty").default("file"),
});

export type MockServerConfig = z.infer<typeof optionsSchema> & {
  logger: MockServerLogger;
};

export interface MockServerOptions {
  /** Interface to bind (default 127.0.0.1) */
  host?: string;
  /** Port to bind (default 0, ephemeral) */
  port?: number;
  /** Multipart field whose contents join the POST key (default "file") */
  fileField?: string;
  /** Defaults to a silent logger */
  logger?: MockServerLogger;
}

/**
 * Validate options and fill in defaults.
 * Throws MockServerError INVALID_OPTIONS with every zod issue listed.
 */
export function resolveMockServerOptions(options: MockServerOptions = {}): MockServerConfig {
  const { logger, ...rest } = options;
  const parsed = optionsSchema.safeParse(rest);
  if (!parsed.success) {
    const msg = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw invalidOptionsError(msg, parsed.error);
  }
  return { ...parsed.data, logger: logger ?? silentLogger };
}
