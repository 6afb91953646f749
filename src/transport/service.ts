/**
 * Transport Module - Service Layer
 *
 * HTTP(S) requests to the device through undici. Devices serve their
 * API over TLS with a self-signed certificate, so the dispatcher can be
 * told to skip verification.
 */
import { err, ok } from "neverthrow";
import { Agent, fetch } from "undici";

import { getConnectionConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { transportError } from "../protocol/index.js";
import type { HttpRequest, Transport, TransportOptions } from "./schema.js";

const log = createLogger("transport");

/**
 * Create the default transport.
 */
export function createHttpTransport(
  options: TransportOptions = getConnectionConfig(),
): Transport {
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: !options.allowSelfSigned },
  });

  return async (request: HttpRequest) => {
    log.debug({ method: request.method, url: request.url }, "Sending request");

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        dispatcher,
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      // Error statuses still carry a STATUS envelope on this API
      const text = await response.text();

      log.debug(
        { url: request.url, status: response.status, bytes: text.length },
        "Response received",
      );

      return ok(text);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(transportError("Request timed out", request.url, cause));
      }

      return err(transportError(cause.message, request.url, cause));
    }
  };
}

/**
 * Standard headers for a device API request.
 */
export function buildHeaders(
  authToken: string | undefined,
): Record<string, string> {
  if (authToken === undefined) {
    return { "Content-Type": "application/json" };
  }
  return { "Content-Type": "application/json", AUTH: authToken };
}
