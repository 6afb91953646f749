/**
 * Transport Module - Types
 */
import type { Result } from "neverthrow";

import type { SmartCastError } from "../protocol/index.js";

export type HttpMethod = "GET" | "PUT";

export type HttpRequest = Readonly<{
  method: HttpMethod;
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: string;
}>;

/**
 * Sends one request and yields the response body text. Every failure to
 * obtain a body is a TRANSPORT_ERROR.
 */
export type Transport = (
  request: HttpRequest,
) => Promise<Result<string, SmartCastError>>;

export type TransportOptions = Readonly<{
  timeoutMs: number;
  allowSelfSigned: boolean;
}>;
