/**
 * Transport Module - Public API
 */

// Types
export type {
  HttpMethod,
  HttpRequest,
  Transport,
  TransportOptions,
} from "./schema.js";

// Service functions (side effects)
export { buildHeaders, createHttpTransport } from "./service.js";
