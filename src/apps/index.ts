/**
 * Apps Module - Public API
 */

// Types
export type { App } from "./schema.js";

// Service (side effects)
export { AppCatalog } from "./service.js";

// Pure transformations
export {
  findByPayload,
  parseAvailability,
  parseCatalog,
  samePayload,
} from "./transform.js";
