/**
 * Discovery Module - Public API
 */

// Types
export type { DeviceDescription, SsdpOptions } from "./schema.js";

// Service functions (side effects)
export {
  defaultSsdpOptions,
  discoverDescriptions,
  fetchDescription,
  parseDescription,
  ssdpSearch,
} from "./service.js";

// Pure transformations
export {
  buildSearchMessage,
  DESCRIPTION_PATH,
  descriptionUrl,
  ipFromLocation,
  parseLocation,
  SMARTCAST_MANUFACTURER,
  SSDP_SEARCH_TARGET,
  stripUuidPrefix,
} from "./transform.js";
